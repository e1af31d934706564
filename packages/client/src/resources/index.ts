export { Resource, toDate } from './resource.js';
export { Author } from './author.js';
export type { AuthorFields } from './author.js';
export { Photo } from './photo.js';
export type { PhotoFields } from './photo.js';
export { Profile } from './profile.js';
export type { ProfileFields } from './profile.js';
export { Comment } from './comment.js';
export type { CommentFields } from './comment.js';
export { Post } from './post.js';
export type { PostFields } from './post.js';
export { Album } from './album.js';
export type { AlbumFields } from './album.js';
export { Band } from './band.js';
export type { BandFields, WritePostOptions } from './band.js';
