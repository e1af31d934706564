import { Permissions, type Cursor, type PagedResult } from '@bandkit/models';
import { RawCommentSchema, type RawPost } from '@bandkit/schemas';
import { IgnoredDataSchema } from '../api/band-api.js';
import { Endpoints } from '../api/endpoints.js';
import { Author } from './author.js';
import type { Band } from './band.js';
import { Comment } from './comment.js';
import { Photo } from './photo.js';
import { Resource, toDate } from './resource.js';

export interface PostFields {
  postKey: string;
  bandKey: string;
  content: string;
  author: Author;
  createdAt?: Date;
  commentCount: number;
  emotionCount: number;
  photos: readonly Photo[];
  latestComments: readonly Comment[];
  /** Only reported by the detail endpoint */
  postReadCount?: number;
}

export class Post extends Resource<PostFields> {
  public constructor(
    fields: PostFields,
    public readonly band: Band,
  ) {
    super('Post', fields);
  }

  public static fromRaw(raw: RawPost, band: Band): Post {
    return new Post(
      {
        postKey: raw.post_key,
        bandKey: raw.band_key ?? band.bandKey,
        content: raw.content,
        author: Author.fromRaw(raw.author),
        createdAt: toDate(raw.created_at),
        commentCount: raw.comment_count,
        emotionCount: raw.emotion_count,
        photos: raw.photos.map((photo) => Photo.fromRaw(photo)),
        latestComments: raw.latest_comments.map((comment) =>
          Comment.fromRaw(comment, band, raw.post_key),
        ),
        postReadCount: raw.post_read_count ?? undefined,
      },
      band,
    );
  }

  public get postKey(): string {
    return this.values.postKey;
  }

  public get bandKey(): string {
    return this.values.bandKey;
  }

  public get content(): string {
    return this.values.content;
  }

  public get author(): Author {
    return this.values.author;
  }

  public get createdAt(): Date | undefined {
    return this.values.createdAt;
  }

  public get commentCount(): number {
    return this.values.commentCount;
  }

  public get emotionCount(): number {
    return this.values.emotionCount;
  }

  public get photos(): readonly Photo[] {
    return this.values.photos;
  }

  public get latestComments(): readonly Comment[] {
    return this.values.latestComments;
  }

  public get postReadCount(): number | undefined {
    return this.values.postReadCount;
  }

  /**
   * Re-fetches the post with its read count and latest comments
   */
  public detail(): Promise<Post> {
    return this.band.getPost(this.postKey);
  }

  public comments(cursor?: Cursor): Promise<PagedResult<Comment>> {
    return this.band.api.listPage(
      Endpoints.COMMENTS,
      { band_key: this.band.bandKey, post_key: this.postKey },
      cursor,
      RawCommentSchema,
      (raw) => Comment.fromRaw(raw, this.band, this.postKey),
    );
  }

  /**
   * @throws {PermissionError} Without `commenting`; nothing is sent
   */
  public async writeComment(body: string): Promise<void> {
    await this.band.requirePermission(Permissions.COMMENTING);
    await this.band.api.post(
      Endpoints.WRITE_COMMENT,
      { band_key: this.band.bandKey, post_key: this.postKey, body },
      IgnoredDataSchema,
    );
  }

  /**
   * @throws {PermissionError} Unless the caller wrote the post or holds `contents_deletion`
   */
  public async remove(): Promise<void> {
    await this.band.assertCanRemove(this.author, 'post');
    await this.band.api.post(
      Endpoints.REMOVE_POST,
      { band_key: this.band.bandKey, post_key: this.postKey },
      IgnoredDataSchema,
    );
  }
}
