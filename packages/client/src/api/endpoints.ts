/**
 * Paths under the API base URL. Versions differ per endpoint upstream.
 */
export const Endpoints = {
  PROFILE: '/v2/profile',
  BANDS: '/v2.1/bands',
  PERMISSIONS: '/v2/band/permissions',
  POSTS: '/v2/band/posts',
  POST_DETAIL: '/v2.1/band/post',
  WRITE_POST: '/v2.2/band/post/create',
  REMOVE_POST: '/v2/band/post/remove',
  COMMENTS: '/v2/band/post/comments',
  WRITE_COMMENT: '/v2/band/post/comment/create',
  REMOVE_COMMENT: '/v2/band/post/comment/remove',
  ALBUMS: '/v2/band/albums',
  PHOTOS: '/v2/band/album/photos',
} as const;

export type Endpoint = (typeof Endpoints)[keyof typeof Endpoints];
