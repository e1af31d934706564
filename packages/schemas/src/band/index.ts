export {
  ApiEnvelopeSchema,
  ApiErrorBodySchema,
  TokenResponseSchema,
  CursorSchema,
  PagingSchema,
  pagedDataSchema,
} from './EnvelopeSchemas.js';
export type { ApiErrorBody, TokenResponse } from './EnvelopeSchemas.js';
export {
  RawAuthorSchema,
  RawPhotoSchema,
  RawCommentSchema,
  RawPostSchema,
  RawBandSchema,
  RawProfileSchema,
  RawAlbumSchema,
  BandsDataSchema,
  PostDetailDataSchema,
  PermissionsDataSchema,
  WritePostDataSchema,
} from './ResourceSchemas.js';
export type {
  RawAuthor,
  RawPhoto,
  RawComment,
  RawPost,
  RawBand,
  RawProfile,
  RawAlbum,
} from './ResourceSchemas.js';
