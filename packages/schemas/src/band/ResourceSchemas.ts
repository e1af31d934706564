import { z } from 'zod';

// Raw shapes of the objects found in `result_data`. Only the fields the
// resource objects expose are kept; the rest are stripped.

const epochMillis = z.number().nullish();

export const RawAuthorSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  role: z.string().nullish(),
  profile_image_url: z.string().nullish(),
  user_key: z.string(),
});

export const RawPhotoSchema = z.object({
  photo_key: z.string(),
  photo_album_key: z.string().nullish(),
  url: z.string(),
  width: z.number().default(0),
  height: z.number().default(0),
  created_at: epochMillis,
  author: RawAuthorSchema.nullish(),
  comment_count: z.number().default(0),
  emotion_count: z.number().default(0),
  is_video_thumbnail: z.boolean().default(false),
});

export const RawCommentSchema = z.object({
  comment_key: z.string().nullish(),
  body: z.string().nullish(),
  // Comments embedded in a post detail carry `body`, listed ones `content`
  content: z.string().nullish(),
  author: RawAuthorSchema,
  created_at: epochMillis,
  emotion_count: z.number().default(0),
});

export const RawPostSchema = z.object({
  post_key: z.string(),
  band_key: z.string().nullish(),
  content: z.string().default(''),
  author: RawAuthorSchema,
  created_at: epochMillis,
  comment_count: z.number().default(0),
  emotion_count: z.number().default(0),
  photos: z.array(RawPhotoSchema).default([]),
  latest_comments: z.array(RawCommentSchema).default([]),
  post_read_count: z.number().nullish(),
});

export const RawBandSchema = z.object({
  band_key: z.string(),
  name: z.string(),
  cover: z.string().nullish(),
  member_count: z.number().default(0),
});

export const RawProfileSchema = z.object({
  user_key: z.string(),
  name: z.string(),
  profile_image_url: z.string().nullish(),
  is_app_member: z.boolean().default(false),
  message_allowed: z.boolean().default(false),
  member_joined_at: epochMillis,
});

export const RawAlbumSchema = z.object({
  photo_album_key: z.string(),
  name: z.string(),
  photo_count: z.number().default(0),
  created_at: epochMillis,
  author: RawAuthorSchema.nullish(),
});

export const BandsDataSchema = z.object({
  bands: z.array(RawBandSchema),
});

// v2.1 nests the post under `post`; v2 returns it flat
export const PostDetailDataSchema = z.union([
  z.object({ post: RawPostSchema }).transform((data) => data.post),
  RawPostSchema,
]);

export const PermissionsDataSchema = z.object({
  permissions: z.array(z.string()),
});

export const WritePostDataSchema = z.object({
  band_key: z.string().nullish(),
  post_key: z.string(),
});

export type RawAuthor = z.infer<typeof RawAuthorSchema>;
export type RawPhoto = z.infer<typeof RawPhotoSchema>;
export type RawComment = z.infer<typeof RawCommentSchema>;
export type RawPost = z.infer<typeof RawPostSchema>;
export type RawBand = z.infer<typeof RawBandSchema>;
export type RawProfile = z.infer<typeof RawProfileSchema>;
export type RawAlbum = z.infer<typeof RawAlbumSchema>;
