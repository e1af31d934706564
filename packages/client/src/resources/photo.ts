import type { RawPhoto } from '@bandkit/schemas';
import { Author } from './author.js';
import { Resource, toDate } from './resource.js';

export interface PhotoFields {
  photoKey: string;
  albumKey?: string;
  url: string;
  width: number;
  height: number;
  createdAt?: Date;
  author?: Author;
  commentCount: number;
  emotionCount: number;
  isVideoThumbnail: boolean;
}

export class Photo extends Resource<PhotoFields> {
  public constructor(fields: PhotoFields) {
    super('Photo', fields);
  }

  public static fromRaw(raw: RawPhoto): Photo {
    return new Photo({
      photoKey: raw.photo_key,
      albumKey: raw.photo_album_key ?? undefined,
      url: raw.url,
      width: raw.width,
      height: raw.height,
      createdAt: toDate(raw.created_at),
      author: raw.author ? Author.fromRaw(raw.author) : undefined,
      commentCount: raw.comment_count,
      emotionCount: raw.emotion_count,
      isVideoThumbnail: raw.is_video_thumbnail,
    });
  }

  public get photoKey(): string {
    return this.values.photoKey;
  }

  public get albumKey(): string | undefined {
    return this.values.albumKey;
  }

  public get url(): string {
    return this.values.url;
  }

  public get width(): number {
    return this.values.width;
  }

  public get height(): number {
    return this.values.height;
  }

  public get createdAt(): Date | undefined {
    return this.values.createdAt;
  }

  public get author(): Author | undefined {
    return this.values.author;
  }

  public get commentCount(): number {
    return this.values.commentCount;
  }

  public get emotionCount(): number {
    return this.values.emotionCount;
  }

  public get isVideoThumbnail(): boolean {
    return this.values.isVideoThumbnail;
  }
}
