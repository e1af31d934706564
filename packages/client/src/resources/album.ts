import type { Cursor, PagedResult } from '@bandkit/models';
import { RawPhotoSchema, type RawAlbum } from '@bandkit/schemas';
import { Endpoints } from '../api/endpoints.js';
import { Author } from './author.js';
import type { Band } from './band.js';
import { Photo } from './photo.js';
import { Resource, toDate } from './resource.js';

export interface AlbumFields {
  albumKey: string;
  name: string;
  photoCount: number;
  createdAt?: Date;
  author?: Author;
}

export class Album extends Resource<AlbumFields> {
  public constructor(
    fields: AlbumFields,
    public readonly band: Band,
  ) {
    super('Album', fields);
  }

  public static fromRaw(raw: RawAlbum, band: Band): Album {
    return new Album(
      {
        albumKey: raw.photo_album_key,
        name: raw.name,
        photoCount: raw.photo_count,
        createdAt: toDate(raw.created_at),
        author: raw.author ? Author.fromRaw(raw.author) : undefined,
      },
      band,
    );
  }

  public get albumKey(): string {
    return this.values.albumKey;
  }

  public get name(): string {
    return this.values.name;
  }

  public get photoCount(): number {
    return this.values.photoCount;
  }

  public get createdAt(): Date | undefined {
    return this.values.createdAt;
  }

  public get author(): Author | undefined {
    return this.values.author;
  }

  public photos(cursor?: Cursor): Promise<PagedResult<Photo>> {
    return this.band.api.listPage(
      Endpoints.PHOTOS,
      { band_key: this.band.bandKey, photo_album_key: this.albumKey },
      cursor,
      RawPhotoSchema,
      (raw) => Photo.fromRaw(raw),
    );
  }
}
