import {
  ALL_PERMISSIONS,
  Permissions,
  type Cursor,
  type PagedResult,
  type Permission,
} from '@bandkit/models';
import {
  PermissionsDataSchema,
  PostDetailDataSchema,
  RawAlbumSchema,
  RawPostSchema,
  RawProfileSchema,
  WritePostDataSchema,
  type RawBand,
} from '@bandkit/schemas';
import type { BandApi } from '../api/band-api.js';
import { Endpoints } from '../api/endpoints.js';
import { PermissionError } from '../errors/permission-error.js';
import { Album } from './album.js';
import type { Author } from './author.js';
import { Post } from './post.js';
import { Profile } from './profile.js';
import { Resource } from './resource.js';

export interface BandFields {
  bandKey: string;
  name: string;
  cover?: string;
  memberCount: number;
}

export interface WritePostOptions {
  /** Notify members of the new post */
  doPush?: boolean;
}

function isPermission(value: string): value is Permission {
  return ALL_PERMISSIONS.some((permission) => permission === value);
}

/**
 * A group the user belongs to, and the entry point to its posts and albums.
 *
 * Permissions are fetched on first use and kept for the lifetime of the
 * instance; a failed fetch is not cached.
 */
export class Band extends Resource<BandFields> {
  private permissionSet?: Promise<ReadonlySet<Permission>>;

  public constructor(
    fields: BandFields,
    /** @internal */
    public readonly api: BandApi,
  ) {
    super('Band', fields);
  }

  public static fromRaw(raw: RawBand, api: BandApi): Band {
    return new Band(
      {
        bandKey: raw.band_key,
        name: raw.name,
        cover: raw.cover ?? undefined,
        memberCount: raw.member_count,
      },
      api,
    );
  }

  public get bandKey(): string {
    return this.values.bandKey;
  }

  public get name(): string {
    return this.values.name;
  }

  public get cover(): string | undefined {
    return this.values.cover;
  }

  public get memberCount(): number {
    return this.values.memberCount;
  }

  public posts(cursor?: Cursor): Promise<PagedResult<Post>> {
    return this.api.listPage(
      Endpoints.POSTS,
      { band_key: this.bandKey, locale: this.api.locale },
      cursor,
      RawPostSchema,
      (raw) => Post.fromRaw(raw, this),
    );
  }

  public async getPost(postKey: string): Promise<Post> {
    const raw = await this.api.get(
      Endpoints.POST_DETAIL,
      { band_key: this.bandKey, post_key: postKey },
      PostDetailDataSchema,
    );
    return Post.fromRaw(raw, this);
  }

  public albums(cursor?: Cursor): Promise<PagedResult<Album>> {
    return this.api.listPage(
      Endpoints.ALBUMS,
      { band_key: this.bandKey },
      cursor,
      RawAlbumSchema,
      (raw) => Album.fromRaw(raw, this),
    );
  }

  /**
   * The current user's profile inside this band
   */
  public async me(): Promise<Profile> {
    const raw = await this.api.get(
      Endpoints.PROFILE,
      { band_key: this.bandKey },
      RawProfileSchema,
    );
    return Profile.fromRaw(raw);
  }

  public permissions(): Promise<ReadonlySet<Permission>> {
    if (!this.permissionSet) {
      this.permissionSet = this.fetchPermissions().catch((error: unknown) => {
        this.permissionSet = undefined;
        throw error;
      });
    }
    return this.permissionSet;
  }

  public async hasPermission(permission: Permission): Promise<boolean> {
    return (await this.permissions()).has(permission);
  }

  /**
   * @throws {PermissionError} When the band does not grant `permission`
   */
  public async requirePermission(permission: Permission): Promise<void> {
    if (!(await this.hasPermission(permission))) {
      throw PermissionError.missing(permission, this.bandKey);
    }
  }

  /**
   * Removal is allowed to holders of `contents_deletion` and to the author.
   * The author check costs one profile lookup.
   * @throws {PermissionError} When neither applies
   */
  public async assertCanRemove(author: Author, resource: string): Promise<void> {
    if (await this.hasPermission(Permissions.CONTENTS_DELETION)) {
      return;
    }
    const actor = await this.me();
    if (actor.userKey !== author.userKey) {
      throw PermissionError.notAuthor(resource, this.bandKey);
    }
  }

  /**
   * @returns The key of the new post
   * @throws {PermissionError} Without `posting`; nothing is sent
   */
  public async writePost(content: string, options: WritePostOptions = {}): Promise<string> {
    await this.requirePermission(Permissions.POSTING);
    const data = await this.api.post(
      Endpoints.WRITE_POST,
      { band_key: this.bandKey, content, do_push: options.doPush ?? false },
      WritePostDataSchema,
    );
    return data.post_key;
  }

  private async fetchPermissions(): Promise<ReadonlySet<Permission>> {
    const data = await this.api.get(
      Endpoints.PERMISSIONS,
      { band_key: this.bandKey, permissions: ALL_PERMISSIONS.join(',') },
      PermissionsDataSchema,
    );
    return new Set(data.permissions.filter(isPermission));
  }
}
