import { LEADER_ROLE } from '@bandkit/models';
import type { RawAuthor } from '@bandkit/schemas';
import { Resource } from './resource.js';

export interface AuthorFields {
  userKey: string;
  name: string;
  description: string;
  role: string;
  profileImageUrl: string;
}

export class Author extends Resource<AuthorFields> {
  public constructor(fields: AuthorFields) {
    super('Author', fields);
  }

  public static fromRaw(raw: RawAuthor): Author {
    return new Author({
      userKey: raw.user_key,
      name: raw.name,
      description: raw.description ?? '',
      role: raw.role ?? '',
      profileImageUrl: raw.profile_image_url ?? '',
    });
  }

  public get userKey(): string {
    return this.values.userKey;
  }

  public get name(): string {
    return this.values.name;
  }

  public get description(): string {
    return this.values.description;
  }

  public get role(): string {
    return this.values.role;
  }

  public get profileImageUrl(): string {
    return this.values.profileImageUrl;
  }

  public get isLeader(): boolean {
    return this.values.role === LEADER_ROLE;
  }
}
