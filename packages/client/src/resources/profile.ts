import type { RawProfile } from '@bandkit/schemas';
import { Resource, toDate } from './resource.js';

export interface ProfileFields {
  userKey: string;
  name: string;
  profileImageUrl: string;
  isAppMember: boolean;
  messageAllowed: boolean;
  /** Only present on band-scoped profiles */
  memberJoinedAt?: Date;
}

/**
 * The user the access token belongs to, optionally as seen inside one band
 */
export class Profile extends Resource<ProfileFields> {
  public constructor(fields: ProfileFields) {
    super('Profile', fields);
  }

  public static fromRaw(raw: RawProfile): Profile {
    return new Profile({
      userKey: raw.user_key,
      name: raw.name,
      profileImageUrl: raw.profile_image_url ?? '',
      isAppMember: raw.is_app_member,
      messageAllowed: raw.message_allowed,
      memberJoinedAt: toDate(raw.member_joined_at),
    });
  }

  public get userKey(): string {
    return this.values.userKey;
  }

  public get name(): string {
    return this.values.name;
  }

  public get profileImageUrl(): string {
    return this.values.profileImageUrl;
  }

  public get isAppMember(): boolean {
    return this.values.isAppMember;
  }

  public get messageAllowed(): boolean {
    return this.values.messageAllowed;
  }

  public get memberJoinedAt(): Date | undefined {
    return this.values.memberJoinedAt;
  }
}
