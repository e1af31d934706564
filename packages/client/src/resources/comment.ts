import type { RawComment } from '@bandkit/schemas';
import { IgnoredDataSchema } from '../api/band-api.js';
import { Endpoints } from '../api/endpoints.js';
import { FieldLookupError } from '../errors/field-lookup-error.js';
import { Author } from './author.js';
import type { Band } from './band.js';
import { Resource, toDate } from './resource.js';

export interface CommentFields {
  /** Absent on some comments embedded in a post detail */
  commentKey?: string;
  postKey: string;
  body: string;
  author: Author;
  createdAt?: Date;
  emotionCount: number;
}

export class Comment extends Resource<CommentFields> {
  public constructor(
    fields: CommentFields,
    public readonly band: Band,
  ) {
    super('Comment', fields);
  }

  public static fromRaw(raw: RawComment, band: Band, postKey: string): Comment {
    return new Comment(
      {
        commentKey: raw.comment_key ?? undefined,
        postKey,
        body: raw.content ?? raw.body ?? '',
        author: Author.fromRaw(raw.author),
        createdAt: toDate(raw.created_at),
        emotionCount: raw.emotion_count,
      },
      band,
    );
  }

  public get commentKey(): string | undefined {
    return this.values.commentKey;
  }

  public get postKey(): string {
    return this.values.postKey;
  }

  public get body(): string {
    return this.values.body;
  }

  public get author(): Author {
    return this.values.author;
  }

  public get createdAt(): Date | undefined {
    return this.values.createdAt;
  }

  public get emotionCount(): number {
    return this.values.emotionCount;
  }

  /**
   * @throws {PermissionError} Unless the caller wrote the comment or holds `contents_deletion`
   */
  public async remove(): Promise<void> {
    const commentKey = this.values.commentKey;
    if (!commentKey) {
      throw FieldLookupError.missingValue('Comment', 'commentKey');
    }
    await this.band.assertCanRemove(this.author, 'comment');
    await this.band.api.post(
      Endpoints.REMOVE_COMMENT,
      { band_key: this.band.bandKey, post_key: this.postKey, comment_key: commentKey },
      IgnoredDataSchema,
    );
  }
}
