import { describe, it, expect } from 'vitest';
import {
  ApiErrorBodySchema,
  PostDetailDataSchema,
  RawBandSchema,
  RawPostSchema,
  TokenResponseSchema,
  pagedDataSchema,
} from '../../index.js';

const author = {
  name: 'Kim',
  description: '',
  role: 'leader',
  profile_image_url: 'https://example.com/kim.png',
  user_key: 'U1',
};

describe('ApiErrorBodySchema', () => {
  it('reads a complete failure body', () => {
    const body = ApiErrorBodySchema.parse({
      result_code: 60000,
      result_data: {
        message: 'Invalid parameter',
        detail: { error: 'invalid_band_key', description: 'band_key is wrong' },
      },
    });

    expect(body).toEqual({
      result_code: 60000,
      result_data: {
        message: 'Invalid parameter',
        detail: { error: 'invalid_band_key', description: 'band_key is wrong' },
      },
    });
  });

  it('defaults an empty object', () => {
    expect(ApiErrorBodySchema.parse({})).toEqual({
      result_code: -1,
      result_data: { message: '', detail: { error: '', description: '' } },
    });
  });

  it('defaults a body that is not an object', () => {
    expect(ApiErrorBodySchema.parse('Service Unavailable').result_code).toBe(-1);
    expect(ApiErrorBodySchema.parse(null).result_code).toBe(-1);
  });

  it('keeps the fields that are well formed', () => {
    const body = ApiErrorBodySchema.parse({
      result_code: '211',
      result_data: { message: 'Not allowed', detail: 'nope' },
    });

    expect(body).toEqual({
      result_code: -1,
      result_data: { message: 'Not allowed', detail: { error: '', description: '' } },
    });
  });
});

describe('TokenResponseSchema', () => {
  it('requires a non-empty access token', () => {
    expect(TokenResponseSchema.safeParse({ access_token: 'T1' }).success).toBe(true);
    expect(TokenResponseSchema.safeParse({ access_token: '' }).success).toBe(false);
    expect(TokenResponseSchema.safeParse({ token_type: 'bearer' }).success).toBe(false);
  });
});

describe('pagedDataSchema', () => {
  const BandPageSchema = pagedDataSchema(RawBandSchema);

  it('stringifies cursor values', () => {
    const page = BandPageSchema.parse({
      items: [],
      paging: { previous_params: null, next_params: { after: 123, limit: '20' } },
    });

    expect(page.paging?.next_params).toEqual({ after: '123', limit: '20' });
  });

  it('accepts a listing without paging', () => {
    const page = BandPageSchema.parse({
      items: [{ band_key: 'B1', name: 'Hikers', member_count: 12 }],
    });

    expect(page.items).toEqual([
      { band_key: 'B1', name: 'Hikers', member_count: 12 },
    ]);
    expect(page.paging).toBeUndefined();
  });

  it('rejects a listing without items', () => {
    expect(BandPageSchema.safeParse({ paging: {} }).success).toBe(false);
  });
});

describe('RawPostSchema', () => {
  it('defaults the optional collections and counters', () => {
    const post = RawPostSchema.parse({ post_key: 'P1', author });

    expect(post).toMatchObject({
      post_key: 'P1',
      content: '',
      comment_count: 0,
      emotion_count: 0,
      photos: [],
      latest_comments: [],
    });
  });
});

describe('PostDetailDataSchema', () => {
  it('unwraps a nested post', () => {
    const post = PostDetailDataSchema.parse({
      post: { post_key: 'P1', band_key: 'B1', content: 'hello', author, post_read_count: 4 },
    });

    expect(post.post_key).toBe('P1');
    expect(post.post_read_count).toBe(4);
  });

  it('accepts a flat post', () => {
    const post = PostDetailDataSchema.parse({ post_key: 'P2', author });

    expect(post.post_key).toBe('P2');
  });
});
