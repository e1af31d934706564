import { describe, it, expect } from 'vitest';
import { ValidationUtils } from '../../validation-utils.js';

describe('ValidationUtils', () => {
  describe('validateUrl', () => {
    it('accepts absolute URLs', () => {
      expect(() => ValidationUtils.validateUrl('http://localhost:8000')).not.toThrow();
    });

    it('rejects malformed URLs with context', () => {
      expect(() => ValidationUtils.validateUrl('not-a-url', 'redirectUri')).toThrow(
        'redirectUri: Invalid URL format: not-a-url',
      );
    });

    it('rejects empty URLs', () => {
      expect(() => ValidationUtils.validateUrl('', 'apiBaseUrl')).toThrow(
        'apiBaseUrl: URL is required',
      );
    });
  });

  describe('sanitizeIdentifier', () => {
    it('returns safe identifiers unchanged', () => {
      expect(ValidationUtils.sanitizeIdentifier('OPENBAND', 'namespace')).toBe('OPENBAND');
    });

    it('rejects shell metacharacters', () => {
      expect(() => ValidationUtils.sanitizeIdentifier('band; rm -rf /', 'namespace')).toThrow(
        /Invalid namespace: contains unsafe characters/,
      );
    });
  });
});
