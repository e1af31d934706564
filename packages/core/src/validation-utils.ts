/**
 * Centralized validation helpers shared by configuration parsing and the
 * secret stores.
 * @public
 */

// Namespaces and keys reach `security`/`cmdkey` argument lists and file names
const SAFE_IDENTIFIER_REGEX = /^[a-zA-Z0-9._-]+$/;

function validateUrl(url: string, context?: string): void {
  const prefix = context ? `${context}: ` : '';
  if (!url) {
    throw new Error(`${prefix}URL is required`);
  }

  try {
    new URL(url);
  } catch {
    throw new Error(`${prefix}Invalid URL format: ${url}`);
  }
}

/**
 * @example
 * ```typescript
 * ValidationUtils.validateUrl('https://openapi.band.us', 'apiBaseUrl');
 * const namespace = ValidationUtils.sanitizeIdentifier('OPENBAND', 'namespace');
 * ```
 * @public
 */
export const ValidationUtils = {
  /**
   * @throws \{Error\} When the URL is empty or cannot be parsed
   */
  validateUrl,
  /**
   * Ensures an identifier is safe to pass to keychain commands and file names.
   * @returns The same identifier if valid
   * @throws \{Error\} When the identifier contains unsafe characters
   */
  sanitizeIdentifier: (value: string, context: string = 'identifier'): string => {
    if (!SAFE_IDENTIFIER_REGEX.test(value)) {
      throw new Error(
        `Invalid ${context}: contains unsafe characters. Only alphanumeric characters, dots, underscores, and hyphens are allowed.`,
      );
    }
    return value;
  },
};
