import { BandError } from '@bandkit/core';
import type { Permission } from '@bandkit/models';

export enum PermissionErrorCode {
  MISSING_PERMISSION = 'missing_permission',
  NOT_AUTHOR = 'not_author',
}

/**
 * Raised by a local capability check; no request was sent.
 * @public
 */
export class PermissionError extends BandError<PermissionErrorCode> {
  public constructor(
    message: string,
    code: PermissionErrorCode,
    public readonly bandKey: string,
    public readonly permission?: Permission,
  ) {
    super(message, code);
    this.name = 'PermissionError';
  }

  public static missing(permission: Permission, bandKey: string): PermissionError {
    return new PermissionError(
      `Missing '${permission}' permission in band ${bandKey}`,
      PermissionErrorCode.MISSING_PERMISSION,
      bandKey,
      permission,
    );
  }

  public static notAuthor(resource: string, bandKey: string): PermissionError {
    return new PermissionError(
      `Only the author or a member with 'contents_deletion' can remove this ${resource}`,
      PermissionErrorCode.NOT_AUTHOR,
      bandKey,
    );
  }
}
