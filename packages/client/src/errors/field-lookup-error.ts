import { BandError } from '@bandkit/core';

export enum FieldLookupErrorCode {
  UNKNOWN_FIELD = 'unknown_field',
  MISSING_VALUE = 'missing_value',
}

/**
 * @public
 */
export class FieldLookupError extends BandError<FieldLookupErrorCode> {
  public constructor(
    message: string,
    code: FieldLookupErrorCode,
    public readonly field: string,
  ) {
    super(message, code);
    this.name = 'FieldLookupError';
  }

  public static unknownField(resource: string, field: string): FieldLookupError {
    return new FieldLookupError(
      `${resource} has no field '${field}'`,
      FieldLookupErrorCode.UNKNOWN_FIELD,
      field,
    );
  }

  public static missingValue(resource: string, field: string): FieldLookupError {
    return new FieldLookupError(
      `${resource} carries no '${field}'`,
      FieldLookupErrorCode.MISSING_VALUE,
      field,
    );
  }
}
