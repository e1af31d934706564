import { FieldLookupError } from '../errors/field-lookup-error.js';

/**
 * Immutable value object over a fixed set of fields.
 *
 * Fields are read through typed getters on the subclasses or through
 * {@link Resource.field}, which rejects names outside the set.
 */
export abstract class Resource<TFields extends object> {
  protected readonly values: Readonly<TFields>;
  private readonly lookup: ReadonlyMap<string, unknown>;

  protected constructor(
    private readonly kind: string,
    values: TFields,
  ) {
    this.values = Object.freeze({ ...values });
    this.lookup = new Map(Object.entries(this.values));
  }

  /**
   * @throws {FieldLookupError} When `name` is not one of the resource's fields
   */
  public field<K extends keyof TFields & string>(name: K): TFields[K];
  public field(name: string): unknown;
  public field(name: string): unknown {
    if (!this.lookup.has(name)) {
      throw FieldLookupError.unknownField(this.kind, name);
    }
    return this.lookup.get(name);
  }

  public fieldNames(): string[] {
    return [...this.lookup.keys()];
  }

  public toJSON(): Readonly<TFields> {
    return this.values;
  }
}

/**
 * Epoch milliseconds to Date; absent stays absent
 */
export function toDate(epochMillis: number | null | undefined): Date | undefined {
  return epochMillis === null || epochMillis === undefined ? undefined : new Date(epochMillis);
}
