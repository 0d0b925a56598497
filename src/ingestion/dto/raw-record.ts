/**
 * Scalar values the furnace API emits inside a record.
 */
export type RawValue = string | number | boolean | null;

/**
 * RawRecord
 *
 * One decoded sample from the furnace API: variable name -> raw value,
 * in the order the API listed them, plus one designated timestamp field.
 *
 * The timestamp is kept as the raw local string; normalizing it to UTC
 * needs the configured zone and happens in the point-building step.
 */
export class RawRecord {
  private readonly values: ReadonlyMap<string, RawValue>;

  constructor(
    values: Iterable<readonly [string, RawValue]>,
    readonly timestampField: string = 'Timelogged',
  ) {
    this.values = new Map(values);
  }

  /** Number of variables, timestamp field included */
  get size(): number {
    return this.values.size;
  }

  get(name: string): RawValue | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /**
   * Raw timestamp string, or null when the field is missing or not a string.
   */
  rawTimestamp(): string | null {
    const value = this.values.get(this.timestampField);
    return typeof value === 'string' ? value : null;
  }

  /**
   * Every variable except the timestamp field, in insertion order.
   */
  *fields(): IterableIterator<[string, RawValue]> {
    for (const [name, value] of this.values) {
      if (name !== this.timestampField) {
        yield [name, value];
      }
    }
  }

  /**
   * Copy keeping only the listed variables. The timestamp field always
   * survives.
   */
  restrictTo(variables: ReadonlySet<string>): RawRecord {
    const kept: [string, RawValue][] = [];
    for (const [name, value] of this.values) {
      if (name === this.timestampField || variables.has(name)) {
        kept.push([name, value]);
      }
    }
    return new RawRecord(kept, this.timestampField);
  }

  /**
   * Copy carrying a different timestamp field name.
   */
  withTimestampField(timestampField: string): RawRecord {
    return new RawRecord(this.values, timestampField);
  }

  toObject(): Record<string, RawValue> {
    return Object.fromEntries(this.values);
  }
}
