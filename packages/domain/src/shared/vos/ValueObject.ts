/**
 * Base class for immutable domain values.
 *
 * Equality is structural over `value`. Subclasses whose value is a
 * composite (array, record) override `equals`.
 */
export abstract class ValueObject<TValue> {
  abstract get value(): TValue;

  equals(other: ValueObject<TValue>): boolean {
    return Object.is(this.value, other.value);
  }

  toString(): string {
    const v: unknown = this.value;
    return typeof v === 'string' ? v : JSON.stringify(v);
  }
}
