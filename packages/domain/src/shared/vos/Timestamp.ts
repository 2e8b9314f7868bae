import { ValueObject } from './ValueObject';

/**
 * A point in time, held as epoch milliseconds.
 */
export class Timestamp extends ValueObject<number> {
  private constructor(private readonly _value: number) {
    super();
  }

  static now(): Timestamp {
    return new Timestamp(Date.now());
  }

  static fromMillis(value: number): Timestamp {
    if (!Number.isFinite(value)) {
      throw new Error('Timestamp must be a finite number of milliseconds');
    }
    return new Timestamp(value);
  }

  static fromISOString(iso: string): Timestamp {
    const ms = Date.parse(iso);
    if (Number.isNaN(ms)) {
      throw new Error(`Timestamp is not a valid ISO date: ${iso}`);
    }
    return new Timestamp(ms);
  }

  static fromDate(date: Date): Timestamp {
    return Timestamp.fromMillis(date.getTime());
  }

  plusSeconds(seconds: number): Timestamp {
    return Timestamp.fromMillis(this._value + seconds * 1000);
  }

  toISOString(): string {
    return new Date(this._value).toISOString();
  }

  /**
   * ISO-8601 in UTC without the millisecond fraction, e.g.
   * `2026-01-02T03:04:05Z`.
   */
  toISOStringSeconds(): string {
    return this.toISOString().replace(/\.\d{3}Z$/, 'Z');
  }

  isBefore(other: Timestamp): boolean {
    return this._value < other._value;
  }

  isAfter(other: Timestamp): boolean {
    return this._value > other._value;
  }

  toString(): string {
    return this.toISOString();
  }

  get value(): number {
    return this._value;
  }
}
