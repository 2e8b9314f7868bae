/**
 * Fluent assertions for domain invariants.
 *
 * @example
 * ```typescript
 * Assert.that(memberId, 'MemberId').isNonEmpty();
 * Assert.that(digit, 'PIN digit').isInteger().isBetween(0, 9);
 * ```
 */
export class Assert<T> {
  private constructor(
    private readonly value: T,
    private readonly name?: string
  ) {}

  static that<T>(value: T, name?: string): Assert<T> {
    return new Assert(value, name);
  }

  isNonEmpty(): this {
    if (typeof this.value !== 'string' || this.value.trim().length === 0) {
      this.fail('must be a non-empty string');
    }
    return this;
  }

  isInteger(): this {
    if (typeof this.value !== 'number' || !Number.isInteger(this.value)) {
      this.fail('must be an integer');
    }
    return this;
  }

  isBetween(min: number, max: number): this {
    if (
      typeof this.value !== 'number' ||
      this.value < min ||
      this.value > max
    ) {
      this.fail(`must be between ${min} and ${max}`);
    }
    return this;
  }

  private fail(message: string): never {
    const prefix = this.name ? `${this.name} ` : 'Value ';
    const shown =
      this.value === undefined ? 'undefined' : JSON.stringify(this.value);
    throw new Error(`${prefix}${message}, got: ${shown}`);
  }
}
