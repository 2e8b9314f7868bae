import { Assert } from '../shared/Assert';
import { ValueObject } from '../shared/vos/ValueObject';

/**
 * Identifier of a member, as stored on their tag and used by the
 * PIN-delivery and profile services. Opaque to this codebase.
 */
export class MemberId extends ValueObject<string> {
  private constructor(private readonly _value: string) {
    super();
  }

  static from(value: string): MemberId {
    Assert.that(value, 'MemberId').isNonEmpty();
    return new MemberId(value);
  }

  get value(): string {
    return this._value;
  }
}
