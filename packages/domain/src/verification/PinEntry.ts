import { Assert } from '../shared/Assert';
import { ValueObject } from '../shared/vos/ValueObject';

export type PinSlot = number | null;

export const DEFAULT_PIN_LENGTH = 4;
export const MAX_PIN_LENGTH = 12;

/**
 * Partial entry of a fixed-length numeric PIN.
 *
 * Immutable: `append`, `removeLast` and `clear` return the next value
 * (or `this` when the operation is a no-op), so observers always see a
 * whole entry and never a half-applied edit.
 *
 * @example
 * ```typescript
 * let pin = PinEntry.empty(4);
 * pin = pin.append(7).append(2);
 * pin.asString();   // '72'
 * pin.isComplete(); // false
 * ```
 */
export class PinEntry extends ValueObject<ReadonlyArray<PinSlot>> {
  private constructor(private readonly slots: ReadonlyArray<PinSlot>) {
    super();
  }

  static empty(length: number = DEFAULT_PIN_LENGTH): PinEntry {
    Assert.that(length, 'PIN length').isInteger().isBetween(1, MAX_PIN_LENGTH);
    return new PinEntry(Array.from({ length }, () => null));
  }

  get length(): number {
    return this.slots.length;
  }

  get digits(): ReadonlyArray<PinSlot> {
    return this.slots;
  }

  get enteredCount(): number {
    return this.slots.filter((slot) => slot !== null).length;
  }

  /**
   * Fills the first empty slot. No-op when every slot is filled.
   */
  append(digit: number): PinEntry {
    Assert.that(digit, 'PIN digit').isInteger().isBetween(0, 9);
    const index = this.slots.indexOf(null);
    if (index === -1) return this;
    const next = [...this.slots];
    next[index] = digit;
    return new PinEntry(next);
  }

  /**
   * Empties the last filled slot. No-op when nothing is entered.
   */
  removeLast(): PinEntry {
    let index = -1;
    for (let i = this.slots.length - 1; i >= 0; i -= 1) {
      if (this.slots[i] !== null) {
        index = i;
        break;
      }
    }
    if (index === -1) return this;
    const next = [...this.slots];
    next[index] = null;
    return new PinEntry(next);
  }

  clear(): PinEntry {
    return this.isEmpty() ? this : PinEntry.empty(this.slots.length);
  }

  isComplete(): boolean {
    return this.slots.every((slot) => slot !== null);
  }

  isEmpty(): boolean {
    return this.slots.every((slot) => slot === null);
  }

  /**
   * Filled digits in slot order. While incomplete this is only the
   * digits entered so far.
   */
  asString(): string {
    return this.slots
      .filter((slot): slot is number => slot !== null)
      .join('');
  }

  equals(other: PinEntry): boolean {
    return (
      other.slots.length === this.slots.length &&
      other.slots.every((slot, i) => slot === this.slots[i])
    );
  }

  get value(): ReadonlyArray<PinSlot> {
    return this.slots;
  }
}
