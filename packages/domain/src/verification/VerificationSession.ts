import { Assert } from '../shared/Assert';
import { MemberId } from '../identity/MemberId';
import { Timestamp } from '../shared/vos/Timestamp';
import { MAX_PIN_LENGTH } from './PinEntry';

export type VerificationSessionProps = Readonly<{
  sessionId: string;
  sharerId: MemberId;
  createdAt: Timestamp;
  expiresAt: Timestamp;
  pinLength: number;
  /**
   * Present only for sessions issued by a local stand-in for the
   * PIN-delivery service. Never sent by a real backend.
   */
  simulatedPin?: string | null;
}>;

/**
 * One PIN challenge issued for a sharer. Lives from PIN delivery until
 * the flow succeeds, fails, expires or is reset.
 */
export class VerificationSession {
  readonly sessionId: string;
  readonly sharerId: MemberId;
  readonly createdAt: Timestamp;
  readonly expiresAt: Timestamp;
  readonly pinLength: number;
  readonly simulatedPin: string | null;

  private constructor(props: VerificationSessionProps) {
    this.sessionId = props.sessionId;
    this.sharerId = props.sharerId;
    this.createdAt = props.createdAt;
    this.expiresAt = props.expiresAt;
    this.pinLength = props.pinLength;
    this.simulatedPin = props.simulatedPin ?? null;
  }

  static create(props: VerificationSessionProps): VerificationSession {
    Assert.that(props.sessionId, 'sessionId').isNonEmpty();
    Assert.that(props.pinLength, 'pinLength')
      .isInteger()
      .isBetween(1, MAX_PIN_LENGTH);
    if (props.expiresAt.isBefore(props.createdAt)) {
      throw new Error('VerificationSession expiresAt precedes createdAt');
    }
    return new VerificationSession(props);
  }

  /**
   * Expired once `now` is strictly after `expiresAt`.
   */
  isExpiredAt(now: Timestamp): boolean {
    return now.isAfter(this.expiresAt);
  }

  remainingMs(now: Timestamp): number {
    return Math.max(0, this.expiresAt.value - now.value);
  }
}
