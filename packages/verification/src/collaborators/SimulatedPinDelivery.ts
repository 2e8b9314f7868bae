import {
  MemberId,
  Timestamp,
  VerificationSession,
} from '@tapconsent/domain';
import type { PinDeliveryPort, PinVerificationResult } from '../types';

export const DEFAULT_SIMULATED_PIN = '1234';
export const DEFAULT_SESSION_TIMEOUT_SECONDS = 120;

export type SimulatedPinDeliveryOptions = Readonly<{
  pin?: string;
  sessionTimeoutSeconds?: number;
  sendDelayMs?: number;
  verifyDelayMs?: number;
  now?: () => Timestamp;
  createSessionId?: () => string;
}>;

const wait = (ms: number): Promise<void> =>
  ms <= 0
    ? Promise.resolve()
    : new Promise((resolve) => setTimeout(resolve, ms));

/**
 * In-process stand-in for the SMS service: no message is sent, every
 * session expects the same configured PIN.
 */
export class SimulatedPinDelivery implements PinDeliveryPort {
  private readonly pin: string;
  private readonly sessionTimeoutSeconds: number;
  private readonly sendDelayMs: number;
  private readonly verifyDelayMs: number;
  private readonly now: () => Timestamp;
  private readonly createSessionId: () => string;
  private readonly sessions = new Map<string, VerificationSession>();

  constructor(options: SimulatedPinDeliveryOptions = {}) {
    this.pin = options.pin ?? DEFAULT_SIMULATED_PIN;
    if (!/^\d+$/.test(this.pin)) {
      throw new Error('Simulated PIN must contain only digits');
    }
    this.sessionTimeoutSeconds =
      options.sessionTimeoutSeconds ?? DEFAULT_SESSION_TIMEOUT_SECONDS;
    this.sendDelayMs = options.sendDelayMs ?? 800;
    this.verifyDelayMs = options.verifyDelayMs ?? 500;
    this.now = options.now ?? (() => Timestamp.now());
    this.createSessionId =
      options.createSessionId ?? (() => crypto.randomUUID());
  }

  async sendPin(
    request: Readonly<{ sharerId: MemberId }>
  ): Promise<VerificationSession> {
    await wait(this.sendDelayMs);
    const createdAt = this.now();
    const session = VerificationSession.create({
      sessionId: this.createSessionId(),
      sharerId: request.sharerId,
      createdAt,
      expiresAt: createdAt.plusSeconds(this.sessionTimeoutSeconds),
      pinLength: this.pin.length,
      simulatedPin: this.pin,
    });
    this.pruneExpired();
    this.sessions.set(session.sessionId, session);
    return session;
  }

  async verifyPin(
    request: Readonly<{ sessionId: string; pin: string }>
  ): Promise<PinVerificationResult> {
    await wait(this.verifyDelayMs);
    const session = this.sessions.get(request.sessionId);
    if (!session) {
      return { verified: false, reason: 'Session not found or expired' };
    }
    if (session.isExpiredAt(this.now())) {
      this.sessions.delete(request.sessionId);
      return { verified: false, reason: 'Session expired' };
    }
    if (request.pin !== session.simulatedPin) {
      return { verified: false, reason: 'Incorrect PIN' };
    }
    this.sessions.delete(request.sessionId);
    return { verified: true, reason: null };
  }

  get openSessionCount(): number {
    return this.sessions.size;
  }

  private pruneExpired(): void {
    const now = this.now();
    for (const [sessionId, session] of this.sessions) {
      if (session.isExpiredAt(now)) this.sessions.delete(sessionId);
    }
  }
}
