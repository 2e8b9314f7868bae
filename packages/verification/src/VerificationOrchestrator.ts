import {
  CancellationToken,
  DEFAULT_PIN_LENGTH,
  MemberId,
  PinEntry,
  ProfileLevels,
  Timestamp,
  VerificationSession,
  type MemberProfile,
  type Unsubscribe,
} from '@tapconsent/domain';
import {
  TagModes,
  TagOutcomeKinds,
  TagSessionErrorCodes,
} from '@tapconsent/tag-engine';
import { DEFAULT_SESSION_TIMEOUT_SECONDS } from './collaborators/SimulatedPinDelivery';
import { flowError } from './flowErrors';
import {
  SimulationActionKinds,
  buildSimulationSchedule,
  runSimulationSchedule,
  type SimulationAction,
} from './simulationSchedule';
import { createSimulationScript, type SimulationScript } from './simulationScript';
import { assertTransition } from './transitions';
import {
  ChallengeErrorReasons,
  FeedbackEvents,
  FlowStateKinds,
  ScanSources,
  type FeedbackEvent,
  type FeedbackPort,
  type FlowErrorReason,
  type PinDeliveryPort,
  type PinVerificationResult,
  type ProfilePort,
  type ScanSource,
  type TagScanner,
  type VerificationEvent,
  type VerificationFlowState,
  type VerificationListener,
} from './types';

export type VerificationOrchestratorOptions = Readonly<{
  pinDelivery: PinDeliveryPort;
  profiles: ProfilePort;
  /** Live scanning reports `not_available` when omitted. */
  createTagSession?: () => TagScanner;
  feedback?: FeedbackPort;
  now?: () => Timestamp;
  /** Width of the PIN shown before a session sets its own. */
  pinLength?: number;
  /**
   * Compare against a session's `simulatedPin` locally instead of asking
   * the PIN-delivery service. Sessions without one always go remote.
   */
  allowSimulatedPin?: boolean;
  simulation?: Partial<SimulationScript>;
  simulatedSessionTimeoutSeconds?: number;
}>;

type Flow = {
  readonly id: number;
  readonly source: ScanSource;
  readonly token: CancellationToken;
  tagSession: TagScanner | null;
  submitted: boolean;
};

const IDLE: VerificationFlowState = { kind: FlowStateKinds.idle };

/**
 * Drives one consent flow at a time:
 * idle → scanning → tag detected → PIN entry → verifying → verified →
 * profile revealed, with an error state reachable from every step up to
 * verified and `reset()` returning to idle from anywhere.
 *
 * All state is replaced wholesale and published through `subscribe`.
 * Starting a flow resets the previous one; results of work issued by a
 * flow that has since been reset are dropped.
 */
export class VerificationOrchestrator {
  private readonly pinDelivery: PinDeliveryPort;
  private readonly profiles: ProfilePort;
  private readonly createTagSession: (() => TagScanner) | null;
  private readonly feedback: FeedbackPort | null;
  private readonly now: () => Timestamp;
  private readonly allowSimulatedPin: boolean;
  private readonly script: SimulationScript;
  private readonly simulatedSessionTimeoutSeconds: number;
  private readonly listeners = new Set<VerificationListener>();

  private state: VerificationFlowState = IDLE;
  private pin: PinEntry;
  private session: VerificationSession | null = null;
  private profile: MemberProfile | null = null;
  private flow: Flow | null = null;
  private flowCounter = 0;

  constructor(options: VerificationOrchestratorOptions) {
    const pinLength = options.pinLength ?? DEFAULT_PIN_LENGTH;
    this.pinDelivery = options.pinDelivery;
    this.profiles = options.profiles;
    this.createTagSession = options.createTagSession ?? null;
    this.feedback = options.feedback ?? null;
    this.now = options.now ?? (() => Timestamp.now());
    this.allowSimulatedPin = options.allowSimulatedPin ?? false;
    this.script = createSimulationScript(options.simulation, pinLength);
    this.simulatedSessionTimeoutSeconds =
      options.simulatedSessionTimeoutSeconds ??
      DEFAULT_SESSION_TIMEOUT_SECONDS;
    this.pin = PinEntry.empty(pinLength);
  }

  getState(): VerificationFlowState {
    return this.state;
  }

  getPin(): PinEntry {
    return this.pin;
  }

  getSession(): VerificationSession | null {
    return this.session;
  }

  getProfile(): MemberProfile | null {
    return this.profile;
  }

  subscribe(listener: VerificationListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Reads a tag and requests a PIN for its owner. Resolves once the flow
   * waits for PIN entry, fails, or is reset.
   */
  async startLiveScan(): Promise<void> {
    const flow = this.beginFlow(ScanSources.live);
    if (!this.isCurrent(flow)) return;
    if (!this.createTagSession) {
      this.fail(TagSessionErrorCodes.notAvailable);
      return;
    }

    const tagSession = this.createTagSession();
    flow.tagSession = tagSession;
    const outcome = await tagSession.start({ mode: TagModes.read });
    if (!this.isCurrent(flow)) return;
    flow.tagSession = null;

    if (outcome.kind === TagOutcomeKinds.failure) {
      this.fail(outcome.error.code);
      return;
    }
    if (
      outcome.kind !== TagOutcomeKinds.success ||
      outcome.mode !== TagModes.read
    ) {
      // Cancelled at the reader: back to idle, no error.
      this.reset();
      return;
    }

    const sharerId = MemberId.from(outcome.tag.memberId);
    this.transition({
      kind: FlowStateKinds.tagDetected,
      sharerId,
      displayName: outcome.tag.displayName,
    });
    if (!this.isCurrent(flow)) return;
    this.signal(FeedbackEvents.tagDetected);
    await this.requestPin(flow, sharerId);
  }

  /**
   * Plays the scripted flow on its fixed timeline. Resolves when the
   * script ends or the flow is reset.
   */
  async simulate(): Promise<void> {
    const flow = this.beginFlow(ScanSources.simulated);
    await runSimulationSchedule(
      buildSimulationSchedule(this.script.digits),
      (action) => this.performSimulated(flow, action),
      flow.token
    );
  }

  /**
   * Cancels in-flight work and returns to idle. Always permitted.
   */
  reset(): void {
    const flow = this.flow;
    this.flow = null;
    if (flow) {
      flow.token.cancel();
      flow.tagSession?.cancel();
    }

    this.session = null;
    this.profile = null;
    const cleared = this.pin.clear();
    const pinChanged = cleared !== this.pin;
    this.pin = cleared;
    if (this.state.kind !== FlowStateKinds.idle) {
      this.transition(IDLE);
    }
    if (pinChanged) this.emitPin();
  }

  /**
   * Accepted only while a live flow waits for PIN entry. Completing the
   * PIN submits it; the returned promise settles with that verification.
   */
  async enterDigit(digit: number): Promise<void> {
    const flow = this.manualEntryFlow();
    if (!flow) return;
    const next = this.pin.append(digit);
    if (next === this.pin) return;
    this.setPin(next);
    if (!this.isCurrent(flow)) return;
    this.signal(FeedbackEvents.pinDigitEntered);

    if (next.isComplete() && !flow.submitted) {
      flow.submitted = true;
      await this.submitPin(flow);
    }
  }

  removeLastDigit(): void {
    if (!this.manualEntryFlow()) return;
    this.setPin(this.pin.removeLast());
  }

  clearPin(): void {
    if (!this.manualEntryFlow()) return;
    this.setPin(this.pin.clear());
  }

  private manualEntryFlow(): Flow | null {
    const flow = this.flow;
    if (
      !flow ||
      flow.source !== ScanSources.live ||
      this.state.kind !== FlowStateKinds.pinEntry
    ) {
      return null;
    }
    return flow;
  }

  private beginFlow(source: ScanSource): Flow {
    this.reset();
    this.flowCounter += 1;
    const flow: Flow = {
      id: this.flowCounter,
      source,
      token: new CancellationToken(),
      tagSession: null,
      submitted: false,
    };
    this.flow = flow;
    this.transition({ kind: FlowStateKinds.scanning, source });
    return flow;
  }

  private async requestPin(flow: Flow, sharerId: MemberId): Promise<void> {
    let session: VerificationSession;
    try {
      session = await this.pinDelivery.sendPin({ sharerId });
    } catch (error) {
      this.collaboratorFailed(flow, 'PIN delivery failed', error);
      return;
    }
    if (!this.isCurrent(flow)) return;

    this.session = session;
    this.pin = PinEntry.empty(session.pinLength);
    this.transition({ kind: FlowStateKinds.pinEntry, sharerId });
    if (!this.isCurrent(flow)) return;
    this.emitPin();
  }

  private async submitPin(flow: Flow): Promise<void> {
    const session = this.requireSession();
    const pin = this.pin.asString();
    this.transition({
      kind: FlowStateKinds.verifying,
      sharerId: session.sharerId,
    });
    if (!this.isCurrent(flow)) return;

    if (session.isExpiredAt(this.now())) {
      this.rejectPin(ChallengeErrorReasons.pinExpired);
      return;
    }

    let result: PinVerificationResult;
    if (this.allowSimulatedPin && session.simulatedPin !== null) {
      result = { verified: pin === session.simulatedPin, reason: null };
    } else {
      try {
        result = await this.pinDelivery.verifyPin({
          sessionId: session.sessionId,
          pin,
        });
      } catch (error) {
        this.collaboratorFailed(flow, 'PIN verification failed', error);
        return;
      }
      if (!this.isCurrent(flow)) return;
    }

    if (!result.verified) {
      this.rejectPin(ChallengeErrorReasons.pinIncorrect);
      return;
    }

    this.signal(FeedbackEvents.pinCorrect);
    this.transition({
      kind: FlowStateKinds.verified,
      sharerId: session.sharerId,
    });
    if (!this.isCurrent(flow)) return;
    await this.revealProfile(flow, session);
  }

  private async revealProfile(
    flow: Flow,
    session: VerificationSession
  ): Promise<void> {
    let profile: MemberProfile;
    try {
      profile = await this.profiles.fetchProfile({
        memberId: session.sharerId,
        level: ProfileLevels.full,
        sessionId: session.sessionId,
      });
    } catch (error) {
      this.collaboratorFailed(flow, 'profile fetch failed', error);
      return;
    }
    if (!this.isCurrent(flow)) return;
    this.showProfile(flow, profile);
  }

  private performSimulated(flow: Flow, action: SimulationAction): boolean {
    if (!this.isCurrent(flow)) return false;
    const script = this.script;

    switch (action.kind) {
      case SimulationActionKinds.detectTag:
        this.transition({
          kind: FlowStateKinds.tagDetected,
          sharerId: script.sharerId,
          displayName: script.displayName,
        });
        if (!this.isCurrent(flow)) return false;
        this.signal(FeedbackEvents.tagDetected);
        return true;

      case SimulationActionKinds.openPinEntry: {
        const createdAt = this.now();
        this.session = VerificationSession.create({
          sessionId: `simulated-${flow.id}`,
          sharerId: script.sharerId,
          createdAt,
          expiresAt: createdAt.plusSeconds(this.simulatedSessionTimeoutSeconds),
          pinLength: script.digits.length,
          simulatedPin: script.pin,
        });
        this.pin = PinEntry.empty(script.digits.length);
        this.transition({
          kind: FlowStateKinds.pinEntry,
          sharerId: script.sharerId,
        });
        if (!this.isCurrent(flow)) return false;
        this.emitPin();
        return this.isCurrent(flow);
      }

      case SimulationActionKinds.enterDigit:
        this.setPin(this.pin.append(action.digit));
        if (!this.isCurrent(flow)) return false;
        this.signal(FeedbackEvents.pinDigitEntered);
        return true;

      case SimulationActionKinds.beginVerifying:
        this.transition({
          kind: FlowStateKinds.verifying,
          sharerId: script.sharerId,
        });
        return this.isCurrent(flow);

      case SimulationActionKinds.completeVerification: {
        const session = this.requireSession();
        if (session.isExpiredAt(this.now())) {
          this.rejectPin(ChallengeErrorReasons.pinExpired);
          return false;
        }
        if (this.pin.asString() !== script.pin) {
          this.rejectPin(ChallengeErrorReasons.pinIncorrect);
          return false;
        }
        this.signal(FeedbackEvents.pinCorrect);
        this.transition({
          kind: FlowStateKinds.verified,
          sharerId: script.sharerId,
        });
        return this.isCurrent(flow);
      }

      case SimulationActionKinds.revealProfile:
        this.showProfile(flow, script.profile);
        return true;
    }
  }

  private showProfile(flow: Flow, profile: MemberProfile): void {
    this.session = null;
    this.profile = profile;
    this.transition({ kind: FlowStateKinds.profileRevealed, profile });
    if (!this.isCurrent(flow)) return;
    this.signal(FeedbackEvents.profileRevealed);
  }

  private rejectPin(reason: FlowErrorReason): void {
    this.signal(FeedbackEvents.pinIncorrect);
    this.fail(reason);
  }

  private collaboratorFailed(flow: Flow, what: string, error: unknown): void {
    if (!this.isCurrent(flow)) {
      console.warn(
        `[VerificationOrchestrator] ${what} after reset, ignoring`,
        error
      );
      return;
    }
    console.error(`[VerificationOrchestrator] ${what}`, error);
    this.fail(ChallengeErrorReasons.networkError);
  }

  /**
   * Enters the error state. The session and any entered digits are
   * dropped; the flow stays current until reset.
   */
  private fail(reason: FlowErrorReason): void {
    this.session = null;
    const cleared = this.pin.clear();
    const pinChanged = cleared !== this.pin;
    this.pin = cleared;
    this.transition({ kind: FlowStateKinds.error, error: flowError(reason) });
    // A listener may have reset the flow already.
    if (pinChanged && this.state.kind === FlowStateKinds.error) this.emitPin();
  }

  private requireSession(): VerificationSession {
    if (!this.session) {
      throw new Error(`No verification session in state ${this.state.kind}`);
    }
    return this.session;
  }

  private isCurrent(flow: Flow): boolean {
    return this.flow === flow && !flow.token.isCancelled;
  }

  private setPin(next: PinEntry): void {
    if (next === this.pin) return;
    this.pin = next;
    this.emitPin();
  }

  private transition(next: VerificationFlowState): void {
    assertTransition(this.state.kind, next.kind);
    const previous = this.state;
    this.state = next;
    this.emit({ type: 'state', state: next, previous });
  }

  private emitPin(): void {
    this.emit({ type: 'pin', pin: this.pin });
  }

  private emit(event: VerificationEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        console.error('[VerificationOrchestrator] listener threw', error);
      }
    }
  }

  private signal(event: FeedbackEvent): void {
    try {
      this.feedback?.signal(event);
    } catch (error) {
      console.warn('[VerificationOrchestrator] feedback failed', {
        event,
        error,
      });
    }
  }
}
