import type {
  MemberId,
  MemberProfile,
  PinEntry,
  ProfileLevel,
  VerificationSession,
} from '@tapconsent/domain';
import type {
  TagSessionErrorCode,
  TagSessionOutcome,
  TagSessionRequest,
} from '@tapconsent/tag-engine';

export const FlowStateKinds = {
  idle: 'idle',
  scanning: 'scanning',
  tagDetected: 'tag_detected',
  pinEntry: 'pin_entry',
  verifying: 'verifying',
  verified: 'verified',
  profileRevealed: 'profile_revealed',
  error: 'error',
} as const;

export type FlowStateKind =
  (typeof FlowStateKinds)[keyof typeof FlowStateKinds];

export const ScanSources = {
  live: 'live',
  simulated: 'simulated',
} as const;

export type ScanSource = (typeof ScanSources)[keyof typeof ScanSources];

export const ChallengeErrorReasons = {
  pinIncorrect: 'pin_incorrect',
  pinExpired: 'pin_expired',
  networkError: 'network_error',
} as const;

/**
 * Tag failures keep their tag-session code; challenge and collaborator
 * failures have their own.
 */
export type FlowErrorReason =
  | TagSessionErrorCode
  | (typeof ChallengeErrorReasons)[keyof typeof ChallengeErrorReasons];

export type FlowError = Readonly<{
  reason: FlowErrorReason;
  message: string;
}>;

export type VerificationFlowState =
  | Readonly<{ kind: typeof FlowStateKinds.idle }>
  | Readonly<{ kind: typeof FlowStateKinds.scanning; source: ScanSource }>
  | Readonly<{
      kind: typeof FlowStateKinds.tagDetected;
      sharerId: MemberId;
      displayName: string | null;
    }>
  | Readonly<{ kind: typeof FlowStateKinds.pinEntry; sharerId: MemberId }>
  | Readonly<{ kind: typeof FlowStateKinds.verifying; sharerId: MemberId }>
  | Readonly<{ kind: typeof FlowStateKinds.verified; sharerId: MemberId }>
  | Readonly<{
      kind: typeof FlowStateKinds.profileRevealed;
      profile: MemberProfile;
    }>
  | Readonly<{ kind: typeof FlowStateKinds.error; error: FlowError }>;

export type VerificationEvent =
  | Readonly<{
      type: 'state';
      state: VerificationFlowState;
      previous: VerificationFlowState;
    }>
  | Readonly<{ type: 'pin'; pin: PinEntry }>;

export type PinVerificationResult = Readonly<{
  verified: boolean;
  reason: string | null;
}>;

/**
 * Delivers a one-time PIN to the sharer and checks the receiver's entry.
 */
export interface PinDeliveryPort {
  sendPin(request: Readonly<{ sharerId: MemberId }>): Promise<VerificationSession>;
  verifyPin(
    request: Readonly<{ sessionId: string; pin: string }>
  ): Promise<PinVerificationResult>;
}

export type ProfileRequest = Readonly<{
  memberId: MemberId;
  level: ProfileLevel;
  sessionId?: string;
}>;

export interface ProfilePort {
  fetchProfile(request: ProfileRequest): Promise<MemberProfile>;
}

export const FeedbackEvents = {
  tagDetected: 'tag-detected',
  pinDigitEntered: 'pin-digit-entered',
  pinCorrect: 'pin-correct',
  pinIncorrect: 'pin-incorrect',
  profileRevealed: 'profile-revealed',
} as const;

export type FeedbackEvent =
  (typeof FeedbackEvents)[keyof typeof FeedbackEvents];

/**
 * Haptic or audible cue sink. Fire-and-forget.
 */
export interface FeedbackPort {
  signal(event: FeedbackEvent): void;
}

/**
 * The part of a tag session the orchestrator drives.
 */
export interface TagScanner {
  start(request: TagSessionRequest): Promise<TagSessionOutcome>;
  cancel(): void;
}

export type VerificationListener = (event: VerificationEvent) => void;
