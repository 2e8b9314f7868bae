import type { Unsubscribe } from '@tapconsent/domain';

export const TagRecordKinds = {
  uri: 'uri',
  text: 'text',
  external: 'external',
} as const;

export type TagRecordKind =
  (typeof TagRecordKinds)[keyof typeof TagRecordKinds];

export type UriRecord = Readonly<{
  kind: typeof TagRecordKinds.uri;
  uri: string;
}>;

export type TextRecord = Readonly<{
  kind: typeof TagRecordKinds.text;
  language: string;
  text: string;
}>;

export type ExternalRecord = Readonly<{
  kind: typeof TagRecordKinds.external;
  typeName: string;
  payload: Uint8Array;
}>;

export type TagRecord = UriRecord | TextRecord | ExternalRecord;

/**
 * Records in wire order.
 */
export type TagMessage = ReadonlyArray<TagRecord>;

export type TagProtocol = Readonly<{
  /** NFC external type, `domain:type`. */
  externalType: string;
  /** Web address written to the URI record; the member id is appended. */
  fallbackBaseUrl: string;
  recordVersion: string;
  defaultLanguage: string;
}>;

export const DEFAULT_TAG_PROTOCOL: TagProtocol = {
  externalType: 'tapconsent.app:connect',
  fallbackBaseUrl: 'https://tapconsent.app/connect',
  recordVersion: '1.0',
  defaultLanguage: 'en',
};

export type MemberTag = Readonly<{
  memberId: string;
  displayName: string | null;
}>;

export type TagDecodeResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; error: typeof TagSessionErrorCodes.invalidTagFormat }>;

export const TagModes = {
  read: 'read',
  write: 'write',
} as const;

export type TagMode = (typeof TagModes)[keyof typeof TagModes];

export const TagCapabilities = {
  notSupported: 'not_supported',
  readOnly: 'read_only',
  readWrite: 'read_write',
} as const;

export type TagCapability =
  (typeof TagCapabilities)[keyof typeof TagCapabilities];

export const TagSessionErrorCodes = {
  notAvailable: 'not_available',
  connectionFailed: 'connection_failed',
  capabilityQueryFailed: 'capability_query_failed',
  notNdefCompatible: 'not_ndef_compatible',
  readOnlyTag: 'read_only_tag',
  readFailed: 'read_failed',
  writeFailed: 'write_failed',
  emptyTag: 'empty_tag',
  invalidTagFormat: 'invalid_tag_format',
  multipleTags: 'multiple_tags',
  sessionInvalidated: 'session_invalidated',
} as const;

export type TagSessionErrorCode =
  (typeof TagSessionErrorCodes)[keyof typeof TagSessionErrorCodes];

export type TagSessionError = Readonly<{
  code: TagSessionErrorCode;
  message: string;
  context?: Readonly<Record<string, unknown>>;
}>;

export const TagOutcomeKinds = {
  success: 'success',
  failure: 'failure',
  cancelled: 'cancelled',
} as const;

export type TagSessionOutcome =
  | Readonly<{
      kind: typeof TagOutcomeKinds.success;
      mode: typeof TagModes.read;
      tag: MemberTag;
    }>
  | Readonly<{
      kind: typeof TagOutcomeKinds.success;
      mode: typeof TagModes.write;
    }>
  | Readonly<{ kind: typeof TagOutcomeKinds.failure; error: TagSessionError }>
  | Readonly<{ kind: typeof TagOutcomeKinds.cancelled }>;

export const TagSessionStatusKinds = {
  idle: 'idle',
  connecting: 'connecting',
  queryingCapability: 'querying_capability',
  readingData: 'reading_data',
  writingData: 'writing_data',
  finished: 'finished',
} as const;

export type TagSessionStatusKind =
  (typeof TagSessionStatusKinds)[keyof typeof TagSessionStatusKinds];

export type TagSessionStatus =
  | Readonly<{ kind: typeof TagSessionStatusKinds.idle }>
  | Readonly<{
      kind: typeof TagSessionStatusKinds.connecting;
      mode: TagMode;
      attempt: number;
    }>
  | Readonly<{
      kind: typeof TagSessionStatusKinds.queryingCapability;
      mode: TagMode;
    }>
  | Readonly<{ kind: typeof TagSessionStatusKinds.readingData }>
  | Readonly<{ kind: typeof TagSessionStatusKinds.writingData }>
  | Readonly<{
      kind: typeof TagSessionStatusKinds.finished;
      outcome: TagSessionOutcome;
    }>;

export type TagSessionRequest =
  | Readonly<{ mode: typeof TagModes.read }>
  | Readonly<{
      mode: typeof TagModes.write;
      memberId: string;
      displayName: string;
    }>;

/**
 * A single tag in the reader's field.
 */
export interface TagHandle {
  connect(): Promise<void>;
  queryCapability(): Promise<TagCapability>;
  /** Resolves with `null` when the tag holds no message. */
  readNdef(): Promise<Uint8Array | null>;
  writeNdef(bytes: Uint8Array): Promise<void>;
}

export const ReaderInvalidationKinds = {
  userCancelled: 'user_cancelled',
  error: 'error',
} as const;

export type ReaderInvalidation =
  | Readonly<{ kind: typeof ReaderInvalidationKinds.userCancelled }>
  | Readonly<{ kind: typeof ReaderInvalidationKinds.error; message: string }>;

/**
 * Hardware-agnostic proximity reader/writer. One instance backs one
 * physical scanning session at a time.
 */
export interface TagReaderPort {
  isAvailable(): boolean;
  begin(alertMessage: string): void;
  /** Resolves with every tag currently in the field (at least one). */
  detect(): Promise<ReadonlyArray<TagHandle>>;
  setAlertMessage(message: string): void;
  invalidate(errorMessage?: string): void;
  onInvalidate(listener: (event: ReaderInvalidation) => void): Unsubscribe;
}

export type TagSessionOptions = Readonly<{
  reader: TagReaderPort;
  protocol?: TagProtocol;
  now?: () => Date;
  /** Delay before polling again after several tags were presented. */
  ambiguousRetryMs?: number;
  /** Unlimited when omitted. */
  maxAmbiguousRetries?: number;
  onStatusChange?: (status: TagSessionStatus) => void;
}>;
