import { CancellationToken, type Unsubscribe } from '@tapconsent/domain';
import { encodeMemberTag, readMemberTag } from './recordCodec';
import {
  DEFAULT_TAG_PROTOCOL,
  ReaderInvalidationKinds,
  TagCapabilities,
  TagModes,
  TagOutcomeKinds,
  TagSessionErrorCodes,
  TagSessionStatusKinds,
  type ReaderInvalidation,
  type TagHandle,
  type TagProtocol,
  type TagReaderPort,
  type TagSessionError,
  type TagSessionErrorCode,
  type TagSessionOptions,
  type TagSessionOutcome,
  type TagSessionRequest,
  type TagSessionStatus,
} from './types';

const DEFAULT_AMBIGUOUS_RETRY_MS = 500;

export const tagSessionErrorMessages: Readonly<
  Record<TagSessionErrorCode, string>
> = {
  not_available: 'Tag reading is not available on this device.',
  connection_failed: 'Could not connect to the tag.',
  capability_query_failed: 'Could not read the tag status.',
  not_ndef_compatible: 'This tag is not NDEF compatible.',
  read_only_tag: 'This tag is read-only.',
  read_failed: 'Failed to read the tag.',
  write_failed: 'Failed to write the tag.',
  empty_tag: 'No data found on the tag.',
  invalid_tag_format: 'This is not a valid member tag.',
  multiple_tags: 'More than one tag was presented.',
  session_invalidated: 'The reader session ended unexpectedly.',
};

const AlertMessages = {
  read: 'Hold your device near a member card or bracelet.',
  write: 'Hold your device near the card to write your identity.',
  ambiguous: 'More than one tag detected. Present a single tag.',
  readSuccess: 'Member detected.',
  writeSuccess: 'Identity written.',
} as const;

/**
 * Settled result of one hardware call. `cancelled` means the session was
 * cancelled while the call was pending; the call's own result is dropped.
 */
type StepResult<T> =
  | Readonly<{ kind: 'ok'; value: T }>
  | Readonly<{ kind: 'failed'; error: unknown }>
  | Readonly<{ kind: 'cancelled' }>;

type Halt = Readonly<{ kind: 'halt'; outcome: TagSessionOutcome }>;

type Connected = Readonly<{ kind: 'connected'; tag: TagHandle }>;

const describeError = (error: unknown): Readonly<Record<string, unknown>> =>
  error instanceof Error ? { message: error.message } : { error };

export const createTagSessionError = (
  code: TagSessionErrorCode,
  context?: Readonly<Record<string, unknown>>
): TagSessionError => ({
  code,
  message: tagSessionErrorMessages[code],
  context,
});

const failure = (
  code: TagSessionErrorCode,
  context?: Readonly<Record<string, unknown>>
): Halt => ({
  kind: 'halt',
  outcome: {
    kind: TagOutcomeKinds.failure,
    error: createTagSessionError(code, context),
  },
});

const CANCELLED: Halt = {
  kind: 'halt',
  outcome: { kind: TagOutcomeKinds.cancelled },
};

/**
 * One physical read or write interaction:
 * idle → connecting → querying capability → reading | writing → finished.
 *
 * Single-use. Every hardware call is a suspension point after which a
 * cancellation, whether requested by the caller or signalled by the
 * reader, ends the session in `cancelled`.
 */
export class TagSession {
  private readonly reader: TagReaderPort;
  private readonly protocol: TagProtocol;
  private readonly now: () => Date;
  private readonly ambiguousRetryMs: number;
  private readonly maxAmbiguousRetries: number;
  private readonly onStatusChange?: (status: TagSessionStatus) => void;
  private status: TagSessionStatus = { kind: TagSessionStatusKinds.idle };
  private readonly token = new CancellationToken();
  private readerInvalidation: ReaderInvalidation | null = null;
  private invalidateUnsubscribe: Unsubscribe | null = null;

  constructor(options: TagSessionOptions) {
    this.reader = options.reader;
    this.protocol = options.protocol ?? DEFAULT_TAG_PROTOCOL;
    this.now = options.now ?? (() => new Date());
    this.ambiguousRetryMs =
      options.ambiguousRetryMs ?? DEFAULT_AMBIGUOUS_RETRY_MS;
    this.maxAmbiguousRetries =
      options.maxAmbiguousRetries ?? Number.POSITIVE_INFINITY;
    this.onStatusChange = options.onStatusChange;
  }

  getStatus(): TagSessionStatus {
    return this.status;
  }

  /**
   * Runs the interaction to completion. Never rejects: every hardware or
   * format error resolves as a `failure` outcome.
   */
  async start(request: TagSessionRequest): Promise<TagSessionOutcome> {
    if (this.status.kind !== TagSessionStatusKinds.idle) {
      throw new Error(`Tag session cannot start from ${this.status.kind}`);
    }

    if (!this.reader.isAvailable()) {
      const { outcome } = failure(TagSessionErrorCodes.notAvailable);
      this.setStatus({ kind: TagSessionStatusKinds.finished, outcome });
      return outcome;
    }

    this.invalidateUnsubscribe = this.reader.onInvalidate((event) =>
      this.handleReaderInvalidation(event)
    );
    this.reader.begin(
      request.mode === TagModes.write ? AlertMessages.write : AlertMessages.read
    );

    const result = await this.run(request);
    return this.finish(result.outcome);
  }

  /**
   * Ends the session from any non-terminal state. Not an error.
   */
  cancel(): void {
    if (this.status.kind === TagSessionStatusKinds.finished) return;
    this.token.cancel();
  }

  private async run(request: TagSessionRequest): Promise<Halt> {
    const connection = await this.connect(request);
    if (connection.kind === 'halt') return connection;
    const handle = connection.tag;

    this.setStatus({
      kind: TagSessionStatusKinds.queryingCapability,
      mode: request.mode,
    });
    const capability = await this.step(() => handle.queryCapability());
    if (capability.kind === 'cancelled') return this.cancelledHalt();
    if (capability.kind === 'failed') {
      return failure(
        TagSessionErrorCodes.capabilityQueryFailed,
        describeError(capability.error)
      );
    }

    if (capability.value === TagCapabilities.notSupported) {
      return failure(TagSessionErrorCodes.notNdefCompatible);
    }

    if (request.mode === TagModes.write) {
      if (capability.value === TagCapabilities.readOnly) {
        return failure(TagSessionErrorCodes.readOnlyTag);
      }
      return this.writeData(handle, request.memberId, request.displayName);
    }

    return this.readData(handle);
  }

  private async connect(
    request: TagSessionRequest
  ): Promise<Connected | Halt> {
    let ambiguousRetries = 0;
    for (;;) {
      this.setStatus({
        kind: TagSessionStatusKinds.connecting,
        mode: request.mode,
        attempt: ambiguousRetries + 1,
      });

      const detected = await this.step(() => this.reader.detect());
      if (detected.kind === 'cancelled') return this.cancelledHalt();
      if (detected.kind === 'failed') {
        return failure(
          TagSessionErrorCodes.connectionFailed,
          describeError(detected.error)
        );
      }

      const tags = detected.value;
      if (tags.length === 0) {
        return failure(TagSessionErrorCodes.connectionFailed, {
          message: 'Reader reported no tags',
        });
      }

      if (tags.length > 1) {
        if (ambiguousRetries >= this.maxAmbiguousRetries) {
          return failure(TagSessionErrorCodes.multipleTags, {
            count: tags.length,
          });
        }
        ambiguousRetries += 1;
        console.warn('[TagSession] multiple tags detected, polling again', {
          count: tags.length,
          retry: ambiguousRetries,
        });
        this.reader.setAlertMessage(AlertMessages.ambiguous);
        const waited = await this.token.sleep(this.ambiguousRetryMs);
        if (!waited) return this.cancelledHalt();
        continue;
      }

      const tag = tags[0];
      const connected = await this.step(() => tag.connect());
      if (connected.kind === 'cancelled') return this.cancelledHalt();
      if (connected.kind === 'failed') {
        return failure(
          TagSessionErrorCodes.connectionFailed,
          describeError(connected.error)
        );
      }
      return { kind: 'connected', tag };
    }
  }

  private async readData(handle: TagHandle): Promise<Halt> {
    this.setStatus({ kind: TagSessionStatusKinds.readingData });
    const read = await this.step(() => handle.readNdef());
    if (read.kind === 'cancelled') return this.cancelledHalt();
    if (read.kind === 'failed') {
      return failure(TagSessionErrorCodes.readFailed, describeError(read.error));
    }
    if (read.value === null || read.value.length === 0) {
      return failure(TagSessionErrorCodes.emptyTag);
    }

    const decoded = readMemberTag(read.value, this.protocol);
    if (!decoded.ok) {
      return failure(TagSessionErrorCodes.invalidTagFormat);
    }
    this.reader.setAlertMessage(AlertMessages.readSuccess);
    return {
      kind: 'halt',
      outcome: {
        kind: TagOutcomeKinds.success,
        mode: TagModes.read,
        tag: decoded.value,
      },
    };
  }

  private async writeData(
    handle: TagHandle,
    memberId: string,
    displayName: string
  ): Promise<Halt> {
    this.setStatus({ kind: TagSessionStatusKinds.writingData });
    let bytes: Uint8Array;
    try {
      bytes = encodeMemberTag(
        { memberId, displayName },
        { protocol: this.protocol, now: this.now }
      );
    } catch (error) {
      return failure(TagSessionErrorCodes.writeFailed, describeError(error));
    }

    const written = await this.step(() => handle.writeNdef(bytes));
    if (written.kind === 'cancelled') return this.cancelledHalt();
    if (written.kind === 'failed') {
      return failure(
        TagSessionErrorCodes.writeFailed,
        describeError(written.error)
      );
    }
    this.reader.setAlertMessage(AlertMessages.writeSuccess);
    return {
      kind: 'halt',
      outcome: { kind: TagOutcomeKinds.success, mode: TagModes.write },
    };
  }

  /**
   * Runs one hardware call, racing it against cancellation. The call is
   * settled into a result first so a late rejection is never unhandled.
   */
  private async step<T>(op: () => Promise<T>): Promise<StepResult<T>> {
    if (this.token.isCancelled) return { kind: 'cancelled' };
    const settled: Promise<StepResult<T>> = Promise.resolve()
      .then(op)
      .then(
        (value) => ({ kind: 'ok' as const, value }),
        (error: unknown) => ({ kind: 'failed' as const, error })
      );
    return (await this.token.race(settled)) ?? { kind: 'cancelled' };
  }

  private cancelledHalt(): Halt {
    const invalidation = this.readerInvalidation;
    if (invalidation?.kind === ReaderInvalidationKinds.error) {
      return failure(TagSessionErrorCodes.sessionInvalidated, {
        message: invalidation.message,
      });
    }
    return CANCELLED;
  }

  private handleReaderInvalidation(event: ReaderInvalidation): void {
    if (this.status.kind === TagSessionStatusKinds.finished) return;
    this.readerInvalidation = event;
    this.cancel();
  }

  private finish(outcome: TagSessionOutcome): TagSessionOutcome {
    this.invalidateUnsubscribe?.();
    this.invalidateUnsubscribe = null;
    if (this.readerInvalidation === null) {
      if (outcome.kind === TagOutcomeKinds.failure) {
        this.reader.invalidate(outcome.error.message);
      } else {
        this.reader.invalidate();
      }
    }
    this.setStatus({ kind: TagSessionStatusKinds.finished, outcome });
    return outcome;
  }

  private setStatus(next: TagSessionStatus): void {
    this.status = next;
    try {
      this.onStatusChange?.(next);
    } catch (error) {
      console.error('[TagSession] status listener threw', error);
    }
  }
}
