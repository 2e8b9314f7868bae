import { MemberId, Timestamp } from '@tapconsent/domain';
import { z } from 'zod';
import { decodeNdefMessage, encodeNdefMessage } from './ndefCodec';
import {
  DEFAULT_TAG_PROTOCOL,
  TagRecordKinds,
  TagSessionErrorCodes,
  type ExternalRecord,
  type MemberTag,
  type TagDecodeResult,
  type TagMessage,
  type TagProtocol,
} from './types';

const externalPayloadV1 = z.object({
  memberId: z.string().refine((value) => value.trim().length > 0),
  timestamp: z.string().optional(),
  version: z.string().optional(),
});

export type MemberTagInput = Readonly<{
  memberId: string;
  displayName: string;
}>;

export type RecordCodecOptions = Readonly<{
  protocol?: TagProtocol;
  now?: () => Date;
}>;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const normalizeBaseUrl = (baseUrl: string): string =>
  baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;

export const toFallbackUrl = (
  memberId: string,
  protocol: TagProtocol = DEFAULT_TAG_PROTOCOL
): string =>
  `${normalizeBaseUrl(protocol.fallbackBaseUrl)}/${encodeURIComponent(memberId)}`;

/**
 * Builds the three-record member message: fallback URI, display name,
 * then the app-specific external record. Only the external record's
 * timestamp depends on the clock.
 */
export const buildMemberTagMessage = (
  input: MemberTagInput,
  options: RecordCodecOptions = {}
): TagMessage => {
  const protocol = options.protocol ?? DEFAULT_TAG_PROTOCOL;
  const memberId = MemberId.from(input.memberId).value;
  const now = options.now ?? (() => new Date());
  const external: ExternalRecord = {
    kind: TagRecordKinds.external,
    typeName: protocol.externalType,
    payload: encoder.encode(
      JSON.stringify({
        memberId,
        timestamp: Timestamp.fromDate(now()).toISOStringSeconds(),
        version: protocol.recordVersion,
      })
    ),
  };
  return [
    { kind: TagRecordKinds.uri, uri: toFallbackUrl(memberId, protocol) },
    {
      kind: TagRecordKinds.text,
      language: protocol.defaultLanguage,
      text: input.displayName,
    },
    external,
  ];
};

export const encodeMemberTag = (
  input: MemberTagInput,
  options: RecordCodecOptions = {}
): Uint8Array => encodeNdefMessage(buildMemberTagMessage(input, options));

const memberIdFromExternal = (
  record: ExternalRecord,
  protocol: TagProtocol
): string | null => {
  if (record.typeName !== protocol.externalType) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(record.payload));
  } catch {
    return null;
  }
  const result = externalPayloadV1.safeParse(parsed);
  return result.success ? result.data.memberId : null;
};

/**
 * Reads the path component following the first `connect` segment of a
 * URL, e.g. `https://host/connect/abc` yields `abc`.
 */
export const memberIdFromConnectUrl = (uri: string): string | null => {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return null;
  }
  const segments = url.pathname.split('/').filter((s) => s.length > 0);
  const index = segments.indexOf('connect');
  if (index === -1 || index + 1 >= segments.length) return null;
  let memberId: string;
  try {
    memberId = decodeURIComponent(segments[index + 1]);
  } catch {
    return null;
  }
  return memberId.trim().length > 0 ? memberId : null;
};

/**
 * Finds the member carried by a message. The protocol's external record
 * wins over a `connect` URI regardless of record order; the first
 * non-empty text record, if any, is the display name.
 */
export const extractMemberTag = (
  message: TagMessage,
  protocol: TagProtocol = DEFAULT_TAG_PROTOCOL
): TagDecodeResult<MemberTag> => {
  let memberId: string | null = null;
  for (const record of message) {
    if (record.kind !== TagRecordKinds.external) continue;
    memberId = memberIdFromExternal(record, protocol);
    if (memberId !== null) break;
  }
  if (memberId === null) {
    for (const record of message) {
      if (record.kind !== TagRecordKinds.uri) continue;
      memberId = memberIdFromConnectUrl(record.uri);
      if (memberId !== null) break;
    }
  }
  if (memberId === null) {
    return { ok: false, error: TagSessionErrorCodes.invalidTagFormat };
  }

  let displayName: string | null = null;
  for (const record of message) {
    if (record.kind === TagRecordKinds.text && record.text.length > 0) {
      displayName = record.text;
      break;
    }
  }
  return { ok: true, value: { memberId, displayName } };
};

export const readMemberTag = (
  bytes: Uint8Array,
  protocol: TagProtocol = DEFAULT_TAG_PROTOCOL
): TagDecodeResult<MemberTag> => {
  const decoded = decodeNdefMessage(bytes);
  if (!decoded.ok) return decoded;
  return extractMemberTag(decoded.value, protocol);
};
