import uriPrefixes from './uriPrefixes.json';
import {
  TagRecordKinds,
  TagSessionErrorCodes,
  type TagDecodeResult,
  type TagMessage,
  type TagRecord,
} from './types';

const FLAG_MB = 0x80;
const FLAG_ME = 0x40;
const FLAG_CF = 0x20;
const FLAG_SR = 0x10;
const FLAG_IL = 0x08;
const TNF_MASK = 0x07;

const Tnf = {
  empty: 0x00,
  wellKnown: 0x01,
  mime: 0x02,
  absoluteUri: 0x03,
  external: 0x04,
  unknown: 0x05,
  unchanged: 0x06,
} as const;

const RTD_URI = 0x55; // 'U'
const RTD_TEXT = 0x54; // 'T'

const TEXT_LANGUAGE_LENGTH_MASK = 0x3f;
const MAX_SHORT_PAYLOAD = 0xff;
const MAX_TYPE_LENGTH = 0xff;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

type RawRecord = Readonly<{
  tnf: number;
  type: Uint8Array;
  payload: Uint8Array;
}>;

type Frame = RawRecord &
  Readonly<{
    chunked: boolean;
    last: boolean;
    next: number;
  }>;

const concatBytes = (parts: ReadonlyArray<Uint8Array>): Uint8Array => {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
};

const encodeUriPayload = (uri: string): Uint8Array => {
  let code = 0;
  for (let i = 1; i < uriPrefixes.length; i += 1) {
    const prefix = uriPrefixes[i];
    if (uri.startsWith(prefix) && prefix.length > uriPrefixes[code].length) {
      code = i;
    }
  }
  const rest = encoder.encode(uri.slice(uriPrefixes[code].length));
  return concatBytes([Uint8Array.of(code), rest]);
};

const encodeTextPayload = (language: string, text: string): Uint8Array => {
  const languageBytes = encoder.encode(language);
  if (languageBytes.length > TEXT_LANGUAGE_LENGTH_MASK) {
    throw new Error(
      `Text record language code exceeds ${TEXT_LANGUAGE_LENGTH_MASK} bytes`
    );
  }
  return concatBytes([
    Uint8Array.of(languageBytes.length),
    languageBytes,
    encoder.encode(text),
  ]);
};

const toRawRecord = (record: TagRecord): RawRecord => {
  switch (record.kind) {
    case TagRecordKinds.uri:
      return {
        tnf: Tnf.wellKnown,
        type: Uint8Array.of(RTD_URI),
        payload: encodeUriPayload(record.uri),
      };
    case TagRecordKinds.text:
      return {
        tnf: Tnf.wellKnown,
        type: Uint8Array.of(RTD_TEXT),
        payload: encodeTextPayload(record.language, record.text),
      };
    case TagRecordKinds.external: {
      const type = encoder.encode(record.typeName);
      if (type.length === 0) {
        throw new Error('External record type name must not be empty');
      }
      return { tnf: Tnf.external, type, payload: record.payload };
    }
  }
};

const frameRecord = (
  record: RawRecord,
  first: boolean,
  last: boolean
): Uint8Array => {
  if (record.type.length > MAX_TYPE_LENGTH) {
    throw new Error(`Record type exceeds ${MAX_TYPE_LENGTH} bytes`);
  }
  const short = record.payload.length <= MAX_SHORT_PAYLOAD;
  let header = record.tnf;
  if (first) header |= FLAG_MB;
  if (last) header |= FLAG_ME;
  if (short) header |= FLAG_SR;

  let payloadLength: Uint8Array;
  if (short) {
    payloadLength = Uint8Array.of(record.payload.length);
  } else {
    payloadLength = new Uint8Array(4);
    new DataView(payloadLength.buffer).setUint32(0, record.payload.length);
  }

  return concatBytes([
    Uint8Array.of(header, record.type.length),
    payloadLength,
    record.type,
    record.payload,
  ]);
};

/**
 * Serializes records into an NDEF message, first record flagged MB and
 * last flagged ME. Payloads up to 255 bytes use the short-record form.
 */
export const encodeNdefMessage = (message: TagMessage): Uint8Array => {
  if (message.length === 0) {
    throw new Error('NDEF message must contain at least one record');
  }
  const lastIndex = message.length - 1;
  return concatBytes(
    message.map((record, index) =>
      frameRecord(toRawRecord(record), index === 0, index === lastIndex)
    )
  );
};

const readFrame = (bytes: Uint8Array, offset: number): Frame | null => {
  let cursor = offset;
  if (cursor + 2 > bytes.length) return null;
  const header = bytes[cursor];
  const typeLength = bytes[cursor + 1];
  cursor += 2;

  let payloadLength: number;
  if (header & FLAG_SR) {
    if (cursor + 1 > bytes.length) return null;
    payloadLength = bytes[cursor];
    cursor += 1;
  } else {
    if (cursor + 4 > bytes.length) return null;
    payloadLength = new DataView(
      bytes.buffer,
      bytes.byteOffset + cursor,
      4
    ).getUint32(0);
    cursor += 4;
  }

  let idLength = 0;
  if (header & FLAG_IL) {
    if (cursor + 1 > bytes.length) return null;
    idLength = bytes[cursor];
    cursor += 1;
  }

  const end = cursor + typeLength + idLength + payloadLength;
  if (end > bytes.length) return null;

  const type = bytes.slice(cursor, cursor + typeLength);
  const payloadStart = cursor + typeLength + idLength;
  return {
    tnf: header & TNF_MASK,
    type,
    payload: bytes.slice(payloadStart, end),
    chunked: (header & FLAG_CF) !== 0,
    last: (header & FLAG_ME) !== 0,
    next: end,
  };
};

const decodeUriPayload = (payload: Uint8Array): string | null => {
  if (payload.length === 0) return null;
  const code = payload[0];
  if (code >= uriPrefixes.length) return null;
  return uriPrefixes[code] + decoder.decode(payload.subarray(1));
};

const decodeTextPayload = (
  payload: Uint8Array
): { language: string; text: string } | null => {
  if (payload.length === 0) return null;
  const languageLength = payload[0] & TEXT_LANGUAGE_LENGTH_MASK;
  const textStart = 1 + languageLength;
  if (textStart > payload.length) return null;
  return {
    language: decoder.decode(payload.subarray(1, textStart)),
    text: decoder.decode(payload.subarray(textStart)),
  };
};

const toTagRecord = (frame: Frame): TagRecord | null => {
  if (frame.chunked) return null;

  if (frame.tnf === Tnf.wellKnown && frame.type.length === 1) {
    if (frame.type[0] === RTD_URI) {
      const uri = decodeUriPayload(frame.payload);
      return uri === null ? null : { kind: TagRecordKinds.uri, uri };
    }
    if (frame.type[0] === RTD_TEXT) {
      const text = decodeTextPayload(frame.payload);
      return text === null ? null : { kind: TagRecordKinds.text, ...text };
    }
    return null;
  }

  if (frame.tnf === Tnf.external && frame.type.length > 0) {
    return {
      kind: TagRecordKinds.external,
      typeName: decoder.decode(frame.type),
      payload: frame.payload,
    };
  }

  return null;
};

/**
 * Parses an NDEF message. Records of kinds this protocol does not use,
 * and records whose payload cannot be interpreted, are skipped. A frame
 * running past the end of the buffer stops parsing; records before it
 * are kept. Fails only when no frame can be read at all.
 */
export const decodeNdefMessage = (
  bytes: Uint8Array
): TagDecodeResult<TagMessage> => {
  const records: TagRecord[] = [];
  let offset = 0;
  let frames = 0;

  while (offset < bytes.length) {
    const frame = readFrame(bytes, offset);
    if (!frame) break;
    frames += 1;
    offset = frame.next;
    const record = toTagRecord(frame);
    if (record) records.push(record);
    if (frame.last) break;
  }

  if (frames === 0) {
    return { ok: false, error: TagSessionErrorCodes.invalidTagFormat };
  }
  return { ok: true, value: records };
};
