import { describe, expect, it } from 'vitest';
import { decodeNdefMessage, encodeNdefMessage } from '../src/ndefCodec';
import type { TagMessage } from '../src/types';

const bytesOf = (text: string): number[] =>
  Array.from(new TextEncoder().encode(text));

describe('encodeNdefMessage', () => {
  it('frames a single URI record with prefix compression', () => {
    const bytes = encodeNdefMessage([{ kind: 'uri', uri: 'https://x.io' }]);
    expect(Array.from(bytes)).toEqual([
      0xd1, // MB | ME | SR | TNF well-known
      0x01, // type length
      0x05, // payload length
      0x55, // 'U'
      0x04, // https://
      ...bytesOf('x.io'),
    ]);
  });

  it('picks the longest matching URI prefix', () => {
    const bytes = encodeNdefMessage([
      { kind: 'uri', uri: 'https://www.example.com' },
    ]);
    expect(bytes[4]).toBe(0x02);
    expect(Array.from(bytes.slice(5))).toEqual(bytesOf('example.com'));
  });

  it('keeps the full URI when no prefix matches', () => {
    const bytes = encodeNdefMessage([{ kind: 'uri', uri: 'geo:1,2' }]);
    expect(bytes[4]).toBe(0x00);
    expect(Array.from(bytes.slice(5))).toEqual(bytesOf('geo:1,2'));
  });

  it('lays out a text record as status byte, language, text', () => {
    const bytes = encodeNdefMessage([
      { kind: 'text', language: 'en', text: 'Hi' },
    ]);
    expect(Array.from(bytes)).toEqual([
      0xd1,
      0x01,
      0x05,
      0x54, // 'T'
      0x02,
      ...bytesOf('en'),
      ...bytesOf('Hi'),
    ]);
  });

  it('flags only the first record MB and only the last ME', () => {
    const bytes = encodeNdefMessage([
      { kind: 'uri', uri: 'https://a.b' },
      { kind: 'external', typeName: 'a.b:c', payload: Uint8Array.of(1) },
    ]);
    // first record: header, type len, payload len, 'U', 0x04, 'a.b'
    expect(bytes[0]).toBe(0x91);
    const second = 4 + 4;
    expect(bytes[second]).toBe(0x54); // ME | SR | TNF external
    expect(bytes[second + 1]).toBe(5);
    expect(bytes[second + 2]).toBe(1);
  });

  it('uses the long form for payloads over 255 bytes', () => {
    const payload = new Uint8Array(300).fill(7);
    const bytes = encodeNdefMessage([
      { kind: 'external', typeName: 'a.b:c', payload },
    ]);
    expect(bytes[0]).toBe(0xc4); // MB | ME | TNF external, no SR
    expect(Array.from(bytes.slice(2, 6))).toEqual([0, 0, 0x01, 0x2c]);
    expect(bytes.length).toBe(6 + 5 + 300);
  });

  it('rejects an empty message and oversized language codes', () => {
    expect(() => encodeNdefMessage([])).toThrow(
      'NDEF message must contain at least one record'
    );
    expect(() =>
      encodeNdefMessage([
        { kind: 'text', language: 'x'.repeat(64), text: 'a' },
      ])
    ).toThrow('Text record language code exceeds 63 bytes');
  });
});

describe('decodeNdefMessage', () => {
  it('reads back every record kind in order', () => {
    const message: TagMessage = [
      { kind: 'uri', uri: 'https://www.example.com/connect/abc' },
      { kind: 'text', language: 'en', text: 'Sam Lee' },
      {
        kind: 'external',
        typeName: 'example.com:connect',
        payload: Uint8Array.of(1, 2, 3),
      },
    ];
    const decoded = decodeNdefMessage(encodeNdefMessage(message));
    expect(decoded).toEqual({ ok: true, value: message });
  });

  it('reads long-form records', () => {
    const payload = new Uint8Array(1000).fill(9);
    const decoded = decodeNdefMessage(
      encodeNdefMessage([{ kind: 'external', typeName: 'a.b:c', payload }])
    );
    expect(decoded.ok && decoded.value[0]).toEqual({
      kind: 'external',
      typeName: 'a.b:c',
      payload,
    });
  });

  it('skips an id field when IL is set', () => {
    const bytes = Uint8Array.of(
      0xd9, // MB | ME | SR | IL | TNF well-known
      0x01,
      0x02,
      0x01, // id length
      0x55,
      0x7f, // id byte
      0x03, // http://
      0x61
    );
    expect(decodeNdefMessage(bytes)).toEqual({
      ok: true,
      value: [{ kind: 'uri', uri: 'http://a' }],
    });
  });

  it('skips MIME, chunked and unknown-prefix records', () => {
    const mime = [0x92, 0x01, 0x01, 0x78, 0x00]; // MB | SR | TNF mime
    const chunked = [0x31, 0x01, 0x01, 0x55, 0x04]; // CF | SR | well-known
    const badPrefix = [0x11, 0x01, 0x01, 0x55, 0x99];
    const text = [0x51, 0x01, 0x03, 0x54, 0x00, ...bytesOf('ok')];
    const decoded = decodeNdefMessage(
      Uint8Array.from([...mime, ...chunked, ...badPrefix, ...text])
    );
    expect(decoded).toEqual({
      ok: true,
      value: [{ kind: 'text', language: '', text: 'ok' }],
    });
  });

  it('skips a text record whose language length overruns the payload', () => {
    const bytes = Uint8Array.of(0xd1, 0x01, 0x02, 0x54, 0x05, 0x61);
    expect(decodeNdefMessage(bytes)).toEqual({ ok: true, value: [] });
  });

  it('keeps records before a truncated frame', () => {
    const good = Array.from(
      encodeNdefMessage([{ kind: 'uri', uri: 'https://x.io' }])
    );
    good[0] = 0x91; // clear ME so parsing continues
    const truncated = [0x51, 0x01, 0x40, 0x54, 0x02];
    expect(decodeNdefMessage(Uint8Array.from([...good, ...truncated]))).toEqual(
      { ok: true, value: [{ kind: 'uri', uri: 'https://x.io' }] }
    );
  });

  it('fails on empty input or when no frame can be read', () => {
    expect(decodeNdefMessage(new Uint8Array())).toEqual({
      ok: false,
      error: 'invalid_tag_format',
    });
    expect(decodeNdefMessage(Uint8Array.of(0xd1, 0x01, 0x09, 0x55))).toEqual({
      ok: false,
      error: 'invalid_tag_format',
    });
  });
});
