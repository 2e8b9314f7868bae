import { describe, expect, it } from 'vitest';
import { encodeNdefMessage } from '../src/ndefCodec';
import {
  buildMemberTagMessage,
  encodeMemberTag,
  extractMemberTag,
  memberIdFromConnectUrl,
  readMemberTag,
  toFallbackUrl,
} from '../src/recordCodec';
import { DEFAULT_TAG_PROTOCOL, type TagMessage } from '../src/types';

const fixedNow = () => new Date('2026-03-04T05:06:07.890Z');

const externalRecord = (json: string, typeName = 'tapconsent.app:connect') =>
  ({
    kind: 'external',
    typeName,
    payload: new TextEncoder().encode(json),
  }) as const;

describe('buildMemberTagMessage', () => {
  it('produces URI, text and external records in that order', () => {
    const message = buildMemberTagMessage(
      { memberId: 'member_001', displayName: 'Sam Lee' },
      { now: fixedNow }
    );
    expect(message).toHaveLength(3);
    expect(message[0]).toEqual({
      kind: 'uri',
      uri: 'https://tapconsent.app/connect/member_001',
    });
    expect(message[1]).toEqual({
      kind: 'text',
      language: 'en',
      text: 'Sam Lee',
    });
    const external = message[2];
    expect(external.kind).toBe('external');
    if (external.kind !== 'external') return;
    expect(external.typeName).toBe('tapconsent.app:connect');
    expect(new TextDecoder().decode(external.payload)).toBe(
      '{"memberId":"member_001","timestamp":"2026-03-04T05:06:07Z","version":"1.0"}'
    );
  });

  it('honours a custom protocol', () => {
    const message = buildMemberTagMessage(
      { memberId: 'm1', displayName: 'A' },
      {
        now: fixedNow,
        protocol: {
          externalType: 'example.org:tap',
          fallbackBaseUrl: 'https://example.org/connect/',
          recordVersion: '2.0',
          defaultLanguage: 'fr',
        },
      }
    );
    expect(message[0]).toEqual({
      kind: 'uri',
      uri: 'https://example.org/connect/m1',
    });
    expect(message[1]).toEqual({ kind: 'text', language: 'fr', text: 'A' });
    expect(message[2].kind === 'external' && message[2].typeName).toBe(
      'example.org:tap'
    );
  });

  it('rejects an empty member id', () => {
    expect(() =>
      buildMemberTagMessage({ memberId: '', displayName: 'A' })
    ).toThrow('MemberId must be a non-empty string');
  });

  it('is byte-identical for the same input and clock', () => {
    const a = encodeMemberTag(
      { memberId: 'member_001', displayName: 'Sam' },
      { now: fixedNow }
    );
    const b = encodeMemberTag(
      { memberId: 'member_001', displayName: 'Sam' },
      { now: fixedNow }
    );
    expect(Array.from(a)).toEqual(Array.from(b));
  });
});

describe('readMemberTag', () => {
  it('recovers member id and display name from an encoded tag', () => {
    const bytes = encodeMemberTag({
      memberId: 'member/ä 42',
      displayName: 'Zoë Ortiz',
    });
    expect(readMemberTag(bytes)).toEqual({
      ok: true,
      value: { memberId: 'member/ä 42', displayName: 'Zoë Ortiz' },
    });
  });

  it('falls back to the connect URI when no external record exists', () => {
    const bytes = encodeNdefMessage([
      { kind: 'uri', uri: 'https://example.com/connect/XYZ' },
    ]);
    expect(readMemberTag(bytes)).toEqual({
      ok: true,
      value: { memberId: 'XYZ', displayName: null },
    });
  });

  it('prefers the external record over a differing URI', () => {
    const bytes = encodeNdefMessage([
      { kind: 'uri', uri: 'https://example.com/connect/from-uri' },
      externalRecord('{"memberId":"from-external"}'),
    ]);
    expect(readMemberTag(bytes)).toEqual({
      ok: true,
      value: { memberId: 'from-external', displayName: null },
    });
  });

  it('fails when neither an external record nor a connect URI exists', () => {
    const bytes = encodeNdefMessage([
      { kind: 'uri', uri: 'https://example.com/profile/XYZ' },
      { kind: 'text', language: 'en', text: 'Sam' },
    ]);
    expect(readMemberTag(bytes)).toEqual({
      ok: false,
      error: 'invalid_tag_format',
    });
  });

  it('fails on bytes that are not an NDEF message', () => {
    expect(readMemberTag(Uint8Array.of(0xff))).toEqual({
      ok: false,
      error: 'invalid_tag_format',
    });
  });
});

describe('extractMemberTag', () => {
  it('skips malformed external payloads in favour of the next candidate', () => {
    const message: TagMessage = [
      externalRecord('{not json'),
      externalRecord('{"memberId":""}'),
      externalRecord('{"memberId":"ignored"}', 'other.app:connect'),
      { kind: 'uri', uri: 'https://example.com/connect' },
      { kind: 'uri', uri: 'https://example.com/connect/second-uri' },
    ];
    expect(extractMemberTag(message)).toEqual({
      ok: true,
      value: { memberId: 'second-uri', displayName: null },
    });
  });

  it('takes the first external record that yields an id', () => {
    const message: TagMessage = [
      externalRecord('{"memberId":"first","version":"1.0"}'),
      externalRecord('{"memberId":"second"}'),
    ];
    expect(extractMemberTag(message)).toEqual({
      ok: true,
      value: { memberId: 'first', displayName: null },
    });
  });

  it('uses the first non-empty text record as display name', () => {
    const message: TagMessage = [
      { kind: 'text', language: 'en', text: '' },
      { kind: 'text', language: 'en', text: 'Sam' },
      { kind: 'uri', uri: 'https://example.com/connect/m1' },
    ];
    expect(extractMemberTag(message)).toEqual({
      ok: true,
      value: { memberId: 'm1', displayName: 'Sam' },
    });
  });

  it('matches the external type of the given protocol', () => {
    const message: TagMessage = [
      externalRecord('{"memberId":"m1"}', 'example.org:tap'),
    ];
    expect(extractMemberTag(message).ok).toBe(false);
    expect(
      extractMemberTag(message, {
        ...DEFAULT_TAG_PROTOCOL,
        externalType: 'example.org:tap',
      })
    ).toEqual({ ok: true, value: { memberId: 'm1', displayName: null } });
  });
});

describe('memberIdFromConnectUrl', () => {
  it('reads the component after the connect segment', () => {
    expect(memberIdFromConnectUrl('https://h.io/a/connect/abc/extra')).toBe(
      'abc'
    );
    expect(memberIdFromConnectUrl('https://h.io/connect/a%20b')).toBe('a b');
  });

  it('returns null for unusable URLs', () => {
    expect(memberIdFromConnectUrl('not a url')).toBeNull();
    expect(memberIdFromConnectUrl('https://h.io/connect/')).toBeNull();
    expect(memberIdFromConnectUrl('https://h.io/connect/%E0%A4%A')).toBeNull();
  });

  it('round-trips identifiers through the fallback URL', () => {
    const id = 'a/b?c#d';
    expect(memberIdFromConnectUrl(toFallbackUrl(id))).toBe(id);
  });
});
