import { describe, expect, it } from 'vitest';
import { MemberId } from '../../src/identity/MemberId';

describe('MemberId', () => {
  it('wraps a non-empty identifier', () => {
    const id = MemberId.from('member_001');
    expect(id.value).toBe('member_001');
    expect(id.toString()).toBe('member_001');
    expect(id.equals(MemberId.from('member_001'))).toBe(true);
  });

  it('rejects empty and blank identifiers', () => {
    expect(() => MemberId.from('')).toThrow(
      'MemberId must be a non-empty string, got: ""'
    );
    expect(() => MemberId.from('   ')).toThrow(
      'MemberId must be a non-empty string'
    );
  });
});
