import { describe, expect, it } from 'vitest';
import {
  fullName,
  toPublicLayer,
  type MemberProfile,
} from '../../src/profile/MemberProfile';

const profile: MemberProfile = {
  id: 'member_001',
  firstName: 'Sam',
  lastName: 'Lee',
  headline: 'Product designer',
  bio: null,
  avatarUrl: null,
  membershipTier: 'physical',
  publicSocials: [
    { id: 's1', platform: 'linkedin', handle: 'samlee', url: null },
  ],
  phoneNumber: '+1 555 0100',
  email: 'sam@example.com',
  privateSocials: [
    { id: 's2', platform: 'twitter', handle: '@samlee', url: null },
  ],
};

describe('MemberProfile', () => {
  it('joins first and last name', () => {
    expect(fullName(profile)).toBe('Sam Lee');
  });

  it('strips the private layer', () => {
    const publicLayer = toPublicLayer(profile);
    expect(publicLayer.phoneNumber).toBeNull();
    expect(publicLayer.email).toBeNull();
    expect(publicLayer.privateSocials).toEqual([]);
    expect(publicLayer.publicSocials).toEqual(profile.publicSocials);
    expect(publicLayer.headline).toBe('Product designer');
  });
});
