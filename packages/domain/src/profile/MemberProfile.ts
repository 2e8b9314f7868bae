export const MembershipTiers = {
  digital: 'digital',
  physical: 'physical',
  elite: 'elite',
} as const;

export type MembershipTier =
  (typeof MembershipTiers)[keyof typeof MembershipTiers];

export const SocialPlatforms = {
  instagram: 'instagram',
  linkedin: 'linkedin',
  twitter: 'twitter',
  phone: 'phone',
  email: 'email',
  website: 'website',
} as const;

export type SocialPlatform =
  (typeof SocialPlatforms)[keyof typeof SocialPlatforms];

export type SocialLink = Readonly<{
  id: string;
  platform: SocialPlatform;
  handle: string;
  url: string | null;
}>;

export const ProfileLevels = {
  public: 'public',
  full: 'full',
} as const;

export type ProfileLevel = (typeof ProfileLevels)[keyof typeof ProfileLevels];

/**
 * A member's profile. The public layer is everything except
 * `phoneNumber`, `email` and `privateSocials`, which are only released
 * after a successful PIN challenge.
 */
export type MemberProfile = Readonly<{
  id: string;
  firstName: string;
  lastName: string;
  headline: string;
  bio: string | null;
  avatarUrl: string | null;
  membershipTier: MembershipTier;
  publicSocials: ReadonlyArray<SocialLink>;
  phoneNumber: string | null;
  email: string | null;
  privateSocials: ReadonlyArray<SocialLink>;
}>;

export const fullName = (profile: MemberProfile): string =>
  `${profile.firstName} ${profile.lastName}`.trim();

export const toPublicLayer = (profile: MemberProfile): MemberProfile => ({
  ...profile,
  phoneNumber: null,
  email: null,
  privateSocials: [],
});
