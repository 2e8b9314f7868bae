import {
  MembershipTiers,
  SocialPlatforms,
  type MemberProfile,
} from '@tapconsent/domain';
import { z } from 'zod';

export const socialLinkSchema = z.object({
  id: z.string().min(1),
  platform: z.enum(SocialPlatforms),
  handle: z.string(),
  url: z.string().nullable().default(null),
});

export const memberProfileSchema = z.object({
  id: z.string().min(1),
  firstName: z.string(),
  lastName: z.string(),
  headline: z.string(),
  bio: z.string().nullable().default(null),
  avatarUrl: z.string().nullable().default(null),
  membershipTier: z.enum(MembershipTiers),
  publicSocials: z.array(socialLinkSchema),
  phoneNumber: z.string().nullable().default(null),
  email: z.string().nullable().default(null),
  privateSocials: z.array(socialLinkSchema),
});

/**
 * Validates an untrusted profile body. Throws a `ZodError` on mismatch.
 */
export const parseMemberProfile = (input: unknown): MemberProfile =>
  memberProfileSchema.parse(input);
