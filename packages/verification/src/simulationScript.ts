import {
  Assert,
  DEFAULT_PIN_LENGTH,
  MAX_PIN_LENGTH,
  MemberId,
  fullName,
  type MemberProfile,
} from '@tapconsent/domain';
import { parseMemberProfile } from './profileSchema';
import simulatedProfileJson from './simulatedProfile.json';

/**
 * What the scripted flow pretends happened: whose tag was tapped, which
 * digits get typed, which PIN the sharer would have received and the
 * profile that is finally revealed.
 */
export type SimulationScript = Readonly<{
  sharerId: MemberId;
  displayName: string | null;
  digits: ReadonlyArray<number>;
  pin: string;
  profile: MemberProfile;
}>;

/**
 * `1, 2, …` wrapping after 9, e.g. `1234` for four digits.
 */
export const sequentialDigits = (length: number): ReadonlyArray<number> =>
  Array.from({ length }, (_, i) => (i + 1) % 10);

export const createSimulationScript = (
  overrides: Partial<SimulationScript> = {},
  pinLength: number = DEFAULT_PIN_LENGTH
): SimulationScript => {
  const profile = overrides.profile ?? parseMemberProfile(simulatedProfileJson);
  const digits = overrides.digits ?? sequentialDigits(pinLength);
  Assert.that(digits.length, 'Simulated digit count')
    .isInteger()
    .isBetween(1, MAX_PIN_LENGTH);
  for (const digit of digits) {
    Assert.that(digit, 'Simulated digit').isInteger().isBetween(0, 9);
  }
  return {
    sharerId: overrides.sharerId ?? MemberId.from(profile.id),
    displayName:
      overrides.displayName === undefined
        ? fullName(profile)
        : overrides.displayName,
    digits,
    pin: overrides.pin ?? digits.join(''),
    profile,
  };
};
