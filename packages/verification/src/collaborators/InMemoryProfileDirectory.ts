import {
  ProfileLevels,
  toPublicLayer,
  type MemberProfile,
} from '@tapconsent/domain';
import { CollaboratorError } from '../errors/CollaboratorError';
import type { ProfilePort, ProfileRequest } from '../types';

/**
 * Profile lookup over a fixed set of members, with the same privacy
 * layers as the profile service.
 */
export class InMemoryProfileDirectory implements ProfilePort {
  private readonly profiles = new Map<string, MemberProfile>();

  constructor(profiles: Iterable<MemberProfile> = []) {
    for (const profile of profiles) {
      this.profiles.set(profile.id, profile);
    }
  }

  put(profile: MemberProfile): void {
    this.profiles.set(profile.id, profile);
  }

  async fetchProfile(request: ProfileRequest): Promise<MemberProfile> {
    const profile = this.profiles.get(request.memberId.value);
    if (!profile) {
      throw new CollaboratorError('Profile not found', 404);
    }
    if (request.level === ProfileLevels.public) {
      return toPublicLayer(profile);
    }
    if (!request.sessionId) {
      throw new CollaboratorError(
        'A verification session is required for the full profile',
        403
      );
    }
    return profile;
  }
}
