import type { MemberProfile } from '@tapconsent/domain';
import { z } from 'zod';
import { memberProfileSchema } from '../profileSchema';
import type { ProfilePort, ProfileRequest } from '../types';
import { requestJson, type HttpClientOptions } from './httpJson';

const updateProfileResponseSchema = z.object({
  profile: memberProfileSchema,
});

export class HttpProfileClient implements ProfilePort {
  constructor(private readonly options: HttpClientOptions) {}

  async fetchProfile(request: ProfileRequest): Promise<MemberProfile> {
    const query = new URLSearchParams({ level: request.level });
    if (request.sessionId !== undefined) {
      query.set('session', request.sessionId);
    }
    return requestJson(
      this.options,
      `/profiles/${encodeURIComponent(request.memberId.value)}?${query.toString()}`,
      { method: 'GET' },
      memberProfileSchema
    );
  }

  /**
   * Replaces the stored profile and returns what the service kept.
   */
  async updateProfile(profile: MemberProfile): Promise<MemberProfile> {
    const body = await requestJson(
      this.options,
      `/profiles/${encodeURIComponent(profile.id)}`,
      { method: 'PUT', body: JSON.stringify(profile) },
      updateProfileResponseSchema
    );
    return body.profile;
  }
}
