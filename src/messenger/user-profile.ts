import { z } from 'zod';

import type { GraphTransport } from '../core/graph-transport.js';
import { logger } from '../middleware/logger.js';
import { buildUserFields } from './payloads.js';

const UserProfileSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  profile_pic: z.string().nullish(),
}).passthrough();

// Any decoded JSON value; matched when the body is not profile-shaped
const DecodedBodySchema = z.union([
  z.record(z.unknown()),
  z.array(z.unknown()),
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export type UserProfile = z.infer<typeof UserProfileSchema>;
export type DecodedBody = z.infer<typeof DecodedBodySchema>;

export function isUserProfile(value: unknown): value is UserProfile {
  return UserProfileSchema.safeParse(value).success;
}

export interface UserProfileApi {
  /**
   * Look up a user's public profile. `extraFields` are appended to the
   * default field set (e.g. `locale`, `timezone`, `gender`) and must be
   * fields the app has permission to read.
   *
   * Unlike the other calls this one decodes the body: error payloads from
   * the platform come back as an object with an `error` key. A body that is
   * not profile-shaped is returned as decoded; narrow with `isUserProfile`.
   */
  getUserInformation(recipientId: string, extraFields?: string[]): Promise<UserProfile | DecodedBody>;
}

export function createUserProfileApi(transport: GraphTransport): UserProfileApi {
  return {
    async getUserInformation(recipientId, extraFields = []) {
      const response = await transport.get(encodeURIComponent(recipientId), {
        fields: buildUserFields(extraFields),
      });
      const json: unknown = await response.json();

      const profile = UserProfileSchema.safeParse(json);
      if (profile.success) return profile.data;

      logger.debug({ status: response.status, issues: profile.error.issues.length }, 'User lookup body is not profile-shaped');
      return DecodedBodySchema.parse(json);
    },
  };
}
