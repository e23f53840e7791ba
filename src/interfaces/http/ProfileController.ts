import type { Request, Response } from "express";

import type { ProfileUseCase } from "@app/profile/ProfileUseCase";
import type { Profile, ProfilePatch } from "@domain/profile/types";
import {
  ProfilePatchSchema,
  type ProfilePatchBody,
  type ProfileResponseBody,
} from "@interfaces/http/profile/schema";
import { parseInput } from "@interfaces/http/validation";

export function toProfileResponse(profile: Profile): ProfileResponseBody {
  return {
    user_id: profile.userId,
    skin_type: profile.skinType,
    age: profile.age,
    skin_concerns: profile.concerns,
    preferences: profile.preferences,
    updated_at: profile.updatedAt,
  };
}

export function toProfilePatch(body: ProfilePatchBody): ProfilePatch {
  const patch: ProfilePatch = {};
  if (body.skin_type !== undefined) patch.skinType = body.skin_type;
  if (body.age !== undefined) patch.age = body.age;

  const concerns = body.skin_concerns ?? body.concerns;
  if (concerns !== undefined) patch.concerns = concerns;
  if (body.preferences !== undefined) patch.preferences = body.preferences;

  return patch;
}

/** GET, POST and PATCH /api/v1/profile/:userId */
export function createProfileController(profiles: ProfileUseCase) {
  return {
    async get(req: Request<{ userId: string }>, res: Response): Promise<void> {
      const profile = await profiles.getProfile(req.params.userId);
      res.json(toProfileResponse(profile));
    },

    async update(req: Request<{ userId: string }>, res: Response): Promise<void> {
      const body = parseInput(ProfilePatchSchema, req.body);
      const profile = await profiles.setProfile(req.params.userId, toProfilePatch(body));
      res.json(toProfileResponse(profile));
    },
  };
}
