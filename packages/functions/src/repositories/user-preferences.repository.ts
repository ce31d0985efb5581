import type { Firestore } from 'firebase-admin/firestore';
import type { UserHealthProfile } from '../shared.js';
import { UserScopedRepository } from './base.repository.js';
import { readEnum, readOptionalNumber, readString } from './firestore-type-guards.js';

const PREFERENCES_DOC = 'preferences';

export type UserPreferences = Record<string, unknown>;

/**
 * Key-value preferences in a single document: `users/{userId}/settings/preferences`.
 */
export class UserPreferencesRepository extends UserScopedRepository<UserPreferences> {
  constructor(db?: Firestore) {
    super('settings', db);
  }

  async getAll(userId: string): Promise<UserPreferences> {
    return (await this.findById(userId, PREFERENCES_DOC)) ?? {};
  }

  async get(userId: string, key: string): Promise<unknown> {
    const preferences = await this.getAll(userId);
    return preferences[key] ?? null;
  }

  async set(userId: string, key: string, value: unknown): Promise<void> {
    await this.setMany(userId, { [key]: value });
  }

  async setMany(userId: string, values: UserPreferences): Promise<void> {
    const updates: UserPreferences = {};
    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        updates[key] = value;
      }
    }
    updates['updatedAt'] = new Date().toISOString();
    await this.collection(userId).doc(PREFERENCES_DOC).set(updates, { merge: true });
  }

  /**
   * Stored profile values. `age` is derived by the caller from `dateOfBirth`.
   */
  async getHealthProfile(userId: string): Promise<UserHealthProfile> {
    const preferences = await this.getAll(userId);
    const profile: UserHealthProfile = {};

    const heightCm = readOptionalNumber(preferences, 'heightCm');
    const biologicalSex = readEnum(preferences, 'biologicalSex', ['male', 'female'] as const);
    const dateOfBirth = readString(preferences, 'dateOfBirth');

    if (heightCm !== undefined) profile.heightCm = heightCm;
    if (biologicalSex !== null) profile.biologicalSex = biologicalSex;
    if (dateOfBirth !== null) profile.dateOfBirth = dateOfBirth;

    return profile;
  }

  async setHealthProfile(userId: string, profile: UserHealthProfile): Promise<void> {
    await this.setMany(userId, {
      heightCm: profile.heightCm,
      biologicalSex: profile.biologicalSex,
      dateOfBirth: profile.dateOfBirth,
    });
  }

  protected parseEntity(_id: string, data: Record<string, unknown>): UserPreferences {
    return { ...data };
  }
}
