import type { Firestore } from 'firebase-admin/firestore';
import type { NutritionTarget } from '../shared.js';
import { UserScopedRepository } from './base.repository.js';
import { isRecord, readBoolean, readNumber, readString } from './firestore-type-guards.js';

export class NutritionTargetRepository extends UserScopedRepository<NutritionTarget> {
  constructor(db?: Firestore) {
    super('nutritionTargets', db);
  }

  async save(userId: string, target: NutritionTarget): Promise<NutritionTarget> {
    const stored: NutritionTarget = {
      ...target,
      userId,
      macros: { ...target.macros },
    };
    await this.collection(userId).doc(stored.id).set(stored);
    return stored;
  }

  /**
   * The target that stays valid longest past `now`, or null when all have expired.
   */
  async findLatestValid(userId: string, now: Date = new Date()): Promise<NutritionTarget | null> {
    const snapshot = await this.collection(userId)
      .where('validUntil', '>', now.toISOString())
      .orderBy('validUntil', 'desc')
      .limit(1)
      .get();
    const doc = snapshot.docs[0];
    if (!doc) {
      return null;
    }
    return this.docToEntity(doc);
  }

  protected parseEntity(id: string, data: Record<string, unknown>): NutritionTarget | null {
    const userId = readString(data, 'userId');
    const dailyCalories = readNumber(data, 'dailyCalories');
    const bmr = readNumber(data, 'bmr');
    const isWorkoutDay = readBoolean(data, 'isWorkoutDay');
    const createdAt = readString(data, 'createdAt');
    const validUntil = readString(data, 'validUntil');
    const rawMacros = data['macros'];

    if (
      userId === null ||
      dailyCalories === null ||
      bmr === null ||
      isWorkoutDay === null ||
      createdAt === null ||
      validUntil === null ||
      !isRecord(rawMacros)
    ) {
      return null;
    }

    const protein = readNumber(rawMacros, 'protein');
    const carbs = readNumber(rawMacros, 'carbs');
    const fats = readNumber(rawMacros, 'fats');
    if (protein === null || carbs === null || fats === null) {
      return null;
    }

    return {
      id,
      userId,
      dailyCalories,
      macros: { protein, carbs, fats },
      bmr,
      isWorkoutDay,
      createdAt,
      validUntil,
    };
  }
}
