import { describe, it, expect } from 'vitest';
import type { BodyMetrics, NutritionTarget } from '../shared.js';
import {
  MIN_DAILY_CALORIES,
  MIN_PROTEIN_PER_KG,
  getActivityFactor,
  totalCalories,
  macroPercentages,
  calculateDailyCalories,
  calculateMacros,
  calculateFromBodyMetrics,
  calculatePostWorkoutMeal,
  calculatePreWorkoutMeal,
  validateNutritionTarget,
  isTargetValid,
  calorieAdjustment,
  adjustForRecovery,
} from './nutrition-calculator.service.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function fatLossTarget(): NutritionTarget {
  return {
    id: 'target-1',
    userId: 'user-1',
    dailyCalories: 2080,
    macros: { protein: 168, carbs: 141, fats: 94 },
    bmr: 1600,
    isWorkoutDay: false,
    createdAt: '2026-03-10T12:00:00.000Z',
    validUntil: '2026-03-11T12:00:00.000Z',
  };
}

describe('Nutrition Calculator Service', () => {
  describe('getActivityFactor', () => {
    it('should map each level to its multiplier', () => {
      expect(getActivityFactor('sedentary')).toBe(1.2);
      expect(getActivityFactor('light')).toBe(1.375);
      expect(getActivityFactor('lightly_active')).toBe(1.375);
      expect(getActivityFactor('moderate')).toBe(1.55);
      expect(getActivityFactor('very_active')).toBe(1.725);
      expect(getActivityFactor('very')).toBe(1.725);
      expect(getActivityFactor('athlete')).toBe(1.9);
      expect(getActivityFactor('extremely_active')).toBe(1.9);
    });

    it('should match case-insensitively', () => {
      expect(getActivityFactor('VERY_ACTIVE')).toBe(1.725);
    });

    it('should fall back to moderate for unknown levels', () => {
      expect(getActivityFactor('couch')).toBe(1.55);
    });
  });

  describe('calculateDailyCalories', () => {
    it('should subtract 400 kcal for fat loss', () => {
      expect(calculateDailyCalories(1600, 'fat_loss', 'moderate')).toBe(2080);
    });

    it('should keep maintenance at BMR times the activity factor', () => {
      expect(calculateDailyCalories(1500, 'maintenance', 'sedentary')).toBe(1800);
    });

    it('should add 400 kcal for muscle gain and 100 on workout days', () => {
      expect(calculateDailyCalories(1800, 'muscle_gain', 'moderate')).toBe(3190);
      expect(calculateDailyCalories(1800, 'muscle_gain', 'moderate', true)).toBe(3290);
    });

    it('should not add the workout bonus for fat_loss', () => {
      expect(calculateDailyCalories(1600, 'fat_loss', 'moderate', true)).toBe(2080);
    });

    it('should add the workout bonus for the cut alias', () => {
      expect(calculateDailyCalories(1600, 'cut', 'moderate', true)).toBe(2180);
    });

    it('should treat unknown goals as maintenance', () => {
      expect(calculateDailyCalories(1500, 'recomp', 'sedentary')).toBe(1800);
    });
  });

  describe('calculateMacros', () => {
    it('should split fat-loss calories 40/60 after protein', () => {
      const target = calculateMacros(2080, 70, 'fat_loss', false, NOW);

      expect(target.macros).toEqual({ protein: 168, carbs: 141, fats: 94 });
      expect(target.dailyCalories).toBe(2080);
      expect(target.isWorkoutDay).toBe(false);
    });

    it('should split muscle-gain calories 60/40 after protein', () => {
      const target = calculateMacros(3000, 80, 'bulk', false, NOW);
      expect(target.macros).toEqual({ protein: 176, carbs: 344, fats: 102 });
    });

    it('should cycle carbs up and fats down on workout days', () => {
      const target = calculateMacros(3000, 80, 'muscle_gain', true, NOW);
      expect(target.macros).toEqual({ protein: 176, carbs: 374, fats: 92 });
      expect(target.isWorkoutDay).toBe(true);
    });

    it('should be valid for 24 hours', () => {
      const target = calculateMacros(2080, 70, 'fat_loss', false, NOW);
      expect(target.createdAt).toBe('2026-03-10T12:00:00.000Z');
      expect(target.validUntil).toBe('2026-03-11T12:00:00.000Z');
    });

    it('should leave userId and bmr for the caller', () => {
      const target = calculateMacros(2080, 70, 'fat_loss', false, NOW);
      expect(target.userId).toBe('');
      expect(target.bmr).toBe(0);
      expect(target.id).not.toBe('');
    });
  });

  describe('calculateFromBodyMetrics', () => {
    it('should use the body metrics BMR and weight', () => {
      const metrics: BodyMetrics = {
        date: '2026-03-10',
        weight: 70,
        bodyFat: 20,
        skeletalMuscle: 25.2,
        bmi: 22.9,
        bmr: 1600,
        source: 'healthkit',
      };

      const target = calculateFromBodyMetrics(metrics, 'fat_loss', 'moderate', false, NOW);

      expect(target.dailyCalories).toBe(2080);
      expect(target.bmr).toBe(1600);
      expect(target.macros).toEqual({ protein: 168, carbs: 141, fats: 94 });
      expect(calorieAdjustment(target)).toBe(480);
    });
  });

  describe('workout meals', () => {
    it('should size the pre-workout meal by bodyweight', () => {
      const meal = calculatePreWorkoutMeal(80, NOW);

      expect(meal.macros).toEqual({ protein: 24, carbs: 48, fats: 8 });
      expect(meal.dailyCalories).toBe(360);
      expect(meal.isWorkoutDay).toBe(false);
      expect(meal.validUntil).toBe('2026-03-10T14:00:00.000Z');
    });

    it('should size the post-workout meal by bodyweight', () => {
      const meal = calculatePostWorkoutMeal(80, NOW);

      expect(meal.macros).toEqual({ protein: 32, carbs: 64, fats: 5 });
      expect(meal.dailyCalories).toBe(429);
      expect(meal.validUntil).toBe('2026-03-10T14:00:00.000Z');
    });
  });

  describe('totalCalories', () => {
    it('should apply the 4-4-9 rule', () => {
      expect(totalCalories({ protein: 168, carbs: 141, fats: 94 })).toBe(2082);
    });
  });

  describe('macroPercentages', () => {
    it('should return each macro share of total calories', () => {
      expect(macroPercentages({ protein: 100, carbs: 100, fats: 0 })).toEqual({
        protein: 50,
        carbs: 50,
        fats: 0,
      });
    });

    it('should add up to 100', () => {
      const percentages = macroPercentages({ protein: 168, carbs: 141, fats: 94 });
      expect(percentages.protein + percentages.carbs + percentages.fats).toBeCloseTo(100);
    });

    it('should return zeros for empty macros', () => {
      expect(macroPercentages({ protein: 0, carbs: 0, fats: 0 })).toEqual({
        protein: 0,
        carbs: 0,
        fats: 0,
      });
    });
  });

  describe('validateNutritionTarget', () => {
    it('should accept a target above both floors', () => {
      expect(validateNutritionTarget(fatLossTarget(), 70)).toBe(true);
    });

    it('should reject protein under 1.6 g/kg', () => {
      const target = { ...fatLossTarget(), macros: { protein: 111, carbs: 141, fats: 94 } };
      expect(MIN_PROTEIN_PER_KG * 70).toBeCloseTo(112);
      expect(validateNutritionTarget(target, 70)).toBe(false);
    });

    it('should reject calories under 1200', () => {
      const target = { ...fatLossTarget(), dailyCalories: MIN_DAILY_CALORIES - 1 };
      expect(validateNutritionTarget(target, 70)).toBe(false);
    });

    it('should accept exactly 1200 kcal', () => {
      const target = { ...fatLossTarget(), dailyCalories: 1200 };
      expect(validateNutritionTarget(target, 70)).toBe(true);
    });
  });

  describe('isTargetValid', () => {
    it('should be valid before validUntil', () => {
      expect(isTargetValid(fatLossTarget(), new Date('2026-03-11T11:59:59.000Z'))).toBe(true);
    });

    it('should expire at validUntil', () => {
      expect(isTargetValid(fatLossTarget(), new Date('2026-03-11T12:00:00.000Z'))).toBe(false);
    });
  });

  describe('adjustForRecovery', () => {
    it('should return the same target when recovered', () => {
      const target = fatLossTarget();
      expect(adjustForRecovery(target, 75)).toBe(target);
    });

    it('should trim calories and carbs on moderate recovery', () => {
      const adjusted = adjustForRecovery(fatLossTarget(), 60);

      expect(adjusted.dailyCalories).toBe(1976);
      expect(adjusted.macros).toEqual({ protein: 168, carbs: 127, fats: 94 });
    });

    it('should cut deeper and raise protein on poor recovery', () => {
      const adjusted = adjustForRecovery(fatLossTarget(), 45);

      expect(adjusted.dailyCalories).toBe(1872);
      expect(adjusted.macros).toEqual({ protein: 176, carbs: 113, fats: 94 });
    });

    it('should keep the target identity', () => {
      const adjusted = adjustForRecovery(fatLossTarget(), 45);
      expect(adjusted.id).toBe('target-1');
      expect(adjusted.validUntil).toBe('2026-03-11T12:00:00.000Z');
    });
  });
});
