import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { info, warn } from 'firebase-functions/logger';
import type {
  DateRange,
  HealthSample,
  HealthSampleKind,
  HealthSource,
  UserHealthProfile,
} from '../shared.js';
import { HealthDataService, dayRange, trailingRange } from './health-data.service.js';

class FakeHealthSource implements HealthSource {
  private readonly samples: HealthSample[] = [];
  readonly failing = new Set<HealthSampleKind>();
  readonly requestedKinds: HealthSampleKind[] = [];

  add(kind: HealthSampleKind, timestamp: string, value: number, endTimestamp?: string): void {
    const sample: HealthSample = { kind, timestamp, value };
    if (endTimestamp !== undefined) {
      sample.endTimestamp = endTimestamp;
    }
    this.samples.push(sample);
  }

  fetchSamples(_userId: string, kind: HealthSampleKind, range: DateRange): Promise<HealthSample[]> {
    this.requestedKinds.push(kind);
    if (this.failing.has(kind)) {
      return Promise.reject(new Error('HealthKit not authorized'));
    }
    return Promise.resolve(
      this.samples.filter((sample) => {
        const time = Date.parse(sample.timestamp);
        return (
          sample.kind === kind && time >= range.start.getTime() && time < range.end.getTime()
        );
      })
    );
  }
}

const NOW = new Date('2026-03-10T12:00:00.000Z');

describe('Health Data Service', () => {
  let source: FakeHealthSource;
  let profile: UserHealthProfile;
  let preferences: { getHealthProfile: Mock<[string], Promise<UserHealthProfile>> };
  let service: HealthDataService;

  beforeEach(() => {
    source = new FakeHealthSource();
    profile = {};
    preferences = {
      getHealthProfile: vi.fn<[string], Promise<UserHealthProfile>>(() =>
        Promise.resolve({ ...profile })
      ),
    };
    service = new HealthDataService(source, preferences);
  });

  describe('dayRange', () => {
    it('should span one UTC day', () => {
      const range = dayRange('2026-03-10');
      expect(range.start.toISOString()).toBe('2026-03-10T00:00:00.000Z');
      expect(range.end.toISOString()).toBe('2026-03-11T00:00:00.000Z');
    });
  });

  describe('trailingRange', () => {
    it('should end at the given time', () => {
      const range = trailingRange(NOW, 30);
      expect(range.start.toISOString()).toBe('2026-02-08T12:00:00.000Z');
      expect(range.end).toBe(NOW);
    });
  });

  describe('fetchRecoveryMetrics', () => {
    it('should aggregate the day readings', async () => {
      source.add('sleep_asleep', '2026-03-10T00:30:00.000Z', 0, '2026-03-10T08:00:00.000Z');
      source.add('heart_rate_variability_sdnn', '2026-03-09T06:00:00.000Z', 20);
      source.add('heart_rate_variability_sdnn', '2026-03-10T06:00:00.000Z', 60);
      source.add('resting_heart_rate', '2026-03-10T07:00:00.000Z', 55);

      const result = await service.fetchRecoveryMetrics('user-1', '2026-03-10');

      expect(result).toEqual({
        ok: true,
        value: { date: '2026-03-10', sleepHours: 7.5, hrv: 60, restingHR: 55 },
      });
    });

    it('should use fallbacks for a day without readings', async () => {
      const result = await service.fetchRecoveryMetrics('user-1', '2026-03-10');

      expect(result).toEqual({
        ok: true,
        value: { date: '2026-03-10', sleepHours: 7, hrv: 35, restingHR: 67 },
      });
    });

    it('should return an error when the source fails', async () => {
      source.failing.add('heart_rate_variability_sdnn');

      const result = await service.fetchRecoveryMetrics('user-1', '2026-03-10');

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'unavailable',
          message: 'Could not read heart_rate_variability_sdnn: HealthKit not authorized',
        },
      });
      expect(warn).toHaveBeenCalledWith('[Health Data] health source failed', {
        userId: 'user-1',
        kind: 'heart_rate_variability_sdnn',
        error: 'HealthKit not authorized',
      });
    });
  });

  describe('fetchRecoveryHistory', () => {
    it('should return one entry per day, most recent first', async () => {
      source.add('heart_rate_variability_sdnn', '2026-03-10T06:00:00.000Z', 60);
      source.add('heart_rate_variability_sdnn', '2026-03-09T06:00:00.000Z', 40);

      const history = await service.fetchRecoveryHistory('user-1', '2026-03-10', 3);

      expect(history.map((entry) => entry.date)).toEqual([
        '2026-03-10',
        '2026-03-09',
        '2026-03-08',
      ]);
      expect(history.map((entry) => entry.hrv)).toEqual([60, 40, 35]);
    });

    it('should skip unreadable days', async () => {
      source.failing.add('sleep_asleep');

      const history = await service.fetchRecoveryHistory('user-1', '2026-03-10', 3);

      expect(history).toEqual([]);
    });
  });

  describe('fetchUserHealthProfile', () => {
    it('should backfill height and derive age', async () => {
      profile = { biologicalSex: 'male', dateOfBirth: '1990-06-15' };
      source.add('height', '2025-01-01T08:00:00.000Z', 180);

      const result = await service.fetchUserHealthProfile('user-1', NOW);

      expect(result).toEqual({
        ok: true,
        value: { biologicalSex: 'male', dateOfBirth: '1990-06-15', heightCm: 180, age: 35 },
      });
    });

    it('should not read height samples when the profile has a height', async () => {
      profile = { heightCm: 172 };

      const result = await service.fetchUserHealthProfile('user-1', NOW);

      expect(result).toEqual({ ok: true, value: { heightCm: 172 } });
      expect(source.requestedKinds).not.toContain('height');
    });

    it('should return an error when preferences cannot be read', async () => {
      preferences.getHealthProfile.mockRejectedValue(new Error('Firestore unavailable'));

      const result = await service.fetchUserHealthProfile('user-1', NOW);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'unavailable', message: 'Could not read profile: Firestore unavailable' },
      });
    });
  });

  describe('fetchYearlyAverageBmr', () => {
    it('should average basal energy readings', async () => {
      source.add('basal_energy_burned', '2026-03-01T08:00:00.000Z', 1600);
      source.add('basal_energy_burned', '2026-03-02T08:00:00.000Z', 1700);

      const result = await service.fetchYearlyAverageBmr('user-1', NOW);

      expect(result).toEqual({ ok: true, value: { bmr: 1650, source: 'healthkit_average' } });
      expect(info).toHaveBeenCalledWith('[Health Data] resolved BMR', {
        userId: 'user-1',
        bmr: 1650,
        source: 'healthkit_average',
      });
    });

    it('should estimate from the latest weight and the profile', async () => {
      profile = { biologicalSex: 'male', dateOfBirth: '1996-03-10', heightCm: 180 };
      source.add('weight', '2026-03-01T07:00:00.000Z', 82);
      source.add('weight', '2026-03-09T07:00:00.000Z', 80);

      const result = await service.fetchYearlyAverageBmr('user-1', NOW);

      expect(result).toEqual({ ok: true, value: { bmr: 1854, source: 'harris_benedict' } });
    });

    it('should use the default when nothing can be read', async () => {
      source.failing.add('basal_energy_burned');
      source.failing.add('weight');

      const result = await service.fetchYearlyAverageBmr('user-1', NOW);

      expect(result).toEqual({ ok: true, value: { bmr: 1200, source: 'default' } });
    });
  });

  describe('fetchBodyMetrics', () => {
    const range: DateRange = {
      start: new Date('2026-03-01T00:00:00.000Z'),
      end: new Date('2026-03-11T00:00:00.000Z'),
    };

    it('should build daily metrics with the given BMR', async () => {
      profile = { heightCm: 180 };
      source.add('weight', '2026-03-09T07:00:00.000Z', 80);
      source.add('weight', '2026-03-10T07:00:00.000Z', 79);

      const result = await service.fetchBodyMetrics('user-1', range, 1700);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.map((entry) => [entry.date, entry.weight, entry.bmr, entry.height])).toEqual([
        ['2026-03-10', 79, 1700, 180],
        ['2026-03-09', 80, 1700, 180],
      ]);
    });

    it('should resolve the BMR when none is given', async () => {
      source.add('basal_energy_burned', '2026-02-20T08:00:00.000Z', 1720);
      source.add('weight', '2026-03-10T07:00:00.000Z', 79);

      const result = await service.fetchBodyMetrics('user-1', range);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value[0]?.bmr).toBe(1720);
    });

    it('should degrade optional readings to absent', async () => {
      source.failing.add('body_fat_percentage');
      source.add('weight', '2026-03-10T07:00:00.000Z', 79);

      const result = await service.fetchBodyMetrics('user-1', range, 1700);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value[0]?.bodyFat).toBe(0);
    });

    it('should return an error when weight cannot be read', async () => {
      source.failing.add('weight');

      const result = await service.fetchBodyMetrics('user-1', range, 1700);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'unavailable', message: 'Could not read weight: HealthKit not authorized' },
      });
    });
  });

  describe('fetchLatestBodyMetrics', () => {
    it('should return the newest day', async () => {
      source.add('weight', '2026-03-05T07:00:00.000Z', 81);
      source.add('weight', '2026-03-09T07:00:00.000Z', 80);

      const result = await service.fetchLatestBodyMetrics('user-1', NOW);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.date).toBe('2026-03-09');
      expect(result.value.weight).toBe(80);
    });

    it('should report missing data when there are no weights', async () => {
      const result = await service.fetchLatestBodyMetrics('user-1', NOW);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'missing_data', message: 'No body metrics in the last 30 days' },
      });
    });
  });

  describe('fetchActiveCalories', () => {
    it('should total the day readings', async () => {
      source.add('active_energy_burned', '2026-03-10T09:00:00.000Z', 250);
      source.add('active_energy_burned', '2026-03-10T18:00:00.000Z', 180.5);

      const result = await service.fetchActiveCalories('user-1', '2026-03-10');

      expect(result).toEqual({ ok: true, value: 430.5 });
    });

    it('should report missing data without readings', async () => {
      const result = await service.fetchActiveCalories('user-1', '2026-03-10');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'missing_data', message: 'No active energy readings for 2026-03-10' },
      });
    });
  });
});
