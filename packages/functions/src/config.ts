import { defineSecret, defineString } from 'firebase-functions/params';

// Secrets
export const spoonacularApiKey = defineSecret('SPOONACULAR_API_KEY');

/**
 * User id used when a request carries no `x-user-id` header.
 */
export const defaultUserId = defineString('DEFAULT_USER_ID', { default: 'default-user' });

export const SPOONACULAR_BASE_URL = 'https://api.spoonacular.com';

/** Trailing window for the weight and HRV baselines on the recovery score. */
export const RECOVERY_BASELINE_DAYS = 7;

/** How far back basal energy is averaged. */
export const BMR_AVERAGE_DAYS = 365;

/** Body metrics window when looking for the latest reading. */
export const LATEST_METRICS_DAYS = 30;
