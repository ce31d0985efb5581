import { onRequest, type HttpsFunction, type HttpsOptions } from 'firebase-functions/v2/https';
import type { Application } from 'express';
import { initializeFirebase } from './firebase.js';
import { spoonacularApiKey } from './config.js';

// Initialize Firebase at cold start
initializeFirebase();

// Import handler apps
import { healthApp } from './handlers/health.js';
import { healthSyncApp } from './handlers/health-sync.js';
import { recoveryApp } from './handlers/recovery.js';
import { nutritionApp } from './handlers/nutrition.js';

// Common options
const defaultOptions: HttpsOptions = {
  region: 'us-central1',
  cors: true,
  invoker: 'public', // App Check middleware handles auth
};

// Options for functions that call the recipe API
const withRecipeApiOptions: HttpsOptions = {
  ...defaultOptions,
  secrets: [spoonacularApiKey],
  timeoutSeconds: 60,
};

/** Register a dev/prod function pair from an Express app. */
function register(
  app: Application,
  options: HttpsOptions = defaultOptions
): { dev: HttpsFunction; prod: HttpsFunction } {
  return {
    dev: onRequest(options, app),
    prod: onRequest(options, app),
  };
}

// ============ Function Registration ============
const { dev: devHealth, prod: prodHealth } = register(healthApp);
const { dev: devHealthSync, prod: prodHealthSync } = register(healthSyncApp);
const { dev: devRecovery, prod: prodRecovery } = register(recoveryApp);
const { dev: devNutrition, prod: prodNutrition } = register(nutritionApp, withRecipeApiOptions);

export {
  devHealth, prodHealth,
  devHealthSync, prodHealthSync,
  devRecovery, prodRecovery,
  devNutrition, prodNutrition,
};
