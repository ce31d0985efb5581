import { initializeApp, getApps } from 'firebase-admin/app';
import { getFirestore, type Firestore } from 'firebase-admin/firestore';

let db: Firestore | null = null;

/**
 * Initialize the Admin SDK once per cold start.
 */
export function initializeFirebase(): void {
  if (getApps().length === 0) {
    initializeApp();
  }
}

export function getFirestoreDb(): Firestore {
  if (!db) {
    initializeFirebase();
    db = getFirestore();
  }
  return db;
}

/**
 * Dev functions and the emulator read and write `dev_`-prefixed collections.
 */
export function isDevEnvironment(): boolean {
  const target = process.env['FUNCTION_TARGET'] ?? process.env['K_SERVICE'] ?? '';
  return (
    process.env['FUNCTIONS_EMULATOR'] === 'true' ||
    process.env['FUNCTIONS_ENV'] === 'dev' ||
    target.toLowerCase().startsWith('dev')
  );
}

export function getCollectionName(name: string): string {
  return isDevEnvironment() ? `dev_${name}` : name;
}
