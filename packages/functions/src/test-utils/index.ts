export {
  type MockDocumentSnapshot,
  type MockQuerySnapshot,
  type MockFirestoreQuery,
  type UserScopedFirestoreMocks,
  createFirestoreQueryChain,
  createMockDoc,
  createMockQuerySnapshot,
  createUserScopedFirestoreMocks,
} from './firestore-mock.js';
