import { vi } from 'vitest';
import type {
  Firestore,
  CollectionReference,
  DocumentReference,
} from 'firebase-admin/firestore';

export interface MockDocumentSnapshot {
  id: string;
  exists: boolean;
  data: () => Record<string, unknown> | undefined;
}

export interface MockQuerySnapshot {
  empty: boolean;
  docs: MockDocumentSnapshot[];
}

export interface MockFirestoreQuery {
  where: ReturnType<typeof vi.fn>;
  orderBy: ReturnType<typeof vi.fn>;
  limit: ReturnType<typeof vi.fn>;
  get: ReturnType<typeof vi.fn>;
}

export function createFirestoreQueryChain(): MockFirestoreQuery {
  const chain: MockFirestoreQuery = {
    get: vi.fn(),
    where: vi.fn(),
    orderBy: vi.fn(),
    limit: vi.fn(),
  };

  chain.where.mockReturnValue(chain);
  chain.orderBy.mockReturnValue(chain);
  chain.limit.mockReturnValue(chain);

  return chain;
}

export function createMockDoc(
  id: string,
  data: Record<string, unknown> | null
): MockDocumentSnapshot {
  return {
    id,
    exists: data !== null,
    data: () => data ?? undefined,
  };
}

export function createMockQuerySnapshot(
  docs: Array<{ id: string; data: Record<string, unknown> }>
): MockQuerySnapshot {
  return {
    empty: docs.length === 0,
    docs: docs.map((doc) => createMockDoc(doc.id, doc.data)),
  };
}

/**
 * Mock graph for `users/{userId}/{subcollection}/{docId}`.
 * Document reads go through `mockDocGet`; query reads through `mockQueryChain.get`.
 */
export interface UserScopedFirestoreMocks {
  mockDb: Partial<Firestore>;
  mockUsersCollection: Partial<CollectionReference>;
  mockUserDoc: Partial<DocumentReference>;
  mockCollection: Partial<CollectionReference>;
  mockDocRef: Partial<DocumentReference>;
  mockDocGet: ReturnType<typeof vi.fn>;
  mockDocSet: ReturnType<typeof vi.fn>;
  mockQueryChain: MockFirestoreQuery;
  mockBatchSet: ReturnType<typeof vi.fn>;
  mockBatchCommit: ReturnType<typeof vi.fn>;
}

export function createUserScopedFirestoreMocks(): UserScopedFirestoreMocks {
  const mockDocGet = vi.fn();
  const mockDocSet = vi.fn().mockResolvedValue(undefined);
  const mockBatchSet = vi.fn();
  const mockBatchCommit = vi.fn().mockResolvedValue(undefined);
  const mockQueryChain = createFirestoreQueryChain();

  const mockDocRef: Partial<DocumentReference> = {
    id: 'test-doc-id',
    get: mockDocGet as unknown as DocumentReference['get'],
    set: mockDocSet as unknown as DocumentReference['set'],
  };

  const mockCollection: Partial<CollectionReference> = {
    doc: vi.fn(() => mockDocRef) as unknown as CollectionReference['doc'],
    where: mockQueryChain.where as unknown as CollectionReference['where'],
    orderBy: mockQueryChain.orderBy as unknown as CollectionReference['orderBy'],
    limit: mockQueryChain.limit as unknown as CollectionReference['limit'],
    get: mockQueryChain.get as unknown as CollectionReference['get'],
  };

  const mockUserDoc: Partial<DocumentReference> = {
    collection: vi.fn(() => mockCollection as unknown as CollectionReference),
  };

  const mockUsersCollection: Partial<CollectionReference> = {
    doc: vi.fn(() => mockUserDoc as unknown as DocumentReference) as unknown as CollectionReference['doc'],
  };

  const mockDb: Partial<Firestore> = {
    collection: vi.fn(() => mockUsersCollection as unknown as CollectionReference),
    batch: vi.fn().mockReturnValue({
      set: mockBatchSet,
      commit: mockBatchCommit,
    }),
  };

  return {
    mockDb,
    mockUsersCollection,
    mockUserDoc,
    mockCollection,
    mockDocRef,
    mockDocGet,
    mockDocSet,
    mockQueryChain,
    mockBatchSet,
    mockBatchCommit,
  };
}
