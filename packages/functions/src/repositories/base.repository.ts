import {
  type Firestore,
  type CollectionReference,
  type DocumentData,
  type DocumentReference,
  type DocumentSnapshot,
} from 'firebase-admin/firestore';
import { getFirestoreDb, getCollectionName } from '../firebase.js';
import { isRecord } from './firestore-type-guards.js';

/**
 * Repository over a per-user subcollection: `users/{userId}/{subcollection}`.
 */
export abstract class UserScopedRepository<T> {
  protected db: Firestore;
  protected usersCollectionName: string;

  constructor(
    protected subcollectionName: string,
    db?: Firestore
  ) {
    this.db = db ?? getFirestoreDb();
    this.usersCollectionName = getCollectionName('users');
  }

  protected abstract parseEntity(id: string, data: Record<string, unknown>): T | null;

  protected userDoc(userId: string): DocumentReference<DocumentData> {
    return this.db.collection(this.usersCollectionName).doc(userId);
  }

  protected collection(userId: string): CollectionReference<DocumentData> {
    return this.userDoc(userId).collection(this.subcollectionName);
  }

  protected docToEntity(doc: DocumentSnapshot<DocumentData>): T | null {
    if (!doc.exists) {
      return null;
    }
    const data = doc.data();
    if (!isRecord(data)) {
      return null;
    }
    return this.parseEntity(doc.id, data);
  }

  protected docsToEntities(docs: Array<DocumentSnapshot<DocumentData>>): T[] {
    return docs
      .map((doc) => this.docToEntity(doc))
      .filter((entity): entity is T => entity !== null);
  }

  async findById(userId: string, id: string): Promise<T | null> {
    const doc = await this.collection(userId).doc(id).get();
    return this.docToEntity(doc);
  }
}
