import type { DocumentData, Firestore } from 'firebase-admin/firestore';
import type {
  UpsertByProviderIdOptions,
  UserProfileRecord,
  UserProfileUpdate,
  UserRepository,
  UserUpsertFields,
} from './UserRepository';
import { readDate } from '../common/timestamps';

export const USERS_COLLECTION = 'users';

export function mapUserDoc(googleId: string, data: DocumentData): UserProfileRecord {
  return {
    id: typeof data.id === 'string' ? data.id : '',
    google_id: typeof data.google_id === 'string' ? data.google_id : googleId,
    email: typeof data.email === 'string' ? data.email : '',
    name: typeof data.name === 'string' ? data.name : '',
    picture: typeof data.picture === 'string' ? data.picture : '',
    about_me: typeof data.about_me === 'string' ? data.about_me : '',
    age: typeof data.age === 'number' && Number.isInteger(data.age) ? data.age : null,
    created_at: readDate(data.created_at),
    last_login: readDate(data.last_login),
  };
}

/**
 * Users are keyed by provider subject id, so the document id is the `google_id`
 * and a second login for the same subject can only ever touch one document.
 */
export class FirestoreUserRepository implements UserRepository {
  constructor(
    private readonly db: Firestore,
    private readonly collectionName: string = USERS_COLLECTION,
  ) {}

  private docRef(googleId: string) {
    return this.db.collection(this.collectionName).doc(googleId);
  }

  async upsertByProviderId(
    googleId: string,
    fields: UserUpsertFields,
    options: UpsertByProviderIdOptions = {},
  ): Promise<UserProfileRecord> {
    const userRef = this.docRef(googleId);
    const existing = await userRef.get();

    if (existing.exists) {
      await userRef.set({ ...fields, google_id: googleId }, { merge: true });
    } else {
      await userRef.set({ ...(options.onInsert ?? {}), ...fields, google_id: googleId });
    }

    const stored = await userRef.get();
    return mapUserDoc(googleId, stored.data() ?? {});
  }

  async findByProviderId(googleId: string): Promise<UserProfileRecord | null> {
    const snapshot = await this.docRef(googleId).get();
    if (!snapshot.exists) {
      return null;
    }

    return mapUserDoc(googleId, snapshot.data() ?? {});
  }

  async updateFields(
    googleId: string,
    updates: UserProfileUpdate,
  ): Promise<UserProfileRecord | null> {
    const userRef = this.docRef(googleId);
    const snapshot = await userRef.get();
    if (!snapshot.exists) {
      return null;
    }

    if (Object.keys(updates).length > 0) {
      await userRef.set(updates, { merge: true });
    }

    const updated = await userRef.get();
    return mapUserDoc(googleId, updated.data() ?? {});
  }
}
