import type { Firestore, QueryDocumentSnapshot } from 'firebase-admin/firestore';
import type { StatusCheckRecord, StatusCheckRepository } from './StatusCheckRepository';
import { readDate } from '../common/timestamps';

export const STATUS_CHECKS_COLLECTION = 'status_checks';

function mapStatusCheckDoc(doc: QueryDocumentSnapshot): StatusCheckRecord {
  const data = doc.data();
  return {
    id: typeof data.id === 'string' ? data.id : doc.id,
    client_name: typeof data.client_name === 'string' ? data.client_name : '',
    timestamp: readDate(data.timestamp) ?? new Date(0),
  };
}

export class FirestoreStatusCheckRepository implements StatusCheckRepository {
  constructor(
    private readonly db: Firestore,
    private readonly collectionName: string = STATUS_CHECKS_COLLECTION,
  ) {}

  async create(record: StatusCheckRecord): Promise<StatusCheckRecord> {
    await this.db.collection(this.collectionName).doc(record.id).set({
      id: record.id,
      client_name: record.client_name,
      timestamp: record.timestamp,
    });
    return record;
  }

  async list(limit: number): Promise<StatusCheckRecord[]> {
    const snapshot = await this.db
      .collection(this.collectionName)
      .orderBy('timestamp', 'asc')
      .limit(limit)
      .get();

    return snapshot.docs.map(mapStatusCheckDoc);
  }
}
