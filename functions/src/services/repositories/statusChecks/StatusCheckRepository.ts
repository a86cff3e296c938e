export type StatusCheckRecord = {
  id: string;
  client_name: string;
  timestamp: Date;
};

export interface StatusCheckRepository {
  create(record: StatusCheckRecord): Promise<StatusCheckRecord>;
  /** Oldest first, capped at `limit` */
  list(limit: number): Promise<StatusCheckRecord[]>;
}
