import { randomUUID } from 'crypto';
import type {
  StatusCheckRecord,
  StatusCheckRepository,
} from '../../repositories/statusChecks/StatusCheckRepository';

export const STATUS_CHECK_LIST_LIMIT = 1000;

export class StatusCheckDomainService {
  constructor(
    private readonly statusCheckRepository: StatusCheckRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async record(clientName: string): Promise<StatusCheckRecord> {
    return this.statusCheckRepository.create({
      id: randomUUID(),
      client_name: clientName,
      timestamp: this.now(),
    });
  }

  async list(): Promise<StatusCheckRecord[]> {
    return this.statusCheckRepository.list(STATUS_CHECK_LIST_LIMIT);
  }
}
