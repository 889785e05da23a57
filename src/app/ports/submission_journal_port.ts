import type { SubmissionRecord, SubmissionStatus } from '../../domain/model/types';

export interface SubmissionJournalPort {
  recordIntent(record: SubmissionRecord): Promise<void>;
  updateStatus(reference: string, status: SubmissionStatus, error?: string): Promise<void>;
  find(reference: string): Promise<SubmissionRecord | null>;
}
