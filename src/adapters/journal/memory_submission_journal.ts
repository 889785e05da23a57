import type { SubmissionJournalPort } from '../../app/ports/submission_journal_port';
import type { SubmissionRecord, SubmissionStatus } from '../../domain/model/types';
import { nowIso } from '../../domain/utils/time';

export class MemorySubmissionJournal implements SubmissionJournalPort {
  private readonly records = new Map<string, SubmissionRecord>();

  async recordIntent(record: SubmissionRecord): Promise<void> {
    this.records.set(record.reference, { ...record });
  }

  async updateStatus(reference: string, status: SubmissionStatus, error?: string): Promise<void> {
    const current = this.records.get(reference);
    if (!current) {
      throw new Error(`No submission recorded for reference ${reference}`);
    }

    this.records.set(reference, {
      ...current,
      status,
      updated_at: nowIso(),
      ...(error === undefined ? {} : { error })
    });
  }

  async find(reference: string): Promise<SubmissionRecord | null> {
    const record = this.records.get(reference);
    return record ? { ...record } : null;
  }
}
