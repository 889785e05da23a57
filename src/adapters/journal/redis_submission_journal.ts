import type { SubmissionJournalPort } from '../../app/ports/submission_journal_port';
import { CHAIN_VALUES, type SubmissionRecord, type SubmissionStatus } from '../../domain/model/types';
import { nowIso } from '../../domain/utils/time';
import { isRecord } from '../http/fetch_json';
import type { RedisLike } from '../lock/redis_lock';

const SUBMISSION_KEY_PREFIX = 'tx:submission:';
const SUBMISSION_STATUS_VALUES: readonly SubmissionStatus[] = ['INTENT', 'CONFIRMED', 'FAILED', 'UNKNOWN'];

function parseRecord(raw: string): SubmissionRecord {
  const payload: unknown = JSON.parse(raw);
  if (!isRecord(payload)) {
    throw new Error('Submission record is not an object');
  }

  const { reference, chain, walletAddress, txId, attempt, status, created_at, updated_at, error } =
    payload;
  const knownChain = CHAIN_VALUES.find((value) => value === chain);
  const knownStatus = SUBMISSION_STATUS_VALUES.find((value) => value === status);
  if (
    typeof reference !== 'string' ||
    knownChain === undefined ||
    typeof walletAddress !== 'string' ||
    typeof txId !== 'string' ||
    typeof attempt !== 'number' ||
    knownStatus === undefined ||
    typeof created_at !== 'string' ||
    typeof updated_at !== 'string'
  ) {
    throw new Error('Submission record has an invalid shape');
  }

  return {
    reference,
    chain: knownChain,
    walletAddress,
    txId,
    attempt,
    status: knownStatus,
    created_at,
    updated_at,
    ...(typeof error === 'string' ? { error } : {})
  };
}

export class RedisSubmissionJournal implements SubmissionJournalPort {
  constructor(
    private readonly redis: RedisLike,
    private readonly ttlSeconds: number
  ) {}

  private async write(record: SubmissionRecord): Promise<void> {
    await this.redis.set(`${SUBMISSION_KEY_PREFIX}${record.reference}`, JSON.stringify(record), {
      EX: this.ttlSeconds
    });
  }

  async recordIntent(record: SubmissionRecord): Promise<void> {
    await this.write(record);
  }

  async updateStatus(reference: string, status: SubmissionStatus, error?: string): Promise<void> {
    const current = await this.find(reference);
    if (!current) {
      throw new Error(`No submission recorded for reference ${reference}`);
    }

    await this.write({
      ...current,
      status,
      updated_at: nowIso(),
      ...(error === undefined ? {} : { error })
    });
  }

  async find(reference: string): Promise<SubmissionRecord | null> {
    const raw = await this.redis.get(`${SUBMISSION_KEY_PREFIX}${reference}`);
    return raw === null ? null : parseRecord(raw);
  }
}
