import { describe, expect, it } from 'vitest';
import type { SubmissionJournalPort } from '../../../src/app/ports/submission_journal_port';
import { MemorySubmissionJournal } from '../../../src/adapters/journal/memory_submission_journal';
import { RedisSubmissionJournal } from '../../../src/adapters/journal/redis_submission_journal';
import type { SubmissionRecord } from '../../../src/domain/model/types';
import { FakeRedis } from '../../support/fakes';

const intent: SubmissionRecord = {
  reference: 'ref-1',
  chain: 'TON',
  walletAddress: 'wallet-a',
  txId: 'tx-1',
  attempt: 1,
  status: 'INTENT',
  created_at: '2026-01-01T00:00:00.000Z',
  updated_at: '2026-01-01T00:00:00.000Z'
};

const journals: Array<[string, () => SubmissionJournalPort]> = [
  ['MemorySubmissionJournal', () => new MemorySubmissionJournal()],
  ['RedisSubmissionJournal', () => new RedisSubmissionJournal(new FakeRedis(), 3_600)]
];

describe.each(journals)('%s', (_name, createJournal) => {
  it('records an intent and finds it by reference', async () => {
    const journal = createJournal();
    await journal.recordIntent(intent);

    expect(await journal.find('ref-1')).toEqual(intent);
    expect(await journal.find('ref-2')).toBeNull();
  });

  it('overwrites the record on a later attempt', async () => {
    const journal = createJournal();
    await journal.recordIntent(intent);
    await journal.recordIntent({ ...intent, txId: 'tx-2', attempt: 2 });

    expect(await journal.find('ref-1')).toMatchObject({ txId: 'tx-2', attempt: 2, status: 'INTENT' });
  });

  it('updates the status and keeps the error', async () => {
    const journal = createJournal();
    await journal.recordIntent(intent);
    await journal.updateStatus('ref-1', 'FAILED', 'blockhash expired');

    expect(await journal.find('ref-1')).toMatchObject({
      txId: 'tx-1',
      status: 'FAILED',
      error: 'blockhash expired'
    });
  });

  it('refuses to update an unknown reference', async () => {
    await expect(createJournal().updateStatus('missing', 'CONFIRMED')).rejects.toThrowError(
      'No submission recorded for reference missing'
    );
  });
});

describe('RedisSubmissionJournal storage', () => {
  it('stores JSON under the submission key with the TTL', async () => {
    const redis = new FakeRedis();
    await new RedisSubmissionJournal(redis, 3_600).recordIntent(intent);

    expect(redis.ttls.get('tx:submission:ref-1')).toBe(3_600);
    expect(JSON.parse(redis.values.get('tx:submission:ref-1') ?? '{}')).toEqual(intent);
  });

  it('rejects a corrupted record', async () => {
    const redis = new FakeRedis();
    await redis.set('tx:submission:ref-1', JSON.stringify({ reference: 'ref-1', chain: 'ETH' }));

    await expect(new RedisSubmissionJournal(redis, 60).find('ref-1')).rejects.toThrowError(
      'Submission record has an invalid shape'
    );
  });
});
