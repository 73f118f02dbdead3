import { describe, it, expect, beforeEach } from 'vitest';
import { deadLetterRepository, type CreateDeadLetterInput } from '../../src/modules/webhooks/dead-letter-repository';
import { getDatabase } from '../../src/storage/database';
import { resetDatabase } from '../helpers';

function entry(overrides: Partial<CreateDeadLetterInput> = {}): CreateDeadLetterInput {
  return {
    jobType: 'webhook_delivery',
    webhookId: 'whk_1',
    deliveryId: 'dlv_1',
    event: 'content.created',
    targetUrl: 'https://a.test',
    payload: '{"event":"content.created"}',
    failureReason: 'HTTP 500',
    retryCount: 5,
    firstFailedAt: 1000,
    lastFailedAt: 2000,
    ...overrides,
  };
}

describe('DeadLetterRepository', () => {
  beforeEach(() => {
    resetDatabase();
  });

  it('should store and load entries', () => {
    const created = deadLetterRepository.create(entry());

    expect(created.id).toMatch(/^dlq_/);
    expect(deadLetterRepository.getById(created.id)).toEqual(created);
    expect(deadLetterRepository.getById('dlq_missing')).toBeNull();
  });

  it('should list the most recent failures first', () => {
    const older = deadLetterRepository.create(entry({ lastFailedAt: 1000 }));
    const newer = deadLetterRepository.create(entry({ lastFailedAt: 5000 }));

    expect(deadLetterRepository.list().map((e) => e.id)).toEqual([newer.id, older.id]);
  });

  it('should filter by failure reason substring', () => {
    const timeout = deadLetterRepository.create(entry({ failureReason: 'Timeout after 15000ms' }));
    deadLetterRepository.create(entry({ failureReason: 'HTTP 503' }));

    expect(deadLetterRepository.list({ search: 'timeout' }).map((e) => e.id)).toEqual([timeout.id]);
  });

  it('should treat LIKE wildcards in the search as literals', () => {
    deadLetterRepository.create(entry({ failureReason: 'HTTP 500' }));
    const literal = deadLetterRepository.create(entry({ failureReason: '100% failed' }));

    expect(deadLetterRepository.list({ search: '%' }).map((e) => e.id)).toEqual([literal.id]);
    expect(deadLetterRepository.list({ search: '_' })).toEqual([]);
  });

  it('should filter by retry count range', () => {
    deadLetterRepository.create(entry({ retryCount: 1, lastFailedAt: 1 }));
    const three = deadLetterRepository.create(entry({ retryCount: 3, lastFailedAt: 3 }));
    const five = deadLetterRepository.create(entry({ retryCount: 5, lastFailedAt: 5 }));

    expect(deadLetterRepository.list({ retryCountMin: 3 }).map((e) => e.id)).toEqual([five.id, three.id]);
    expect(deadLetterRepository.list({ retryCountMin: 2, retryCountMax: 4 }).map((e) => e.id)).toEqual([three.id]);
  });

  it('should limit results', () => {
    for (let i = 0; i < 5; i++) {
      deadLetterRepository.create(entry({ lastFailedAt: i }));
    }

    expect(deadLetterRepository.list({ limit: 2 })).toHaveLength(2);
    expect(deadLetterRepository.count()).toBe(5);
  });

  it('should only list webhook delivery entries', () => {
    deadLetterRepository.create(entry({ jobType: 'search_reindex' }));

    expect(deadLetterRepository.list()).toEqual([]);
    expect(deadLetterRepository.count()).toBe(0);
    const row = getDatabase().prepare('SELECT COUNT(*) as count FROM dead_letter_entries').get() as { count: number };
    expect(row.count).toBe(1);
  });
});
