import { describe, expect, it, jest } from '@jest/globals';
import { fallClassic, NOW, seededStore, testContext } from '../../testing/fixtures';
import { submitResult } from '../resultService';

jest.mock('../../shared/logger', () => ({
  logError: jest.fn()
}));

const earlierBid = {
  accountId: 'alice',
  tournamentId: 't0',
  bid: true,
  rank: 1,
  stage: 5,
  points: 25,
  submittedAt: '2026-09-01T00:00:00.000Z'
};

describe('submitResult', () => {
  it('stores the performance and adds to the running totals', async () => {
    const store = seededStore();
    store.addAccount({ accountId: 'alice', firstName: 'Alice', lastName: 'Nguyen', role: 0, claimed: true, points: 10, bids: 0 });

    const outcome = await submitResult(testContext(store), 'alice', 't1', { bid: true, rank: 2, stage: 'Finals' });

    expect(outcome).toEqual({
      ok: true,
      performance: {
        accountId: 'alice',
        tournamentId: 't1',
        bid: true,
        rank: 2,
        stage: 5,
        points: 25,
        submittedAt: NOW.toISOString()
      },
      totals: { points: 35, bids: 1 }
    });
    expect(await store.getAccount('alice')).toMatchObject({ points: 35, bids: 1 });
  });

  it('awards the smaller bonus after an earlier bid', async () => {
    const store = seededStore().seedPerformance(earlierBid);

    const outcome = await submitResult(testContext(store), 'alice', 't1', { bid: true, rank: 5, stage: 'Quarter Finals' });

    expect(outcome.ok && outcome.performance.points).toBe(12);
  });

  it('accepts one submission per tournament', async () => {
    const store = seededStore();
    const ctx = testContext(store);

    await submitResult(ctx, 'alice', 't1', { bid: false, rank: 3, stage: 'None' });
    const second = await submitResult(ctx, 'alice', 't1', { bid: false, rank: 3, stage: 'None' });

    expect(second).toEqual({ ok: false, reason: 'alreadySubmitted' });
    expect(await store.getAccount('alice')).toMatchObject({ points: 4, bids: 0 });
  });

  it.each([
    [{ resultsClosed: true }],
    [{ performanceDeadline: '2026-10-19T11:00:00' }]
  ])('refuses results once collection is closed (%o)', async (overrides) => {
    const store = seededStore(fallClassic(overrides));

    await expect(
      submitResult(testContext(store), 'alice', 't1', { bid: false, rank: 1, stage: 'None' })
    ).resolves.toEqual({ ok: false, reason: 'resultsClosed' });
  });

  it('reports unknown records', async () => {
    await expect(
      submitResult(testContext(seededStore()), 'alice', 'missing', { bid: false, rank: 1, stage: 'None' })
    ).resolves.toEqual({ ok: false, reason: 'notFound' });
  });

  it('leaves totals alone when the write fails', async () => {
    const store = seededStore();
    store.failNextTransact();

    const outcome = await submitResult(testContext(store), 'alice', 't1', { bid: true, rank: 1, stage: 'Finals' });

    expect(outcome).toEqual({ ok: false, reason: 'storeFailure' });
    expect(await store.getPerformance('alice', 't1')).toBeUndefined();
    expect((await store.getAccount('alice'))?.points).toBeUndefined();
  });
});
