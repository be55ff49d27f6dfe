import { describe, expect, it, jest } from '@jest/globals';
import { createHash } from 'crypto';
import { fallClassic, NOW, seededStore, testContext, validDraft } from '../../testing/fixtures';
import { commitSignup } from '../committer';

jest.mock('../../shared/logger', () => ({
  logError: jest.fn(),
  logInfo: jest.fn(),
  logWarn: jest.fn()
}));

const nowIso = NOW.toISOString();

const signupOf = (store: ReturnType<typeof seededStore>, accountId: string, eventId: string) =>
  store.allSignups().find((s) => s.accountId === accountId && s.eventId === eventId);

describe('commitSignup', () => {
  it('writes the signups, partner mirror, approver requests and answers in one transaction', async () => {
    const store = seededStore();
    const ctx = testContext(store);

    const outcome = await commitSignup(ctx, 'alice', 't1', validDraft());

    if (!outcome.ok) throw new Error(`expected success, got ${outcome.reason}`);
    expect(store.transactions).toHaveLength(1);
    expect(outcome.result.signups).toEqual([
      { eventId: 'e1', partnerId: null },
      { eventId: 'e2', partnerId: 'ben' }
    ]);
    expect(signupOf(store, 'alice', 'e2')).toEqual({
      accountId: 'alice',
      tournamentId: 't1',
      eventId: 'e2',
      going: true,
      partnerId: 'ben',
      bringingApprover: true,
      approverId: null,
      createdAt: nowIso
    });
    expect(signupOf(store, 'ben', 'e2')).toEqual({
      accountId: 'ben',
      tournamentId: 't1',
      eventId: 'e2',
      going: true,
      partnerId: 'alice',
      bringingApprover: false,
      approverId: null,
      createdAt: nowIso
    });
    expect(store.allApproverRequests().map((r) => r.eventId)).toEqual(['e1', 'e2']);
    expect(store.allResponses().map((r) => [r.fieldId, r.response])).toEqual([
      ['f1', 'Gwen Nguyen 555-0100'],
      ['f2', 'None']
    ]);
  });

  it('derives confirmation and transaction ids from actor, tournament and time', async () => {
    const ctx = testContext(seededStore());

    const outcome = await commitSignup(ctx, 'alice', 't1', validDraft());

    if (!outcome.ok) throw new Error('expected success');
    const seed = `alice-t1-${nowIso}`;
    const hex = (value: string) => createHash('sha256').update(value).digest('hex').toUpperCase();
    expect(outcome.result.confirmationId).toBe(hex(seed).slice(0, 16));
    expect(outcome.result.transactionId).toBe(hex(`${seed}-2`).slice(0, 24));
    expect(outcome.result.confirmationId).toMatch(/^[0-9A-F]{16}$/);
    expect(outcome.result.submittedAt).toBe(nowIso);
  });

  it('updates rows in place when the same draft is committed twice', async () => {
    const store = seededStore();
    const ctx = testContext(store);

    await commitSignup(ctx, 'alice', 't1', validDraft());
    const second = await commitSignup(ctx, 'alice', 't1', validDraft());

    expect(second.ok).toBe(true);
    expect(store.allSignups()).toHaveLength(3);
    expect(store.allApproverRequests()).toHaveLength(2);
    expect(store.allResponses()).toHaveLength(2);
    expect(store.transactions[1].some((write) => write.kind === 'createApproverRequest')).toBe(false);
  });

  it('leaves an existing approver request untouched', async () => {
    const existing = {
      childId: 'alice',
      tournamentId: 't1',
      eventId: 'e1',
      approverId: 'gwen',
      accepted: true,
      decidedAt: '2026-10-02T00:00:00.000Z'
    };
    const store = seededStore().seedApproverRequest(existing);
    const ctx = testContext(store);

    await commitSignup(ctx, 'alice', 't1', validDraft());

    expect(store.allApproverRequests().filter((r) => r.eventId === 'e1')).toEqual([existing]);
  });

  it('repoints a partner who is already going and keeps their timestamp', async () => {
    const store = seededStore().seedSignup({
      accountId: 'ben',
      tournamentId: 't1',
      eventId: 'e2',
      going: true,
      partnerId: 'cara',
      bringingApprover: true,
      approverId: null,
      createdAt: '2026-10-01T00:00:00.000Z'
    });
    const ctx = testContext(store);

    const outcome = await commitSignup(ctx, 'alice', 't1', validDraft());

    expect(outcome.ok && outcome.warnings.map((w) => w.message)).toEqual(['Ben is already partnered with Cara Diaz']);
    expect(signupOf(store, 'ben', 'e2')).toMatchObject({
      partnerId: 'alice',
      bringingApprover: true,
      createdAt: '2026-10-01T00:00:00.000Z'
    });
  });

  it('keeps an approver already chosen for the actor', async () => {
    const store = seededStore().seedSignup({
      accountId: 'alice',
      tournamentId: 't1',
      eventId: 'e1',
      going: true,
      partnerId: null,
      bringingApprover: true,
      approverId: 'gwen',
      createdAt: '2026-10-01T00:00:00.000Z'
    });
    const ctx = testContext(store);

    await commitSignup(ctx, 'alice', 't1', validDraft());

    expect(signupOf(store, 'alice', 'e1')?.approverId).toBe('gwen');
  });

  it('replaces an earlier answer', async () => {
    const store = seededStore().seedResponse({
      tournamentId: 't1',
      accountId: 'alice',
      fieldId: 'f1',
      response: 'old contact',
      submittedAt: '2026-10-01T00:00:00.000Z'
    });
    const ctx = testContext(store);

    await commitSignup(ctx, 'alice', 't1', validDraft());

    const answers = store.allResponses().filter((r) => r.fieldId === 'f1');
    expect(answers).toEqual([
      { tournamentId: 't1', accountId: 'alice', fieldId: 'f1', response: 'Gwen Nguyen 555-0100', submittedAt: nowIso }
    ]);
  });

  it('removes an answer the member cleared on resubmission', async () => {
    const store = seededStore();
    const ctx = testContext(store);
    const answers = { f1: 'Gwen Nguyen 555-0100', f2: 'None' };

    await commitSignup(ctx, 'alice', 't1', validDraft({ formResponses: { ...answers, f3: 'old note' } }));
    const resubmitted = await commitSignup(ctx, 'alice', 't1', validDraft({ formResponses: { ...answers, f3: '  ' } }));

    expect(resubmitted.ok).toBe(true);
    expect(store.transactions[1]).toContainEqual({
      kind: 'deleteResponse',
      key: { tournamentId: 't1', accountId: 'alice', fieldId: 'f3' }
    });
    expect(store.allResponses().map((r) => r.fieldId)).toEqual(['f1', 'f2']);
  });

  it('writes nothing when the store fails', async () => {
    const store = seededStore();
    store.failNextTransact();
    const ctx = testContext(store);

    const outcome = await commitSignup(ctx, 'alice', 't1', validDraft());

    expect(outcome).toEqual({
      ok: false,
      reason: 'storeFailure',
      retryable: true,
      message: 'Your signup could not be saved. Nothing was changed; please submit again.'
    });
    expect(store.allSignups()).toEqual([]);
    expect(store.allApproverRequests()).toEqual([]);
    expect(store.allResponses()).toEqual([]);
  });

  it('aborts a draft that no longer validates without writing', async () => {
    const store = seededStore(fallClassic({ signupDeadline: '2026-10-19T10:00:00' }));
    const ctx = testContext(store);

    const outcome = await commitSignup(ctx, 'alice', 't1', validDraft());

    expect(outcome.ok).toBe(false);
    expect(!outcome.ok && outcome.reason).toBe('stale');
    expect(store.transactions).toEqual([]);
  });
});
