import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { handler } from '../approverRequestsApi';
import { apiEvent, applyTestEnv } from '../../testing/events';
import { seededStore } from '../../testing/fixtures';
import { MemorySignupStore } from '../../testing/memoryStore';

// Use var to avoid TDZ with hoisted jest.mock
var mockStore: MemorySignupStore;

jest.mock('../../shared/dynamoStore', () => ({
  createDynamoStore: () => mockStore
}));

jest.mock('../../shared/observability', () => ({
  withApiMetrics: () => (fn: unknown) => fn
}));

jest.mock('../../shared/logger', () => ({
  logInfo: jest.fn(),
  logError: jest.fn()
}));

const requests = (method: string, principalId: string, body?: unknown) =>
  handler(apiEvent({ method, resource: '/approver-requests', principalId, body }));

describe('approverRequestsApi', () => {
  beforeEach(() => {
    jest.resetAllMocks();
    applyTestEnv();
    mockStore = seededStore().seedApproverRequest({
      childId: 'alice',
      tournamentId: 't1',
      eventId: 'e1',
      approverId: 'gwen',
      accepted: false,
      decidedAt: null
    });
  });

  it('lists requests for a guardian', async () => {
    const resp = await requests('GET', 'gwen');

    expect(resp.statusCode).toBe(200);
    expect(JSON.parse(resp.body).items).toEqual([
      {
        childId: 'alice',
        childName: 'Alice Nguyen',
        tournamentId: 't1',
        tournamentName: 'Fall Classic',
        tournamentDate: '2026-11-07T08:00:00',
        eventId: 'e1',
        status: 'pending'
      }
    ]);
  });

  it('forbids members who are not guardians', async () => {
    const resp = await requests('GET', 'ben');
    expect(resp.statusCode).toBe(403);
  });

  it('records decisions', async () => {
    const resp = await requests('PUT', 'gwen', {
      decisions: [{ childId: 'alice', tournamentId: 't1', eventId: 'e1', decision: 'accept' }]
    });

    expect(resp.statusCode).toBe(200);
    expect(JSON.parse(resp.body)).toEqual({ ok: true, decided: ['accepted'] });
    expect(mockStore.allApproverRequests()[0].accepted).toBe(true);
  });

  it('returns 404 for requests addressed elsewhere', async () => {
    const resp = await requests('PUT', 'gwen', {
      decisions: [{ childId: 'alice', tournamentId: 't1', eventId: 'e2', decision: 'decline' }]
    });

    expect(resp.statusCode).toBe(404);
  });

  it('rejects a request decided twice in one body', async () => {
    const resp = await requests('PUT', 'gwen', {
      decisions: [
        { childId: 'alice', tournamentId: 't1', eventId: 'e1', decision: 'accept' },
        { childId: 'alice', tournamentId: 't1', eventId: 'e1', decision: 'decline' }
      ]
    });

    expect(resp.statusCode).toBe(400);
    expect(JSON.parse(resp.body).details).toEqual(['decisions.1: Request decided more than once']);
    expect(mockStore.transactions).toEqual([]);
  });

  it('rejects an unknown decision value', async () => {
    const resp = await requests('PUT', 'gwen', {
      decisions: [{ childId: 'alice', tournamentId: 't1', eventId: 'e1', decision: 'maybe' }]
    });

    expect(resp.statusCode).toBe(400);
  });
});
