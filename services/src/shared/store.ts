import {
  Account,
  ApproverRequest,
  ApproverRequestKey,
  EventMembership,
  EventTrack,
  GuardianLink,
  Performance,
  PersistedSignup,
  QuestionnaireResponse,
  SignupKey,
  Tournament
} from './types';

export type ResponseKey = Pick<QuestionnaireResponse, 'tournamentId' | 'accountId' | 'fieldId'>;

/**
 * A single write inside a store transaction. `createApproverRequest` and
 * `createPerformance` only succeed when no row exists under the key; a
 * conflict cancels the whole transaction.
 */
export type StoreWrite =
  | { kind: 'putSignup'; signup: PersistedSignup }
  | { kind: 'createApproverRequest'; request: ApproverRequest }
  | { kind: 'putApproverRequest'; request: ApproverRequest }
  | { kind: 'replaceResponse'; response: QuestionnaireResponse }
  | { kind: 'deleteResponse'; key: ResponseKey }
  | { kind: 'createPerformance'; performance: Performance }
  | { kind: 'addAccountTotals'; accountId: string; points: number; bids: number };

/**
 * Typed access to the entity store. Lookups return `undefined` for missing rows;
 * `transact` applies every write or none of them and rejects on any fault.
 */
export interface SignupStore {
  getAccount(accountId: string): Promise<Account | undefined>;
  getAccounts(accountIds: string[]): Promise<Account[]>;
  getTournament(tournamentId: string): Promise<Tournament | undefined>;
  getEvent(eventId: string): Promise<EventTrack | undefined>;
  listMemberships(accountId: string): Promise<EventMembership[]>;
  listEventMembers(eventId: string): Promise<EventMembership[]>;
  getSignup(key: SignupKey): Promise<PersistedSignup | undefined>;
  listSignups(tournamentId: string, accountId: string): Promise<PersistedSignup[]>;
  getApproverRequest(key: ApproverRequestKey): Promise<ApproverRequest | undefined>;
  listApproverRequestsForChild(tournamentId: string, childId: string): Promise<ApproverRequest[]>;
  listApproverRequestsForApprover(approverId: string): Promise<ApproverRequest[]>;
  listGuardianLinks(childId: string): Promise<GuardianLink[]>;
  getPerformance(accountId: string, tournamentId: string): Promise<Performance | undefined>;
  listPerformances(accountId: string): Promise<Performance[]>;
  transact(writes: StoreWrite[]): Promise<void>;
}

export type TransactOutcome = { ok: true } | { ok: false; error: string };

/** Runs `transact`, reporting a store fault as a value so callers can answer it as retryable. */
export const tryTransact = async (store: SignupStore, writes: StoreWrite[]): Promise<TransactOutcome> => {
  try {
    await store.transact(writes);
    return { ok: true };
  } catch (err) {
    return { ok: false, error: String(err) };
  }
};
