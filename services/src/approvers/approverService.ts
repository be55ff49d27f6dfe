import { z } from 'zod';
import { ServiceContext } from '../shared/context';
import { logError } from '../shared/logger';
import { StoreWrite, tryTransact } from '../shared/store';
import { ApproverRequest, ApproverRequestStatus } from '../shared/types';
import { fullName } from '../signup/validator';

export const approverStatus = (request: ApproverRequest): ApproverRequestStatus => {
  if (!request.approverId) return 'unassigned';
  if (!request.decidedAt) return 'pending';
  return request.accepted ? 'accepted' : 'declined';
};

export interface ApproverOption {
  accountId: string;
  name: string;
}

export const listApproverOptions = async (ctx: ServiceContext, childId: string): Promise<ApproverOption[]> => {
  const links = await ctx.store.listGuardianLinks(childId);
  const guardians = await ctx.store.getAccounts(links.map((link) => link.guardianId));
  return guardians
    .map((guardian) => ({ accountId: guardian.accountId, name: fullName(guardian) }))
    .sort((a, b) => a.name.localeCompare(b.name));
};

export type SelectApproverOutcome =
  | { ok: true; approverId: string; signupsUpdated: number; requestsAssigned: number }
  | { ok: false; reason: 'notFound' | 'notLinked' | 'noSignups' | 'storeFailure' };

/**
 * Names one of the child's linked guardians as approver for every event they are going to
 * in the tournament, and fills in every request that has no approver yet.
 */
export const selectApprover = async (
  ctx: ServiceContext,
  childId: string,
  tournamentId: string,
  approverId: string
): Promise<SelectApproverOutcome> => {
  const tournament = await ctx.store.getTournament(tournamentId);
  if (!tournament) return { ok: false, reason: 'notFound' };

  const links = await ctx.store.listGuardianLinks(childId);
  if (!links.some((link) => link.guardianId === approverId)) return { ok: false, reason: 'notLinked' };

  const going = (await ctx.store.listSignups(tournamentId, childId)).filter((signup) => signup.going);
  if (going.length === 0) return { ok: false, reason: 'noSignups' };

  const unassigned = (await ctx.store.listApproverRequestsForChild(tournamentId, childId)).filter(
    (request) => request.approverId === null
  );

  const writes: StoreWrite[] = [
    ...going.map(
      (signup): StoreWrite => ({ kind: 'putSignup', signup: { ...signup, bringingApprover: true, approverId } })
    ),
    ...unassigned.map((request): StoreWrite => ({ kind: 'putApproverRequest', request: { ...request, approverId } }))
  ];
  const saved = await tryTransact(ctx.store, writes);
  if (!saved.ok) {
    logError('selectApprover.failed', { childId, tournamentId, error: saved.error });
    return { ok: false, reason: 'storeFailure' };
  }

  return { ok: true, approverId, signupsUpdated: going.length, requestsAssigned: unassigned.length };
};

export interface ApproverRequestView {
  childId: string;
  childName: string;
  tournamentId: string;
  tournamentName: string;
  tournamentDate: string;
  eventId: string;
  status: ApproverRequestStatus;
}

export type ListApproverRequestsOutcome =
  | { ok: true; requests: ApproverRequestView[] }
  | { ok: false; reason: 'notFound' | 'notGuardian' };

const guardianCheck = async (ctx: ServiceContext, approverId: string) => {
  const account = await ctx.store.getAccount(approverId);
  if (!account) return 'notFound' as const;
  return account.isGuardian ? undefined : ('notGuardian' as const);
};

export const listApproverRequests = async (
  ctx: ServiceContext,
  approverId: string
): Promise<ListApproverRequestsOutcome> => {
  const denied = await guardianCheck(ctx, approverId);
  if (denied) return { ok: false, reason: denied };

  const requests = await ctx.store.listApproverRequestsForApprover(approverId);
  const children = await ctx.store.getAccounts(requests.map((request) => request.childId));
  const childrenById = new Map(children.map((child) => [child.accountId, child]));

  const tournamentIds = Array.from(new Set(requests.map((request) => request.tournamentId)));
  const tournaments = await Promise.all(tournamentIds.map((id) => ctx.store.getTournament(id)));
  const tournamentsById = new Map(tournamentIds.map((id, i) => [id, tournaments[i]] as const));

  return {
    ok: true,
    requests: requests.map((request) => {
      const child = childrenById.get(request.childId);
      const tournament = tournamentsById.get(request.tournamentId);
      return {
        childId: request.childId,
        childName: child ? fullName(child) : '',
        tournamentId: request.tournamentId,
        tournamentName: tournament?.name ?? '',
        tournamentDate: tournament?.startsAt ?? '',
        eventId: request.eventId,
        status: approverStatus(request)
      };
    })
  };
};

export const decisionsSchema = z.object({
  decisions: z
    .array(
      z.object({
        childId: z.string().min(1),
        tournamentId: z.string().min(1),
        eventId: z.string().min(1),
        decision: z.enum(['accept', 'decline'])
      })
    )
    .min(1)
    // One transaction cannot write the same request twice.
    .superRefine((decisions, issues) => {
      const seen = new Set<string>();
      decisions.forEach((decision, index) => {
        const key = [decision.childId, decision.tournamentId, decision.eventId].join('#');
        if (seen.has(key)) {
          issues.addIssue({ code: z.ZodIssueCode.custom, path: [index], message: 'Request decided more than once' });
        }
        seen.add(key);
      });
    })
});

export type ApproverDecision = z.infer<typeof decisionsSchema>['decisions'][number];

export type DecideOutcome =
  | { ok: true; decided: ApproverRequestStatus[] }
  | { ok: false; reason: 'notFound' | 'notGuardian' | 'storeFailure' }
  | { ok: false; reason: 'unknownRequests'; unknown: ApproverDecision[] };

/** Applies every decision in one transaction, or none if any targets a request not addressed to this approver. */
export const decideApproverRequests = async (
  ctx: ServiceContext,
  approverId: string,
  decisions: ApproverDecision[]
): Promise<DecideOutcome> => {
  const denied = await guardianCheck(ctx, approverId);
  if (denied) return { ok: false, reason: denied };

  const decidedAt = ctx.now().toISOString();
  const updated: ApproverRequest[] = [];
  const unknown: ApproverDecision[] = [];

  for (const decision of decisions) {
    const request = await ctx.store.getApproverRequest(decision);
    if (!request || request.approverId !== approverId) {
      unknown.push(decision);
      continue;
    }
    updated.push({ ...request, accepted: decision.decision === 'accept', decidedAt });
  }

  if (unknown.length > 0) return { ok: false, reason: 'unknownRequests', unknown };

  const saved = await tryTransact(
    ctx.store,
    updated.map((request): StoreWrite => ({ kind: 'putApproverRequest', request }))
  );
  if (!saved.ok) {
    logError('decideApproverRequests.failed', { approverId, error: saved.error });
    return { ok: false, reason: 'storeFailure' };
  }
  return { ok: true, decided: updated.map(approverStatus) };
};
