import { z } from 'zod';
import { ServiceContext } from '../shared/context';
import { logError } from '../shared/logger';
import { tryTransact } from '../shared/store';
import { normalizeTimestamp } from '../shared/time';
import { Performance } from '../shared/types';
import { ELIMINATION_STAGES, scoreResult, stageIndex } from './points';

export const resultSchema = z.object({
  bid: z.boolean(),
  rank: z.number().int().positive(),
  stage: z.enum(ELIMINATION_STAGES).default('None')
});

export type ResultInput = z.infer<typeof resultSchema>;

export type SubmitResultOutcome =
  | { ok: true; performance: Performance; totals: { points: number; bids: number } }
  | { ok: false; reason: 'notFound' | 'resultsClosed' | 'alreadySubmitted' | 'storeFailure' };

const resultsClosed = (ctx: ServiceContext, closed: boolean | undefined, deadline: string | undefined) => {
  if (closed) return true;
  if (!deadline) return false;
  const at = normalizeTimestamp(deadline, ctx.referenceTimeZone);
  return at !== undefined && at.getTime() < ctx.now().getTime();
};

/** Records one result per member and tournament, adding its points to the member's running totals. */
export const submitResult = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  input: ResultInput
): Promise<SubmitResultOutcome> => {
  const [account, tournament] = await Promise.all([ctx.store.getAccount(actorId), ctx.store.getTournament(tournamentId)]);
  if (!account || !tournament) return { ok: false, reason: 'notFound' };

  if (resultsClosed(ctx, tournament.resultsClosed, tournament.performanceDeadline)) {
    return { ok: false, reason: 'resultsClosed' };
  }
  if (await ctx.store.getPerformance(actorId, tournamentId)) {
    return { ok: false, reason: 'alreadySubmitted' };
  }

  const history = await ctx.store.listPerformances(actorId);
  const points = scoreResult({ ...input, hadEarlierBid: history.some((p) => p.bid) });
  const bids = input.bid ? 1 : 0;

  const performance: Performance = {
    accountId: actorId,
    tournamentId,
    bid: input.bid,
    rank: input.rank,
    stage: stageIndex(input.stage),
    points,
    submittedAt: ctx.now().toISOString()
  };

  // The conditional create fails the whole write if a concurrent submission got there first.
  const saved = await tryTransact(ctx.store, [
    { kind: 'createPerformance', performance },
    { kind: 'addAccountTotals', accountId: actorId, points, bids }
  ]);
  if (!saved.ok) {
    logError('submitResult.failed', { actorId, tournamentId, error: saved.error });
    return { ok: false, reason: 'storeFailure' };
  }

  return {
    ok: true,
    performance,
    totals: { points: (account.points ?? 0) + points, bids: (account.bids ?? 0) + bids }
  };
};
