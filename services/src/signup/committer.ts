import { createHash } from 'crypto';
import { ServiceContext } from '../shared/context';
import { logError } from '../shared/logger';
import { StoreWrite } from '../shared/store';
import { PersistedSignup, SignupDraft } from '../shared/types';
import { Issue, loadEvents, validateDraft, ValidationResult } from './validator';

export interface CommittedSignup {
  eventId: string;
  partnerId: string | null;
}

export interface CommitResult {
  tournamentId: string;
  signups: CommittedSignup[];
  bringingApprover: boolean;
  confirmationId: string;
  transactionId: string;
  submittedAt: string;
}

export type CommitOutcome =
  | { ok: true; result: CommitResult; warnings: Issue[] }
  | { ok: false; reason: 'stale'; validation: ValidationResult }
  | { ok: false; reason: 'storeFailure'; retryable: true; message: string };

const digest = (value: string, length: number) =>
  createHash('sha256').update(value).digest('hex').slice(0, length).toUpperCase();

export const confirmationIds = (actorId: string, tournamentId: string, submittedAt: string, signupCount: number) => {
  const seed = `${actorId}-${tournamentId}-${submittedAt}`;
  return {
    confirmationId: digest(seed, 16),
    transactionId: digest(`${seed}-${signupCount}`, 24)
  };
};

const planWrites = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  draft: SignupDraft,
  submittedAt: string
) => {
  const writes: StoreWrite[] = [];
  const signups: CommittedSignup[] = [];
  const events = await loadEvents(ctx, draft.selectedEventIds);

  for (const eventId of draft.selectedEventIds) {
    const partnerId = events.get(eventId)?.isPartnerEvent ? draft.partners[eventId] ?? null : null;
    const existing = await ctx.store.getSignup({ accountId: actorId, tournamentId, eventId });

    writes.push({
      kind: 'putSignup',
      signup: {
        accountId: actorId,
        tournamentId,
        eventId,
        going: true,
        partnerId,
        bringingApprover: draft.bringingApprover,
        approverId: existing?.approverId ?? null,
        createdAt: submittedAt
      }
    });
    signups.push({ eventId, partnerId });

    if (partnerId) {
      const mirror = await ctx.store.getSignup({ accountId: partnerId, tournamentId, eventId });
      const partnerSignup: PersistedSignup = mirror?.going
        ? { ...mirror, partnerId: actorId }
        : {
            accountId: partnerId,
            tournamentId,
            eventId,
            going: true,
            partnerId: actorId,
            bringingApprover: mirror?.bringingApprover ?? false,
            approverId: mirror?.approverId ?? null,
            createdAt: submittedAt
          };
      writes.push({ kind: 'putSignup', signup: partnerSignup });
    }

    const request = await ctx.store.getApproverRequest({ childId: actorId, tournamentId, eventId });
    if (!request) {
      writes.push({
        kind: 'createApproverRequest',
        request: { childId: actorId, tournamentId, eventId, approverId: null, accepted: false, decidedAt: null }
      });
    }
  }

  const tournament = await ctx.store.getTournament(tournamentId);
  const knownFields = new Set(tournament?.questionnaire.map((field) => field.fieldId) ?? []);
  for (const [fieldId, answer] of Object.entries(draft.formResponses)) {
    if (!knownFields.has(fieldId)) continue;
    const response = answer.trim();
    // A cleared answer removes the stored one.
    if (response.length === 0) {
      writes.push({ kind: 'deleteResponse', key: { tournamentId, accountId: actorId, fieldId } });
      continue;
    }
    writes.push({
      kind: 'replaceResponse',
      response: { tournamentId, accountId: actorId, fieldId, response, submittedAt }
    });
  }

  return { writes, signups };
};

/**
 * Re-validates the draft against current data and persists it in one store transaction.
 * Re-submitting the same draft updates rows in place. Outcomes are returned, never thrown.
 */
export const commitSignup = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  draft: SignupDraft
): Promise<CommitOutcome> => {
  const validation = await validateDraft(ctx, actorId, tournamentId, draft);
  if (!validation.valid) {
    return { ok: false, reason: 'stale', validation };
  }

  const submittedAt = ctx.now().toISOString();
  try {
    const { writes, signups } = await planWrites(ctx, actorId, tournamentId, draft, submittedAt);
    await ctx.store.transact(writes);

    return {
      ok: true,
      result: {
        tournamentId,
        signups,
        bringingApprover: draft.bringingApprover,
        submittedAt,
        ...confirmationIds(actorId, tournamentId, submittedAt, signups.length)
      },
      warnings: validation.warnings
    };
  } catch (err) {
    logError('commitSignup.failed', { actorId, tournamentId, error: String(err) });
    return {
      ok: false,
      reason: 'storeFailure',
      retryable: true,
      message: 'Your signup could not be saved. Nothing was changed; please submit again.'
    };
  }
};
