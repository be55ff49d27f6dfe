import { z } from 'zod';
import { ServiceContext } from '../shared/context';
import { logWarn } from '../shared/logger';
import { formatDate, normalizeTimestamp } from '../shared/time';
import { SignupDraft } from '../shared/types';
import { commitSignup, CommitResult } from './committer';
import { DraftStage, signDraft, verifyDraft } from './draftToken';
import { RequirementsSummary, summarizeRequirements } from './requirements';
import { fullName, Issue, loadEvents, validateDraft, ValidationResult } from './validator';

export type WorkflowStage = 'requirements' | 'draftEntry' | 'review' | 'finalWarning' | 'committed' | 'rejected';

export const REVIEW_ACKNOWLEDGEMENTS = ['infoAccurate', 'commitmentUnderstood'] as const;
export const FINAL_ACKNOWLEDGEMENTS = ['reviewed', 'noMistakes', 'understandsConsequences'] as const;

const acknowledgementsSchema = z.record(z.string(), z.boolean()).default({});

export const stageBodySchema = z.object({
  draftToken: z.string().optional(),
  acknowledgements: acknowledgementsSchema
});

export type StageBody = z.infer<typeof stageBodySchema>;

export interface ReviewEvent {
  eventId: string;
  name: string;
  emoji: string | null;
  partner: { accountId: string; name: string } | null;
}

export interface ReviewAnswer {
  fieldId: string;
  label: string;
  response: string;
}

export interface ReviewPayload {
  tournamentId: string;
  tournamentName: string;
  tournamentDate: string;
  events: ReviewEvent[];
  answers: ReviewAnswer[];
  bringingApprover: boolean;
}

export type WorkflowOutcome =
  | { status: 'advanced'; stage: 'draftEntry'; summary: RequirementsSummary }
  | { status: 'advanced'; stage: 'review'; review: ReviewPayload; draftToken: string; validation: ValidationResult }
  | { status: 'advanced'; stage: 'finalWarning'; review: ReviewPayload; draftToken: string; notices: string[] }
  | { status: 'advanced'; stage: 'committed'; result: CommitResult; warnings: Issue[] }
  | {
      status: 'held';
      stage: 'review' | 'finalWarning';
      reason: 'acknowledgementsMissing' | 'commitFailed';
      missingAcknowledgements: string[];
      draftToken: string;
      message: string;
    }
  | {
      status: 'rejected';
      stage: 'rejected';
      reason: 'requirementsNotMet' | 'validationFailed' | 'startOver' | 'stale';
      message: string;
      validation?: ValidationResult;
      summary?: RequirementsSummary;
    }
  | { status: 'notFound' };

const START_OVER = 'Your signup session is no longer valid. Please start the signup again from the tournament page.';

const startOver = (): WorkflowOutcome => ({ status: 'rejected', stage: 'rejected', reason: 'startOver', message: START_OVER });

const missingFrom = (required: readonly string[], acknowledgements: Record<string, boolean>) =>
  required.filter((flag) => acknowledgements[flag] !== true);

const lookupsExist = async (ctx: ServiceContext, actorId: string, tournamentId: string) => {
  const [account, tournament] = await Promise.all([ctx.store.getAccount(actorId), ctx.store.getTournament(tournamentId)]);
  return Boolean(account && tournament);
};

const buildReview = async (
  ctx: ServiceContext,
  tournamentId: string,
  draft: SignupDraft
): Promise<ReviewPayload | undefined> => {
  const tournament = await ctx.store.getTournament(tournamentId);
  if (!tournament) return undefined;

  const events = await loadEvents(ctx, draft.selectedEventIds);
  const partners = await ctx.store.getAccounts(Object.values(draft.partners));
  const partnersById = new Map(partners.map((account) => [account.accountId, account]));

  const reviewEvents = draft.selectedEventIds.map((eventId): ReviewEvent => {
    const event = events.get(eventId);
    const partner = event?.isPartnerEvent ? partnersById.get(draft.partners[eventId] ?? '') : undefined;
    return {
      eventId,
      name: event?.name ?? `Event #${eventId}`,
      emoji: event?.emoji ?? null,
      partner: partner ? { accountId: partner.accountId, name: fullName(partner) } : null
    };
  });

  const answers = tournament.questionnaire
    .map((field) => ({ fieldId: field.fieldId, label: field.label, response: (draft.formResponses[field.fieldId] ?? '').trim() }))
    .filter((answer) => answer.response.length > 0);

  const startsAt = normalizeTimestamp(tournament.startsAt, ctx.referenceTimeZone);

  return {
    tournamentId,
    tournamentName: tournament.name,
    tournamentDate: startsAt ? formatDate(startsAt, ctx.referenceTimeZone) : tournament.startsAt,
    events: reviewEvents,
    answers,
    bringingApprover: draft.bringingApprover
  };
};

const finalNotices = (review: ReviewPayload): string[] => {
  const notices = [
    `You are committing to compete at ${review.tournamentName} on ${review.tournamentDate}.`,
    'Your coach plans travel and entries from this signup. Withdrawing later affects your team.'
  ];
  for (const event of review.events) {
    if (event.partner) {
      notices.push(`${event.partner.name} will be signed up as your partner for ${event.name}.`);
    }
  }
  if (review.bringingApprover) {
    notices.push('You said you are bringing an approver. Choose them after submitting.');
  }
  return notices;
};

/** Requirements -> DraftEntry. */
export const startSignup = async (ctx: ServiceContext, actorId: string, tournamentId: string): Promise<WorkflowOutcome> => {
  const outcome = await summarizeRequirements(ctx, actorId, tournamentId);
  if (!outcome.ok) return { status: 'notFound' };

  if (!outcome.summary.canProceed) {
    return {
      status: 'rejected',
      stage: 'rejected',
      reason: 'requirementsNotMet',
      message: 'You do not meet the requirements to sign up for this tournament yet.',
      summary: outcome.summary
    };
  }
  return { status: 'advanced', stage: 'draftEntry', summary: outcome.summary };
};

export type ValidateOutcome = { status: 'notFound' } | { status: 'validated'; validation: ValidationResult };

/** Dry run of the validation engine, with missing records reported separately. */
export const checkDraft = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  draft: SignupDraft
): Promise<ValidateOutcome> => {
  if (!(await lookupsExist(ctx, actorId, tournamentId))) return { status: 'notFound' };
  return { status: 'validated', validation: await validateDraft(ctx, actorId, tournamentId, draft) };
};

/** DraftEntry -> Review. */
export const submitForReview = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  draft: SignupDraft
): Promise<WorkflowOutcome> => {
  const checked = await checkDraft(ctx, actorId, tournamentId, draft);
  if (checked.status === 'notFound') return checked;

  const { validation } = checked;
  if (!validation.valid) {
    return {
      status: 'rejected',
      stage: 'rejected',
      reason: 'validationFailed',
      message: 'Your signup has problems that must be fixed before continuing.',
      validation
    };
  }

  const review = await buildReview(ctx, tournamentId, draft);
  if (!review) return { status: 'notFound' };

  return {
    status: 'advanced',
    stage: 'review',
    review,
    draftToken: signDraft(ctx, actorId, tournamentId, 'review', draft),
    validation
  };
};

const openToken = (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  token: string | undefined,
  stage: DraftStage
) => {
  const verified = verifyDraft(ctx, token, actorId, tournamentId, stage);
  if (!verified.ok) {
    logWarn('signupWorkflow.tokenRejected', { actorId, tournamentId, stage, reason: verified.reason });
  }
  return verified;
};

/** Review -> FinalWarning. The draft is re-signed for the final stage. */
export const confirmReview = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  body: StageBody
): Promise<WorkflowOutcome> => {
  const verified = openToken(ctx, actorId, tournamentId, body.draftToken, 'review');
  if (!verified.ok || !body.draftToken) return startOver();

  const missing = missingFrom(REVIEW_ACKNOWLEDGEMENTS, body.acknowledgements);
  if (missing.length > 0) {
    return {
      status: 'held',
      stage: 'review',
      reason: 'acknowledgementsMissing',
      missingAcknowledgements: missing,
      draftToken: body.draftToken,
      message: 'You must check all confirmation boxes to proceed.'
    };
  }

  const review = await buildReview(ctx, tournamentId, verified.draft);
  if (!review) return { status: 'notFound' };

  return {
    status: 'advanced',
    stage: 'finalWarning',
    review,
    draftToken: signDraft(ctx, actorId, tournamentId, 'finalWarning', verified.draft),
    notices: finalNotices(review)
  };
};

/** FinalWarning -> Committed. */
export const confirmFinal = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  body: StageBody
): Promise<WorkflowOutcome> => {
  const verified = openToken(ctx, actorId, tournamentId, body.draftToken, 'finalWarning');
  if (!verified.ok || !body.draftToken) return startOver();

  const missing = missingFrom(FINAL_ACKNOWLEDGEMENTS, body.acknowledgements);
  if (missing.length > 0) {
    return {
      status: 'held',
      stage: 'finalWarning',
      reason: 'acknowledgementsMissing',
      missingAcknowledgements: missing,
      draftToken: body.draftToken,
      message: 'You must check all confirmation boxes to submit.'
    };
  }

  const outcome = await commitSignup(ctx, actorId, tournamentId, verified.draft);
  if (outcome.ok) {
    return { status: 'advanced', stage: 'committed', result: outcome.result, warnings: outcome.warnings };
  }
  if (outcome.reason === 'stale') {
    return {
      status: 'rejected',
      stage: 'rejected',
      reason: 'stale',
      message: 'Something changed since you reviewed this signup. Please review the problems and start again.',
      validation: outcome.validation
    };
  }
  return {
    status: 'held',
    stage: 'finalWarning',
    reason: 'commitFailed',
    missingAcknowledgements: [],
    draftToken: body.draftToken,
    message: outcome.message
  };
};
