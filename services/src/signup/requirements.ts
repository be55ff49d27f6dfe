import { ServiceContext } from '../shared/context';
import { formatDate, formatDeadline, normalizeTimestamp, wholeHoursBetween } from '../shared/time';
import { eventLabel, pluralize } from './validator';

export interface RequirementCheck {
  met: boolean;
  message: string;
  action: string | null;
}

export interface RequirementsSummary {
  tournamentName: string;
  tournamentDate: string;
  requirements: {
    isEventMember: RequirementCheck;
    withinDeadline: RequirementCheck;
    questionnaireExists: RequirementCheck;
  };
  canProceed: boolean;
}

export type RequirementsOutcome = { ok: true; summary: RequirementsSummary } | { ok: false; reason: 'notFound' };

const deadlineCheck = (ctx: ServiceContext, signupDeadline: string): RequirementCheck => {
  const deadline = normalizeTimestamp(signupDeadline, ctx.referenceTimeZone);
  if (!deadline) {
    return { met: false, message: 'Closed (deadline not set)', action: 'Contact an administrator' };
  }

  const now = ctx.now();
  const formatted = formatDeadline(deadline, ctx.referenceTimeZone);
  if (deadline.getTime() < now.getTime()) {
    return {
      met: false,
      message: `Closed (deadline was ${formatted}, ${pluralize(wholeHoursBetween(deadline, now), 'hour')} ago)`,
      action: 'Contact your coach if you need an exception'
    };
  }

  return {
    met: true,
    message: `Open (closes ${formatted} - ${pluralize(wholeHoursBetween(now, deadline), 'hour')} remaining)`,
    action: null
  };
};

/** Read-only checklist shown before a member starts filling in a signup. */
export const summarizeRequirements = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string
): Promise<RequirementsOutcome> => {
  const [account, tournament] = await Promise.all([ctx.store.getAccount(actorId), ctx.store.getTournament(tournamentId)]);
  if (!account || !tournament) {
    return { ok: false, reason: 'notFound' };
  }

  const memberships = (await ctx.store.listMemberships(actorId)).filter((m) => m.active);
  const events = await Promise.all(memberships.map((m) => ctx.store.getEvent(m.eventId)));
  const eventNames = memberships.map((m, i) => eventLabel(m.eventId, events[i]));

  const isEventMember: RequirementCheck =
    memberships.length > 0
      ? {
          met: true,
          message: `You are a member of ${pluralize(memberships.length, 'event')}: ${eventNames.join(', ')}`,
          action: null
        }
      : { met: false, message: 'You must join at least one event first', action: 'Visit the Events page to join an event' };

  const withinDeadline = deadlineCheck(ctx, tournament.signupDeadline);

  const hasQuestionnaire = tournament.questionnaire.length > 0;
  const questionnaireExists: RequirementCheck = hasQuestionnaire
    ? { met: true, message: 'Signup form is ready', action: null }
    : {
        met: false,
        message: 'Signup form not yet created',
        action: 'Contact an administrator to set up the signup form'
      };

  const startsAt = normalizeTimestamp(tournament.startsAt, ctx.referenceTimeZone);

  return {
    ok: true,
    summary: {
      tournamentName: tournament.name,
      tournamentDate: startsAt ? formatDate(startsAt, ctx.referenceTimeZone) : tournament.startsAt,
      requirements: { isEventMember, withinDeadline, questionnaireExists },
      canProceed: isEventMember.met && withinDeadline.met && questionnaireExists.met
    }
  };
};
