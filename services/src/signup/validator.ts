import { ServiceContext } from '../shared/context';
import { formatDeadline, normalizeTimestamp, wholeHoursBetween } from '../shared/time';
import { Account, EventTrack, SignupDraft, Tournament } from '../shared/types';

export type IssueSeverity = 'error' | 'warning';

export interface Issue {
  field: string;
  message: string;
  fixInstructions: string;
  severity: IssueSeverity;
}

export interface ValidationResult {
  valid: boolean;
  errors: Issue[];
  warnings: Issue[];
  requirementsMet: Record<string, boolean>;
}

export const pluralize = (count: number, noun: string) => `${count} ${noun}${count === 1 ? '' : 's'}`;

export const fullName = (account: Pick<Account, 'firstName' | 'lastName'>) =>
  `${account.firstName} ${account.lastName}`.trim();

export const eventLabel = (eventId: string, event: EventTrack | undefined) => event?.name ?? `Event #${eventId}`;

class IssueCollector {
  readonly errors: Issue[] = [];
  readonly warnings: Issue[] = [];
  readonly requirementsMet: Record<string, boolean> = {};

  error(field: string, message: string, fixInstructions: string) {
    this.errors.push({ field, message, fixInstructions, severity: 'error' });
  }

  warn(field: string, message: string, fixInstructions: string) {
    this.warnings.push({ field, message, fixInstructions, severity: 'warning' });
  }

  met(requirement: string, value: boolean) {
    this.requirementsMet[requirement] = value;
  }

  result(): ValidationResult {
    return {
      valid: this.errors.length === 0,
      errors: this.errors,
      warnings: this.warnings,
      requirementsMet: this.requirementsMet
    };
  }
}

const checkAccount = (issues: IssueCollector, account: Account) => {
  if (!account.claimed) {
    issues.error(
      'account',
      'Account not fully activated',
      'Your account is not fully activated. Please complete your profile setup or contact an administrator.'
    );
    issues.met('valid_account', false);
    return;
  }
  issues.met('valid_account', true);
};

const checkTournament = (ctx: ServiceContext, issues: IssueCollector, tournament: Tournament) => {
  const now = ctx.now();
  const deadline = normalizeTimestamp(tournament.signupDeadline, ctx.referenceTimeZone);

  if (!deadline) {
    issues.error(
      'deadline',
      'Signup deadline could not be read',
      `The signup deadline for ${tournament.name} is not set correctly. Contact an administrator.`
    );
    issues.met('within_deadline', false);
  } else if (deadline.getTime() < now.getTime()) {
    const hoursPast = wholeHoursBetween(deadline, now);
    issues.error(
      'deadline',
      `Signup deadline passed ${pluralize(hoursPast, 'hour')} ago`,
      `The signup deadline for ${tournament.name} was ${formatDeadline(deadline, ctx.referenceTimeZone)}. ` +
        'Contact your coach if you need an exception.'
    );
    issues.met('within_deadline', false);
  } else {
    issues.met('within_deadline', true);
  }

  if (tournament.questionnaire.length === 0) {
    issues.error(
      'tournament',
      'Tournament signup not yet available',
      `The signup form for ${tournament.name} has not been created yet. ` +
        'Contact an administrator to set up the tournament signup form.'
    );
    issues.met('questionnaire_exists', false);
  } else {
    issues.met('questionnaire_exists', true);
  }
};

const checkMembership = async (
  ctx: ServiceContext,
  issues: IssueCollector,
  actorId: string,
  selectedEventIds: string[],
  events: Map<string, EventTrack | undefined>
) => {
  if (selectedEventIds.length === 0) {
    issues.error('events', 'No events selected', 'Please select at least one event to sign up for.');
    issues.met('events_selected', false);
    return;
  }
  issues.met('events_selected', true);

  const memberships = await ctx.store.listMemberships(actorId);
  const activeEventIds = new Set(memberships.filter((m) => m.active).map((m) => m.eventId));

  if (activeEventIds.size === 0) {
    issues.error(
      'events',
      'You are not a member of any events',
      'You must join at least one event before signing up for tournaments. ' +
        'Visit the Events page to join an event, or contact your Event Leader.'
    );
    issues.met('is_event_member', false);
    issues.met('all_events_valid', false);
    return;
  }
  issues.met('is_event_member', true);

  const invalid = selectedEventIds.filter((id) => !activeEventIds.has(id)).map((id) => eventLabel(id, events.get(id)));
  if (invalid.length > 0) {
    const names = invalid.join(', ');
    issues.error(
      'events',
      `You are not a member of: ${names}`,
      `You can only sign up for events you are a member of. Visit the Events page to join ${names}, or remove ` +
        `${invalid.length > 1 ? 'these events' : 'this event'} from your signup.`
    );
    issues.met('all_events_valid', false);
    return;
  }
  issues.met('all_events_valid', true);
};

const checkQuestionnaire = (issues: IssueCollector, tournament: Tournament, formResponses: Record<string, string>) => {
  const missing = tournament.questionnaire.filter(
    (field) => field.required && (formResponses[field.fieldId] ?? '').trim().length === 0
  );

  if (missing.length === 0) {
    issues.met('all_required_fields_filled', true);
    return;
  }

  const labels = missing.map((field) => field.label).join(', ');
  for (const field of missing) {
    issues.error(
      `questionnaire.${field.fieldId}`,
      `"${field.label}" is required`,
      `Please fill out the following required fields: ${labels}`
    );
  }
  issues.met('all_required_fields_filled', false);
};

const checkPartners = async (
  ctx: ServiceContext,
  issues: IssueCollector,
  actorId: string,
  tournamentId: string,
  draft: SignupDraft,
  events: Map<string, EventTrack | undefined>
) => {
  const partnerEventIds = draft.selectedEventIds.filter((id) => events.get(id)?.isPartnerEvent);

  for (const eventId of partnerEventIds) {
    const name = eventLabel(eventId, events.get(eventId));
    const field = `partner.${eventId}`;
    const partnerId = (draft.partners[eventId] ?? '').trim();

    if (!partnerId) {
      issues.error(field, `Partner required for ${name}`, `${name} is a partner event. You must select a partner to compete with.`);
      issues.met(`partner_selected_${eventId}`, false);
      continue;
    }
    issues.met(`partner_selected_${eventId}`, true);

    if (partnerId === actorId) {
      issues.error(field, 'You cannot partner with yourself', `Select a different member of ${name} as your partner.`);
      issues.met(`partner_in_event_${eventId}`, false);
      continue;
    }

    const partner = await ctx.store.getAccount(partnerId);
    if (!partner) {
      issues.error(field, 'Invalid partner selection', 'The partner you selected does not exist. Please select a different partner.');
      issues.met(`partner_in_event_${eventId}`, false);
      continue;
    }

    const partnerMemberships = await ctx.store.listMemberships(partnerId);
    const partnerInEvent = partnerMemberships.some((m) => m.eventId === eventId && m.active);
    if (!partnerInEvent) {
      issues.error(
        field,
        `${fullName(partner)} is not in ${name}`,
        `Your partner must be a member of ${name}. Please select a different partner ` +
          `or ask ${partner.firstName} to join ${name} first.`
      );
      issues.met(`partner_in_event_${eventId}`, false);
      continue;
    }
    issues.met(`partner_in_event_${eventId}`, true);

    const partnerSignup = await ctx.store.getSignup({ accountId: partnerId, tournamentId, eventId });
    if (partnerSignup?.going && partnerSignup.partnerId && partnerSignup.partnerId !== actorId) {
      const current = await ctx.store.getAccount(partnerSignup.partnerId);
      const currentName = current ? fullName(current) : 'someone else';
      issues.warn(
        field,
        `${partner.firstName} is already partnered with ${currentName}`,
        `${fullName(partner)} has already signed up with ${currentName} for this tournament. ` +
          'If you proceed, their partnership will be updated to you instead. Make sure this is intentional.'
      );
    }
  }

  issues.met(
    'partner_events_handled',
    partnerEventIds.every(
      (id) => issues.requirementsMet[`partner_selected_${id}`] === true && issues.requirementsMet[`partner_in_event_${id}`] === true
    )
  );
};

const checkDuplicates = async (
  ctx: ServiceContext,
  issues: IssueCollector,
  actorId: string,
  tournamentId: string,
  selectedEventIds: string[],
  events: Map<string, EventTrack | undefined>
) => {
  const existing = await ctx.store.listSignups(tournamentId, actorId);
  const duplicates = existing.filter((s) => s.going && selectedEventIds.includes(s.eventId));

  if (duplicates.length > 0) {
    issues.warn(
      'duplicates',
      `You are already signed up for: ${duplicates.map((s) => eventLabel(s.eventId, events.get(s.eventId))).join(', ')}`,
      'Your existing signup will be updated with any changes you make. This is not a duplicate signup.'
    );
  }
  issues.met('no_duplicates_or_acknowledged', true);
};

export const loadEvents = async (ctx: ServiceContext, eventIds: string[]) => {
  const events = await Promise.all(eventIds.map((id) => ctx.store.getEvent(id)));
  return new Map(eventIds.map((id, i) => [id, events[i]] as const));
};

/**
 * Runs every signup check against the current store contents and collects all
 * problems in one pass. A missing account or tournament ends the run immediately.
 * Never throws for a rule violation; store faults propagate.
 */
export const validateDraft = async (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  draft: SignupDraft
): Promise<ValidationResult> => {
  const issues = new IssueCollector();
  const [account, tournament] = await Promise.all([ctx.store.getAccount(actorId), ctx.store.getTournament(tournamentId)]);

  if (!account) {
    issues.error(
      'account',
      'User account not found',
      'Please log out and log back in. If the problem persists, contact an administrator.'
    );
    issues.met('valid_account', false);
    return issues.result();
  }
  if (!tournament) {
    issues.error(
      'tournament',
      'Tournament not found',
      'The tournament you selected does not exist. Please return to the tournament list and try again.'
    );
    return issues.result();
  }

  const events = await loadEvents(ctx, draft.selectedEventIds);

  checkAccount(issues, account);
  checkTournament(ctx, issues, tournament);
  await checkMembership(ctx, issues, actorId, draft.selectedEventIds, events);
  checkQuestionnaire(issues, tournament, draft.formResponses);
  await checkPartners(ctx, issues, actorId, tournamentId, draft, events);
  await checkDuplicates(ctx, issues, actorId, tournamentId, draft.selectedEventIds, events);

  return issues.result();
};
