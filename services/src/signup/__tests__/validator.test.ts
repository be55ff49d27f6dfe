import { describe, expect, it } from '@jest/globals';
import { fallClassic, seededStore, testContext, validDraft } from '../../testing/fixtures';
import { validateDraft } from '../validator';

const goingSignup = (accountId: string, eventId: string, partnerId: string | null = null) => ({
  accountId,
  tournamentId: 't1',
  eventId,
  going: true,
  partnerId,
  bringingApprover: false,
  approverId: null,
  createdAt: '2026-10-01T00:00:00.000Z'
});

describe('validateDraft', () => {
  it('accepts a complete draft and marks every requirement met', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'alice', 't1', validDraft());

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.requirementsMet).toEqual({
      valid_account: true,
      within_deadline: true,
      questionnaire_exists: true,
      events_selected: true,
      is_event_member: true,
      all_events_valid: true,
      all_required_fields_filled: true,
      partner_selected_e2: true,
      partner_in_event_e2: true,
      partner_events_handled: true,
      no_duplicates_or_acknowledged: true
    });
  });

  it('reports the whole hours elapsed since a passed deadline', async () => {
    const ctx = testContext(seededStore(fallClassic({ signupDeadline: '2026-10-19T10:00:00' })));

    const result = await validateDraft(ctx, 'alice', 't1', validDraft());

    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].field).toBe('deadline');
    expect(result.errors[0].message).toBe('Signup deadline passed 2 hours ago');
    expect(result.errors[0].fixInstructions).toContain('October 19, 2026 at 10:00 AM');
    expect(result.requirementsMet.within_deadline).toBe(false);
  });

  it('honours an explicit offset on the deadline', async () => {
    const ctx = testContext(seededStore(fallClassic({ signupDeadline: '2026-10-19T15:00:00Z' })));

    const result = await validateDraft(ctx, 'alice', 't1', validDraft());

    expect(result.errors.map((e) => e.message)).toEqual(['Signup deadline passed 1 hour ago']);
  });

  it('flags a partner event without a partner', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'alice', 't1', validDraft({ partners: {} }));

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        field: 'partner.e2',
        message: 'Partner required for Public Forum',
        fixInstructions: 'Public Forum is a partner event. You must select a partner to compete with.',
        severity: 'error'
      }
    ]);
    expect(result.requirementsMet.partner_selected_e2).toBe(false);
    expect(result.requirementsMet.partner_events_handled).toBe(false);
  });

  it('collects every problem in one pass', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(
      ctx,
      'alice',
      't1',
      validDraft({ selectedEventIds: ['e1', 'e3'], partners: {}, formResponses: { f2: '   ' } })
    );

    expect(result.errors.map((e) => e.field)).toEqual(['events', 'questionnaire.f1', 'questionnaire.f2']);
    expect(result.errors[0].message).toBe('You are not a member of: Congress');
    expect(result.errors[1].message).toBe('"Emergency contact" is required');
    expect(result.errors[2].fixInstructions).toBe(
      'Please fill out the following required fields: Emergency contact, Dietary needs'
    );
    expect(result.requirementsMet.all_events_valid).toBe(false);
    expect(result.requirementsMet.all_required_fields_filled).toBe(false);
  });

  it('keeps checking after an unclaimed account', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'dan', 't1', validDraft({ selectedEventIds: ['e1'], partners: {} }));

    expect(result.errors.map((e) => e.message)).toEqual(['Account not fully activated']);
    expect(result.requirementsMet.valid_account).toBe(false);
    expect(result.requirementsMet.all_events_valid).toBe(true);
  });

  it('stops at a missing account', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'nobody', 't1', validDraft());

    expect(result.errors.map((e) => e.message)).toEqual(['User account not found']);
    expect(result.requirementsMet).toEqual({ valid_account: false });
  });

  it('stops at a missing tournament', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'alice', 'missing', validDraft());

    expect(result.errors.map((e) => e.message)).toEqual(['Tournament not found']);
  });

  it('treats a tournament without questionnaire fields as not open', async () => {
    const ctx = testContext(seededStore(fallClassic({ questionnaire: [] })));

    const result = await validateDraft(ctx, 'alice', 't1', validDraft());

    expect(result.errors.map((e) => e.message)).toEqual(['Tournament signup not yet available']);
    expect(result.requirementsMet.questionnaire_exists).toBe(false);
  });

  it('requires at least one event', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'alice', 't1', validDraft({ selectedEventIds: [] }));

    expect(result.errors.map((e) => e.message)).toEqual(['No events selected']);
    expect(result.requirementsMet.events_selected).toBe(false);
  });

  it('reports an account with no active memberships', async () => {
    const store = seededStore().addAccount({
      accountId: 'eve',
      firstName: 'Eve',
      lastName: 'Stone',
      role: 0,
      claimed: true
    });
    const ctx = testContext(store);

    const result = await validateDraft(ctx, 'eve', 't1', validDraft({ selectedEventIds: ['e1'], partners: {} }));

    expect(result.errors.map((e) => e.message)).toEqual(['You are not a member of any events']);
    expect(result.requirementsMet.is_event_member).toBe(false);
  });

  it.each([
    ['alice', 'You cannot partner with yourself'],
    ['zed', 'Invalid partner selection'],
    ['dan', 'Dan Park is not in Public Forum']
  ])('rejects partner %s', async (partnerId, message) => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'alice', 't1', validDraft({ partners: { e2: partnerId } }));

    expect(result.errors.map((e) => e.message)).toEqual([message]);
    expect(result.requirementsMet.partner_selected_e2).toBe(true);
    expect(result.requirementsMet.partner_in_event_e2).toBe(false);
  });

  it('ignores partners chosen for events that are not partner events', async () => {
    const ctx = testContext(seededStore());

    const result = await validateDraft(ctx, 'alice', 't1', validDraft({ selectedEventIds: ['e1'], partners: { e1: 'zed' } }));

    expect(result.valid).toBe(true);
    expect(result.requirementsMet.partner_events_handled).toBe(true);
  });

  it('warns when the partner is already paired with someone else', async () => {
    const store = seededStore().seedSignup(goingSignup('ben', 'e2', 'cara'));
    const ctx = testContext(store);

    const result = await validateDraft(ctx, 'alice', 't1', validDraft());

    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.message)).toEqual(['Ben is already partnered with Cara Diaz']);
  });

  it('warns about events the member is already going to', async () => {
    const store = seededStore().seedSignup(goingSignup('alice', 'e1'));
    const ctx = testContext(store);

    const result = await validateDraft(ctx, 'alice', 't1', validDraft());

    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].message).toBe('You are already signed up for: Lincoln-Douglas');
    expect(result.warnings[0].severity).toBe('warning');
  });
});
