import { ServiceContext } from '../shared/context';
import { SignupDraft, Tournament } from '../shared/types';
import { MemorySignupStore } from './memoryStore';

// 12:00 in New York.
export const NOW = new Date('2026-10-19T16:00:00.000Z');

export const TEST_SECRET = 'test-secret';

export const fallClassic = (overrides: Partial<Tournament> = {}): Tournament => ({
  tournamentId: 't1',
  name: 'Fall Classic',
  startsAt: '2026-11-07T08:00:00',
  // 21:00Z
  signupDeadline: '2026-10-21T17:00:00',
  questionnaire: [
    { fieldId: 'f1', label: 'Emergency contact', type: 'text', required: true },
    { fieldId: 'f2', label: 'Dietary needs', type: 'text', required: true },
    { fieldId: 'f3', label: 'Notes', type: 'text', required: false }
  ],
  ...overrides
});

/**
 * alice: member of e1 (solo) and e2 (partner), guardian gwen.
 * ben and cara: members of e2. dan: unclaimed account.
 */
export const seededStore = (tournament: Tournament = fallClassic()) =>
  new MemorySignupStore()
    .addTournament(tournament)
    .addEvent({ eventId: 'e1', name: 'Lincoln-Douglas', isPartnerEvent: false })
    .addEvent({ eventId: 'e2', name: 'Public Forum', emoji: '🗣️', isPartnerEvent: true })
    .addEvent({ eventId: 'e3', name: 'Congress', isPartnerEvent: false })
    .addAccount({ accountId: 'alice', firstName: 'Alice', lastName: 'Nguyen', role: 0, claimed: true })
    .addAccount({ accountId: 'ben', firstName: 'Ben', lastName: 'Ortiz', role: 0, claimed: true })
    .addAccount({ accountId: 'cara', firstName: 'Cara', lastName: 'Diaz', role: 0, claimed: true })
    .addAccount({ accountId: 'dan', firstName: 'Dan', lastName: 'Park', role: 0, claimed: false })
    .addAccount({ accountId: 'gwen', firstName: 'Gwen', lastName: 'Nguyen', role: 0, claimed: true, isGuardian: true })
    .addMembership('alice', 'e1')
    .addMembership('alice', 'e2')
    .addMembership('ben', 'e2')
    .addMembership('cara', 'e2')
    .addMembership('dan', 'e1')
    .addGuardianLink('alice', 'gwen');

export const testContext = (store: MemorySignupStore, now: Date = NOW): ServiceContext => ({
  store,
  now: () => now,
  referenceTimeZone: 'America/New_York',
  draftSigningSecret: TEST_SECRET,
  draftTtlSeconds: 1800
});

export const validDraft = (overrides: Partial<SignupDraft> = {}): SignupDraft => ({
  selectedEventIds: ['e1', 'e2'],
  partners: { e2: 'ben' },
  formResponses: { f1: 'Gwen Nguyen 555-0100', f2: 'None' },
  bringingApprover: true,
  ...overrides
});
