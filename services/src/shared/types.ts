export interface Account {
  accountId: string;
  firstName: string;
  lastName: string;
  role: number;
  claimed: boolean;
  isGuardian?: boolean;
  points?: number;
  bids?: number;
}

export interface QuestionnaireField {
  fieldId: string;
  label: string;
  type: string;
  required: boolean;
}

export interface Tournament {
  tournamentId: string;
  name: string;
  startsAt: string;
  // May be stored without an offset; read as wall-clock time in the reference zone.
  signupDeadline: string;
  performanceDeadline?: string;
  resultsClosed?: boolean;
  questionnaire: QuestionnaireField[];
}

export interface EventTrack {
  eventId: string;
  name: string;
  emoji?: string;
  isPartnerEvent: boolean;
}

export interface EventMembership {
  accountId: string;
  eventId: string;
  active: boolean;
}

export interface SignupKey {
  accountId: string;
  tournamentId: string;
  eventId: string;
}

export interface PersistedSignup extends SignupKey {
  going: boolean;
  partnerId: string | null;
  bringingApprover: boolean;
  approverId: string | null;
  createdAt: string;
}

export interface ApproverRequestKey {
  childId: string;
  tournamentId: string;
  eventId: string;
}

export interface ApproverRequest extends ApproverRequestKey {
  approverId: string | null;
  accepted: boolean;
  decidedAt: string | null;
}

export type ApproverRequestStatus = 'unassigned' | 'pending' | 'accepted' | 'declined';

export interface QuestionnaireResponse {
  tournamentId: string;
  accountId: string;
  fieldId: string;
  response: string;
  submittedAt: string;
}

export interface GuardianLink {
  childId: string;
  guardianId: string;
}

export interface Performance {
  accountId: string;
  tournamentId: string;
  bid: boolean;
  rank: number;
  stage: number;
  points: number;
  submittedAt: string;
}

export interface SignupDraft {
  selectedEventIds: string[];
  partners: Record<string, string>;
  formResponses: Record<string, string>;
  bringingApprover: boolean;
}
