import { ServiceContext } from '../shared/context';
import { fullName } from './validator';

export const MIN_QUERY_LENGTH = 2;
export const MAX_PARTNER_RESULTS = 10;

export interface PartnerCandidate {
  id: string;
  firstName: string;
  lastName: string;
}

/**
 * Active members of `eventId` whose first, last or full name contains `query`
 * (case-insensitive). The searching member never appears in their own results.
 */
export const searchPartners = async (
  ctx: ServiceContext,
  actorId: string,
  query: string | undefined,
  eventId: string | undefined
): Promise<PartnerCandidate[]> => {
  const needle = (query ?? '').trim().toLowerCase();
  if (needle.length < MIN_QUERY_LENGTH || !eventId) return [];

  const members = await ctx.store.listEventMembers(eventId);
  const candidateIds = members.filter((m) => m.active && m.accountId !== actorId).map((m) => m.accountId);
  if (candidateIds.length === 0) return [];

  const accounts = await ctx.store.getAccounts(candidateIds);

  return accounts
    .filter((account) =>
      [account.firstName, account.lastName, fullName(account)].some((name) => name.toLowerCase().includes(needle))
    )
    .sort((a, b) => a.lastName.localeCompare(b.lastName) || a.firstName.localeCompare(b.firstName))
    .slice(0, MAX_PARTNER_RESULTS)
    .map((account) => ({ id: account.accountId, firstName: account.firstName, lastName: account.lastName }));
};
