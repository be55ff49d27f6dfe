import { contextForRequest } from '../shared/context';
import { jsonResponse, principalOf } from '../shared/http';
import { logError, logInfo } from '../shared/logger';
import { ApiHandler, withApiMetrics } from '../shared/observability';
import { searchPartners } from '../signup/partnerSearch';

const baseHandler: ApiHandler = async (event) => {
  if (event.httpMethod !== 'GET') {
    return jsonResponse(405, { message: 'Method not allowed' });
  }

  const actorId = principalOf(event);
  if (!actorId) {
    return jsonResponse(401, { message: 'Unauthorized' });
  }

  const resolved = await contextForRequest('partnerSearchApi');
  if (!resolved.ok) return resolved.response;

  const eventId = event.pathParameters?.eventId;
  const query = event.queryStringParameters?.q;

  try {
    const candidates = await searchPartners(resolved.ctx, actorId, query, eventId);
    logInfo('partnerSearchApi.search', { eventId, count: candidates.length });
    return jsonResponse(200, candidates);
  } catch (err) {
    logError('partnerSearchApi.failed', { error: String(err) });
    return jsonResponse(500, { message: 'Internal server error' });
  }
};

export const handler = withApiMetrics({
  defaultRoute: '/events/{eventId}/partners',
  feature: 'signup.partnerSearch'
})(baseHandler);
