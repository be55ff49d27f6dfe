import { resultSchema, submitResult } from '../results/resultService';
import { contextForRequest } from '../shared/context';
import { jsonResponse, parseBody, principalOf } from '../shared/http';
import { logError, logInfo } from '../shared/logger';
import { ApiHandler, withApiMetrics } from '../shared/observability';

const failures = {
  notFound: { status: 404, message: 'User or tournament not found' },
  resultsClosed: { status: 409, message: 'Results collection for this tournament has been closed' },
  alreadySubmitted: { status: 409, message: 'You have already submitted a result for this tournament' },
  storeFailure: { status: 503, message: 'Your result could not be saved. Please try again.' }
} as const;

const baseHandler: ApiHandler = async (event) => {
  if (event.httpMethod !== 'POST') {
    return jsonResponse(405, { message: 'Method not allowed' });
  }

  const actorId = principalOf(event);
  if (!actorId) {
    return jsonResponse(401, { message: 'Unauthorized' });
  }

  const tournamentId = event.pathParameters?.id;
  if (!tournamentId) {
    return jsonResponse(400, { message: 'tournamentId is required' });
  }

  const body = parseBody(event, resultSchema);
  if (!body.ok) return body.response;

  const resolved = await contextForRequest('resultsApi');
  if (!resolved.ok) return resolved.response;

  try {
    const outcome = await submitResult(resolved.ctx, actorId, tournamentId, body.value);
    if (!outcome.ok) {
      const failure = failures[outcome.reason];
      return jsonResponse(failure.status, { message: failure.message, reason: outcome.reason });
    }

    logInfo('resultsApi.submitted', { actorId, tournamentId, points: outcome.performance.points });
    return jsonResponse(201, outcome);
  } catch (err) {
    logError('resultsApi.failed', { error: String(err) });
    return jsonResponse(500, { message: 'Internal server error' });
  }
};

export const handler = withApiMetrics({
  defaultRoute: '/tournaments/{id}/results',
  feature: 'results.submit'
})(baseHandler);
