import { contextForRequest } from '../shared/context';
import { jsonResponse, principalOf } from '../shared/http';
import { logError, logInfo } from '../shared/logger';
import { ApiHandler, withApiMetrics } from '../shared/observability';
import { startSignup } from '../signup/workflow';

const baseHandler: ApiHandler = async (event) => {
  if (event.httpMethod !== 'GET') {
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

  const resolved = await contextForRequest('signupRequirementsApi');
  if (!resolved.ok) return resolved.response;

  try {
    const outcome = await startSignup(resolved.ctx, actorId, tournamentId);
    if (outcome.status === 'notFound') {
      return jsonResponse(404, { message: 'User or tournament not found' });
    }

    logInfo('signupRequirementsApi.checked', {
      actorId,
      tournamentId,
      stage: outcome.status === 'advanced' ? outcome.stage : 'rejected'
    });
    return jsonResponse(200, outcome);
  } catch (err) {
    logError('signupRequirementsApi.failed', { error: String(err) });
    return jsonResponse(500, { message: 'Internal server error' });
  }
};

export const handler = withApiMetrics({
  defaultRoute: '/tournaments/{id}/signup/requirements',
  feature: 'signup.requirements'
})(baseHandler);
