import { z } from 'zod';
import { listApproverOptions, selectApprover } from '../approvers/approverService';
import { contextForRequest } from '../shared/context';
import { jsonResponse, parseBody, principalOf } from '../shared/http';
import { logError, logInfo } from '../shared/logger';
import { ApiHandler, withApiMetrics } from '../shared/observability';

const selectionSchema = z.object({ approverId: z.string().trim().min(1) });

const failures = {
  notFound: { status: 404, message: 'Tournament not found' },
  notLinked: { status: 403, message: 'The selected approver is not linked to your account' },
  noSignups: { status: 409, message: 'You have no signups for this tournament' },
  storeFailure: { status: 503, message: 'Approver selection could not be saved. Please try again.' }
} as const;

const baseHandler: ApiHandler = async (event) => {
  const actorId = principalOf(event);
  if (!actorId) {
    return jsonResponse(401, { message: 'Unauthorized' });
  }

  const tournamentId = event.pathParameters?.id;
  if (!tournamentId) {
    return jsonResponse(400, { message: 'tournamentId is required' });
  }

  const resolved = await contextForRequest('approverApi');
  if (!resolved.ok) return resolved.response;
  const { ctx } = resolved;

  try {
    if (event.httpMethod === 'GET') {
      const options = await listApproverOptions(ctx, actorId);
      return jsonResponse(200, { options });
    }

    if (event.httpMethod === 'PUT') {
      const body = parseBody(event, selectionSchema);
      if (!body.ok) return body.response;

      const outcome = await selectApprover(ctx, actorId, tournamentId, body.value.approverId);
      if (!outcome.ok) {
        const failure = failures[outcome.reason];
        return jsonResponse(failure.status, { message: failure.message, reason: outcome.reason });
      }

      logInfo('approverApi.selected', { actorId, tournamentId, approverId: outcome.approverId });
      return jsonResponse(200, outcome);
    }

    return jsonResponse(405, { message: 'Method not allowed' });
  } catch (err) {
    logError('approverApi.failed', { error: String(err) });
    return jsonResponse(500, { message: 'Internal server error' });
  }
};

export const handler = withApiMetrics({
  defaultRoute: '/tournaments/{id}/approver',
  feature: 'approver.select'
})(baseHandler);
