import { decideApproverRequests, decisionsSchema, listApproverRequests } from '../approvers/approverService';
import { contextForRequest } from '../shared/context';
import { jsonResponse, parseBody, principalOf } from '../shared/http';
import { logError, logInfo } from '../shared/logger';
import { ApiHandler, withApiMetrics } from '../shared/observability';

const baseHandler: ApiHandler = async (event) => {
  const approverId = principalOf(event);
  if (!approverId) {
    return jsonResponse(401, { message: 'Unauthorized' });
  }

  const resolved = await contextForRequest('approverRequestsApi');
  if (!resolved.ok) return resolved.response;
  const { ctx } = resolved;

  try {
    if (event.httpMethod === 'GET') {
      const outcome = await listApproverRequests(ctx, approverId);
      if (!outcome.ok) {
        return outcome.reason === 'notGuardian'
          ? jsonResponse(403, { message: 'Only guardians can view approver requests' })
          : jsonResponse(404, { message: 'User not found' });
      }
      return jsonResponse(200, { items: outcome.requests });
    }

    if (event.httpMethod === 'PUT') {
      const body = parseBody(event, decisionsSchema);
      if (!body.ok) return body.response;

      const outcome = await decideApproverRequests(ctx, approverId, body.value.decisions);
      if (outcome.ok) {
        logInfo('approverRequestsApi.decided', { approverId, count: outcome.decided.length });
        return jsonResponse(200, outcome);
      }
      switch (outcome.reason) {
        case 'notGuardian':
          return jsonResponse(403, { message: 'Only guardians can decide approver requests' });
        case 'notFound':
          return jsonResponse(404, { message: 'User not found' });
        case 'unknownRequests':
          return jsonResponse(404, { message: 'Some approver requests were not found', unknown: outcome.unknown });
        case 'storeFailure':
          return jsonResponse(503, { message: 'Decisions could not be saved. Please try again.' });
      }
    }

    return jsonResponse(405, { message: 'Method not allowed' });
  } catch (err) {
    logError('approverRequestsApi.failed', { error: String(err) });
    return jsonResponse(500, { message: 'Internal server error' });
  }
};

export const handler = withApiMetrics({
  defaultRoute: '/approver-requests',
  feature: (event) => (event.httpMethod === 'PUT' ? 'approver.decide' : 'approver.list')
})(baseHandler);
