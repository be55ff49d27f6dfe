import { APIGatewayProxyResult } from 'aws-lambda';
import { contextForRequest, ServiceContext } from '../shared/context';
import { ApiEvent, jsonResponse, parseBody, principalOf } from '../shared/http';
import { ScopedLogger, scopedLogger } from '../shared/logger';
import { ApiHandler, recordCountMetric, withApiMetrics } from '../shared/observability';
import { draftSchema } from '../signup/draftToken';
import {
  checkDraft,
  confirmFinal,
  confirmReview,
  stageBodySchema,
  submitForReview,
  WorkflowOutcome
} from '../signup/workflow';

const STEPS = ['validate', 'review', 'final-warning', 'submit'] as const;
type Step = (typeof STEPS)[number];

const isStep = (value: string | undefined): value is Step => STEPS.some((step) => step === value);

const stepOf = (event: ApiEvent): Step | undefined => {
  const last = (event.resource || event.path || '').split('/').filter(Boolean).pop();
  return isStep(last) ? last : undefined;
};

export const statusFor = (outcome: WorkflowOutcome): number => {
  switch (outcome.status) {
    case 'notFound':
      return 404;
    case 'advanced':
      return outcome.stage === 'committed' ? 201 : 200;
    case 'held':
      return outcome.reason === 'commitFailed' ? 503 : 422;
    case 'rejected':
      return 422;
  }
};

const respond = (outcome: WorkflowOutcome) =>
  outcome.status === 'notFound'
    ? jsonResponse(404, { message: 'User or tournament not found' })
    : jsonResponse(statusFor(outcome), outcome);

const runStep = async (
  ctx: ServiceContext,
  log: ScopedLogger,
  step: Step,
  event: ApiEvent,
  actorId: string,
  tournamentId: string
): Promise<APIGatewayProxyResult> => {
  switch (step) {
    case 'validate': {
      const body = parseBody(event, draftSchema);
      if (!body.ok) return body.response;
      const checked = await checkDraft(ctx, actorId, tournamentId, body.value);
      if (checked.status === 'notFound') {
        return jsonResponse(404, { message: 'User or tournament not found' });
      }
      return jsonResponse(checked.validation.valid ? 200 : 422, checked.validation);
    }
    case 'review': {
      const body = parseBody(event, draftSchema);
      if (!body.ok) return body.response;
      return respond(await submitForReview(ctx, actorId, tournamentId, body.value));
    }
    case 'final-warning': {
      const body = parseBody(event, stageBodySchema);
      if (!body.ok) return body.response;
      return respond(await confirmReview(ctx, actorId, tournamentId, body.value));
    }
    case 'submit': {
      const body = parseBody(event, stageBodySchema);
      if (!body.ok) return body.response;
      const outcome = await confirmFinal(ctx, actorId, tournamentId, body.value);
      if (outcome.status === 'advanced' && outcome.stage === 'committed') {
        log.info('signupWorkflowApi.committed', {
          confirmationId: outcome.result.confirmationId,
          signups: outcome.result.signups.length
        });
        try {
          await recordCountMetric('SignupsCommitted', outcome.result.signups.length, { tournamentId });
        } catch (err) {
          log.warn('signupWorkflowApi.metricFailed', { error: String(err) });
        }
      }
      return respond(outcome);
    }
  }
};

const baseHandler: ApiHandler = async (event) => {
  if (event.httpMethod !== 'POST') {
    return jsonResponse(405, { message: 'Method not allowed' });
  }

  const actorId = principalOf(event);
  if (!actorId) {
    return jsonResponse(401, { message: 'Unauthorized' });
  }

  const tournamentId = event.pathParameters?.id;
  const step = stepOf(event);
  if (!tournamentId || !step) {
    return jsonResponse(400, { message: 'tournamentId and a signup step are required' });
  }

  const resolved = await contextForRequest('signupWorkflowApi');
  if (!resolved.ok) return resolved.response;

  const log = scopedLogger({ requestId: event.requestContext?.requestId, actorId, tournamentId, step });
  try {
    const response = await runStep(resolved.ctx, log, step, event, actorId, tournamentId);
    log.info('signupWorkflowApi.handled', { statusCode: response.statusCode });
    return response;
  } catch (err) {
    log.error('signupWorkflowApi.failed', { error: String(err) });
    return jsonResponse(500, { message: 'Internal server error' });
  }
};

export const handler = withApiMetrics({
  defaultRoute: '/tournaments/{id}/signup',
  feature: (event) => {
    const step = stepOf(event);
    return step ? `signup.${step}` : undefined;
  }
})(baseHandler);
