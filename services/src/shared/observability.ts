import { APIGatewayProxyResult } from 'aws-lambda';
import { createMetricsLogger, metricScope, MetricsLogger, Unit } from 'aws-embedded-metrics';
import { ApiEvent } from './http';
import { logError } from './logger';

const namespace = () => process.env.METRICS_NAMESPACE ?? 'SignupOps';
const envName = () => process.env.ENV_NAME ?? 'prod';
const serviceName = () => process.env.SERVICE_NAME ?? 'signup-api';

export type ApiHandler = (event: ApiEvent) => Promise<APIGatewayProxyResult>;

interface ApiMetricsOptions {
  defaultRoute?: string;
  feature?: string | ((event: ApiEvent, result?: APIGatewayProxyResult) => string | undefined);
}

const statusClass = (code: number) => `${Math.floor(code / 100)}xx`;

const recordApiMetrics = (
  metrics: MetricsLogger,
  event: ApiEvent,
  result: APIGatewayProxyResult | undefined,
  opts: ApiMetricsOptions,
  elapsedMs: number
) => {
  const route = event.resource || event.path || opts.defaultRoute || 'unknown';
  const httpCode = result?.statusCode ?? 500;
  const httpStatusClass = statusClass(httpCode);
  const service = serviceName();
  const env = envName();

  metrics.setNamespace(namespace());
  metrics.setProperty('route', route);
  metrics.setProperty('service', service);
  metrics.setProperty('env', env);
  metrics.setProperty('httpStatus', httpCode);
  metrics.setProperty('statusClass', httpStatusClass);
  metrics.setProperty('requestId', event.requestContext?.requestId);
  metrics.setProperty('traceId', event.headers?.['x-amzn-trace-id'] ?? event.headers?.['X-Amzn-Trace-Id']);

  const dimensionSets: Array<Record<string, string>> = [
    { Service: service, Env: env },
    { Service: service, Env: env, Route: route },
    { Service: service, Env: env, Route: route, StatusClass: httpStatusClass }
  ];

  const feature = typeof opts.feature === 'function' ? opts.feature(event, result) : opts.feature;
  if (feature) {
    dimensionSets.push({ Service: service, Env: env, Feature: feature });
    metrics.setProperty('feature', feature);
  }

  metrics.setDimensions(dimensionSets);

  metrics.putMetric('Requests', 1, Unit.Count);
  metrics.putMetric('LatencyMs', elapsedMs, Unit.Milliseconds);
  if (httpCode >= 400) {
    metrics.putMetric('Errors', 1, Unit.Count);
  }
};

export const withApiMetrics =
  (options: ApiMetricsOptions = {}) =>
  (handler: ApiHandler): ApiHandler =>
    metricScope((metrics: MetricsLogger) => async (event: ApiEvent) => {
      const start = Date.now();
      try {
        const result = await handler(event);
        recordApiMetrics(metrics, event, result, options, Date.now() - start);
        return result;
      } catch (err) {
        logError('withApiMetrics.failed', { error: String(err) });
        recordApiMetrics(metrics, event, undefined, options, Date.now() - start);
        throw err;
      }
    });

/** Emits a single counter outside a request scope (e.g. signups per commit). */
export const recordCountMetric = async (name: string, value: number, properties: Record<string, string> = {}) => {
  const metrics = createMetricsLogger();
  metrics.setNamespace(namespace());
  metrics.putDimensions({ Service: serviceName(), Env: envName() });
  for (const [key, propertyValue] of Object.entries(properties)) {
    metrics.setProperty(key, propertyValue);
  }
  metrics.putMetric(name, value, Unit.Count);
  await metrics.flush();
};
