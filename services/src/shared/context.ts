import { APIGatewayProxyResult } from 'aws-lambda';
import { loadConfig, ServiceConfig } from './config';
import { createDynamoStore } from './dynamoStore';
import { jsonResponse } from './http';
import { logError } from './logger';
import { resolveSecret } from './secrets';
import { SignupStore } from './store';

/** Everything a domain operation may touch, passed explicitly on every call. */
export interface ServiceContext {
  store: SignupStore;
  now: () => Date;
  referenceTimeZone: string;
  draftSigningSecret: string;
  draftTtlSeconds: number;
}

export const createServiceContext = (
  config: ServiceConfig,
  draftSigningSecret: string,
  store: SignupStore = createDynamoStore(config.tables)
): ServiceContext => ({
  store,
  now: () => new Date(),
  referenceTimeZone: config.referenceTimeZone,
  draftSigningSecret,
  draftTtlSeconds: config.draftTtlSeconds
});

export type ContextResult = { ok: true; ctx: ServiceContext } | { ok: false; response: APIGatewayProxyResult };

export const contextForRequest = async (handlerName: string): Promise<ContextResult> => {
  const loaded = loadConfig();
  if (!loaded.ok) {
    logError(`${handlerName}.misconfigured`, { missing: loaded.missing });
    return { ok: false, response: jsonResponse(500, { message: 'Service not configured' }) };
  }

  let draftSigningSecret: string;
  try {
    draftSigningSecret = await resolveSecret(loaded.config.draftSecret);
  } catch (err) {
    logError(`${handlerName}.secretUnavailable`, { error: String(err) });
    return { ok: false, response: jsonResponse(503, { message: 'Service temporarily unavailable' }) };
  }

  return { ok: true, ctx: createServiceContext(loaded.config, draftSigningSecret) };
};
