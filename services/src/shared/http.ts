import { APIGatewayProxyResult } from 'aws-lambda';
import { ZodError, ZodType, ZodTypeDef } from 'zod';

/** The parts of an API Gateway proxy event the handlers read. */
export interface ApiEvent {
  httpMethod: string;
  path?: string;
  resource?: string;
  body?: string | null;
  headers?: Record<string, string | undefined> | null;
  pathParameters?: Record<string, string | undefined> | null;
  queryStringParameters?: Record<string, string | undefined> | null;
  requestContext?: {
    requestId?: string;
    authorizer?: Record<string, unknown> | null;
  };
}

export const jsonResponse = (statusCode: number, body: unknown): APIGatewayProxyResult => ({
  statusCode,
  headers: {
    'Content-Type': 'application/json',
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Headers': '*',
    'Access-Control-Allow-Methods': '*'
  },
  body: JSON.stringify(body)
});

export const principalOf = (event: ApiEvent): string | undefined => {
  const principal: unknown = event.requestContext?.authorizer?.principalId;
  return typeof principal === 'string' && principal.length > 0 ? principal : undefined;
};

const describeZodError = (err: ZodError) =>
  err.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`);

export type BodyResult<T> = { ok: true; value: T } | { ok: false; response: APIGatewayProxyResult };

/** Parses the JSON body against `schema`; failures come back as a ready 400 response. */
export const parseBody = <T>(event: ApiEvent, schema: ZodType<T, ZodTypeDef, unknown>): BodyResult<T> => {
  let raw: unknown;
  try {
    raw = event.body ? JSON.parse(event.body) : {};
  } catch {
    return { ok: false, response: jsonResponse(400, { message: 'Invalid JSON body' }) };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      response: jsonResponse(400, { message: 'Invalid request body', details: describeZodError(parsed.error) })
    };
  }
  return { ok: true, value: parsed.data };
};
