import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { ServiceContext } from '../shared/context';
import { SignupDraft } from '../shared/types';

const TOKEN_VERSION = 2;

/** Stage a token was issued for; each stage only accepts its own. */
export type DraftStage = 'review' | 'finalWarning';

const id = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

/** Body of a draft submission. Event ids are de-duplicated in order; blank partner picks are dropped. */
export const draftSchema = z
  .object({
    selectedEventIds: z.array(id).default([]),
    partners: z.record(z.string(), z.union([z.string(), z.number(), z.null()])).default({}),
    formResponses: z.record(z.string(), z.string()).default({}),
    bringingApprover: z.boolean().default(false)
  })
  .transform(
    (body): SignupDraft => ({
      selectedEventIds: Array.from(new Set(body.selectedEventIds.filter((eventId) => eventId.length > 0))),
      partners: Object.fromEntries(
        Object.entries(body.partners)
          .map(([eventId, partnerId]) => [eventId, partnerId === null ? '' : String(partnerId).trim()] as const)
          .filter(([, partnerId]) => partnerId.length > 0)
      ),
      formResponses: body.formResponses,
      bringingApprover: body.bringingApprover
    })
  );

const payloadSchema = z.object({
  v: z.literal(TOKEN_VERSION),
  actorId: z.string(),
  tournamentId: z.string(),
  stage: z.enum(['review', 'finalWarning']),
  draft: draftSchema,
  issuedAt: z.number(),
  expiresAt: z.number()
});

export type DraftTokenFailure =
  | 'missing'
  | 'malformed'
  | 'badSignature'
  | 'expired'
  | 'wrongActor'
  | 'wrongTournament'
  | 'wrongStage';

export type DraftTokenResult = { ok: true; draft: SignupDraft } | { ok: false; reason: DraftTokenFailure };

const sign = (secret: string, body: string) => createHmac('sha256', secret).update(body).digest('base64url');

export const signDraft = (
  ctx: ServiceContext,
  actorId: string,
  tournamentId: string,
  stage: DraftStage,
  draft: SignupDraft
): string => {
  const issuedAt = Math.floor(ctx.now().getTime() / 1000);
  const payload = {
    v: TOKEN_VERSION,
    actorId,
    tournamentId,
    stage,
    draft,
    issuedAt,
    expiresAt: issuedAt + ctx.draftTtlSeconds
  };
  const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
  return `${body}.${sign(ctx.draftSigningSecret, body)}`;
};

export const verifyDraft = (
  ctx: ServiceContext,
  token: string | undefined,
  actorId: string,
  tournamentId: string,
  stage: DraftStage
): DraftTokenResult => {
  if (!token) return { ok: false, reason: 'missing' };

  const [body, signature, ...rest] = token.split('.');
  if (!body || !signature || rest.length > 0) return { ok: false, reason: 'malformed' };

  const expected = Buffer.from(sign(ctx.draftSigningSecret, body));
  const received = Buffer.from(signature);
  if (expected.length !== received.length || !timingSafeEqual(expected, received)) {
    return { ok: false, reason: 'badSignature' };
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(body, 'base64url').toString('utf8'));
  } catch {
    return { ok: false, reason: 'malformed' };
  }
  const payload = payloadSchema.safeParse(decoded);
  if (!payload.success) return { ok: false, reason: 'malformed' };

  if (payload.data.expiresAt <= Math.floor(ctx.now().getTime() / 1000)) return { ok: false, reason: 'expired' };
  if (payload.data.actorId !== actorId) return { ok: false, reason: 'wrongActor' };
  if (payload.data.tournamentId !== tournamentId) return { ok: false, reason: 'wrongTournament' };
  if (payload.data.stage !== stage) return { ok: false, reason: 'wrongStage' };

  return { ok: true, draft: payload.data.draft };
};
