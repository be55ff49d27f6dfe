export interface TableNames {
  accounts: string;
  tournaments: string;
  events: string;
  memberships: string;
  signups: string;
  approverRequests: string;
  responses: string;
  guardianLinks: string;
  performances: string;
}

/** Where the draft signing key comes from: inline for local runs, Secrets Manager when deployed. */
export type DraftSecretSource = { kind: 'value'; value: string } | { kind: 'secretsManager'; secretId: string };

export interface ServiceConfig {
  tables: TableNames;
  draftSecret: DraftSecretSource;
  draftTtlSeconds: number;
  referenceTimeZone: string;
}

export type ConfigResult = { ok: true; config: ServiceConfig } | { ok: false; missing: string[] };

export const DEFAULT_DRAFT_TTL_SECONDS = 1800;
export const DEFAULT_REFERENCE_TIME_ZONE = 'America/New_York';

const parseTtl = (value: string | undefined): number => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : DEFAULT_DRAFT_TTL_SECONDS;
};

// Read at call time so a warm Lambda picks up the environment it was configured with.
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ConfigResult => {
  const missing: string[] = [];
  const read = (variable: string): string => {
    const value = env[variable];
    if (!value) missing.push(variable);
    return value ?? '';
  };

  const tables: TableNames = {
    accounts: read('ACCOUNTS_TABLE'),
    tournaments: read('TOURNAMENTS_TABLE'),
    events: read('EVENTS_TABLE'),
    memberships: read('MEMBERSHIPS_TABLE'),
    signups: read('SIGNUPS_TABLE'),
    approverRequests: read('APPROVER_REQUESTS_TABLE'),
    responses: read('RESPONSES_TABLE'),
    guardianLinks: read('GUARDIAN_LINKS_TABLE'),
    performances: read('PERFORMANCES_TABLE')
  };
  const inlineSecret = env.DRAFT_SIGNING_SECRET;
  const secretName = env.DRAFT_SECRET_NAME;
  const draftSecret: DraftSecretSource | undefined = inlineSecret
    ? { kind: 'value', value: inlineSecret }
    : secretName
      ? { kind: 'secretsManager', secretId: secretName }
      : undefined;
  if (!draftSecret) missing.push('DRAFT_SIGNING_SECRET or DRAFT_SECRET_NAME');

  if (missing.length > 0 || !draftSecret) {
    return { ok: false, missing };
  }

  return {
    ok: true,
    config: {
      tables,
      draftSecret,
      draftTtlSeconds: parseTtl(env.DRAFT_TTL_SECONDS),
      referenceTimeZone: env.REFERENCE_TIME_ZONE || DEFAULT_REFERENCE_TIME_ZONE
    }
  };
};
