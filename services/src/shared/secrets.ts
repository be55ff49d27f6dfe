import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import { DraftSecretSource } from './config';

const secretsClient = new SecretsManagerClient({});

// Fetched once per container; rotation takes effect on the next cold start.
const cache = new Map<string, string>();

export const resolveSecret = async (source: DraftSecretSource): Promise<string> => {
  if (source.kind === 'value') return source.value;

  const cached = cache.get(source.secretId);
  if (cached) return cached;

  const secret = await secretsClient.send(new GetSecretValueCommand({ SecretId: source.secretId }));
  if (!secret.SecretString) throw new Error(`secret ${source.secretId} is empty`);
  cache.set(source.secretId, secret.SecretString);
  return secret.SecretString;
};
