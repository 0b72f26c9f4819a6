import { readFileSync } from 'fs';
import { z } from 'zod';

export const DEFAULT_PORT = 4000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 20_000;
export const DEFAULT_BUSINESS_NAME = 'Customer Care';

/**
 * Secret values as they arrive, before any decoding. The service account
 * may be a structured object when it comes from a secrets file.
 */
export type RawSecrets = {
  googleApiKey?: unknown;
  businessServiceAccount?: unknown;
};

export type AppConfig = {
  port: number;
  requestTimeoutMs: number;
  businessName: string;
  secrets: RawSecrets;
  warnings: string[];
};

type Env = Record<string, string | undefined>;

function positiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

const secretsFileSchema = z.record(z.string(), z.unknown());

function readSecretsFile(path: string): Record<string, unknown> {
  const parsed = secretsFileSchema.safeParse(
    JSON.parse(readFileSync(path, 'utf-8')),
  );
  if (!parsed.success) {
    throw new Error(`Secrets file ${path} must contain a JSON object.`);
  }
  return parsed.data;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const warnings: string[] = [];
  let fileSecrets: Record<string, unknown> = {};

  if (env.SECRETS_FILE) {
    try {
      fileSecrets = readSecretsFile(env.SECRETS_FILE);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      warnings.push(`Could not read secrets file: ${reason}`);
    }
  }

  return {
    port: positiveInt(env.PORT, DEFAULT_PORT),
    requestTimeoutMs: positiveInt(
      env.REQUEST_TIMEOUT_MS,
      DEFAULT_REQUEST_TIMEOUT_MS,
    ),
    businessName: env.BUSINESS_NAME?.trim() || DEFAULT_BUSINESS_NAME,
    secrets: {
      googleApiKey: env.GOOGLE_API_KEY ?? fileSecrets.google_api_key,
      businessServiceAccount:
        env.BUSINESS_SERVICE_ACCOUNT ?? fileSecrets.business_service_account,
    },
    warnings,
  };
}
