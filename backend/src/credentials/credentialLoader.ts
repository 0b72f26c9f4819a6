import { z } from 'zod';
import { CredentialParseError, errorMessage } from '../errors';
import type { RawSecrets } from '../config/config';
import type { ServiceAccountCredential } from '../types';

const serviceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

type CredentialCandidate =
  | { kind: 'object'; value: unknown }
  | { kind: 'base64'; value: string }
  | { kind: 'json'; value: string };

export type LoadedCredentials = {
  apiKey?: string;
  serviceAccount?: ServiceAccountCredential;
  warnings: string[];
};

function candidatesFor(raw: unknown): CredentialCandidate[] {
  if (typeof raw === 'string') {
    return [
      { kind: 'base64', value: raw },
      { kind: 'json', value: raw },
    ];
  }
  return [{ kind: 'object', value: raw }];
}

function decodeCandidate(candidate: CredentialCandidate): unknown {
  switch (candidate.kind) {
    case 'object':
      return candidate.value;
    case 'base64':
      return JSON.parse(
        Buffer.from(candidate.value.trim(), 'base64').toString('utf-8'),
      );
    case 'json':
      return JSON.parse(candidate.value);
  }
}

/**
 * Turns the `business_service_account` secret into a credential. Tries, in
 * order: the value as an already structured object, a base64-encoded JSON
 * string, then a raw JSON string. Throws when every variant fails.
 */
export function decodeServiceAccount(raw: unknown): ServiceAccountCredential {
  let lastFailure = 'no credential value';

  for (const candidate of candidatesFor(raw)) {
    try {
      const parsed = serviceAccountSchema.safeParse(decodeCandidate(candidate));
      if (parsed.success) return parsed.data;
      lastFailure = `${candidate.kind}: missing client_email or private_key`;
    } catch (err) {
      lastFailure = `${candidate.kind}: ${errorMessage(err)}`;
    }
  }

  throw new CredentialParseError(
    `Could not parse service account JSON from secrets (${lastFailure}).`,
  );
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  return typeof value !== 'string' || value.trim().length > 0;
}

export function loadCredentials(secrets: RawSecrets): LoadedCredentials {
  const loaded: LoadedCredentials = { warnings: [] };

  if (typeof secrets.googleApiKey === 'string' && secrets.googleApiKey.trim()) {
    loaded.apiKey = secrets.googleApiKey.trim();
  } else if (isPresent(secrets.googleApiKey)) {
    loaded.warnings.push('google_api_key must be a plain string.');
  }

  if (isPresent(secrets.businessServiceAccount)) {
    try {
      loaded.serviceAccount = decodeServiceAccount(
        secrets.businessServiceAccount,
      );
    } catch (err) {
      loaded.warnings.push(errorMessage(err));
    }
  }

  return loaded;
}
