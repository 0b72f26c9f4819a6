import { describe, it, expect } from 'vitest';
import {
  decodeServiceAccount,
  loadCredentials,
} from '../credentials/credentialLoader';
import { CredentialParseError } from '../errors';

const SERVICE_ACCOUNT = {
  type: 'service_account',
  client_email: 'replier@test-project.iam.gserviceaccount.com',
  private_key: 'test-private-key',
};

describe('decodeServiceAccount', () => {
  it('uses a structured object as-is', () => {
    expect(decodeServiceAccount(SERVICE_ACCOUNT)).toEqual(SERVICE_ACCOUNT);
  });

  it('decodes a base64-encoded JSON string', () => {
    const encoded = Buffer.from(JSON.stringify(SERVICE_ACCOUNT)).toString(
      'base64',
    );
    expect(decodeServiceAccount(encoded)).toEqual(SERVICE_ACCOUNT);
  });

  it('falls back to parsing a raw JSON string', () => {
    expect(decodeServiceAccount(JSON.stringify(SERVICE_ACCOUNT))).toEqual(
      SERVICE_ACCOUNT,
    );
  });

  it('reports the last failure when no variant works', () => {
    expect(() => decodeServiceAccount('not json')).toThrow(CredentialParseError);
    expect(() => decodeServiceAccount('not json')).toThrow(/\(json: /);
  });

  it('rejects an object without a private key', () => {
    expect(() =>
      decodeServiceAccount({ client_email: 'replier@test-project.iam' }),
    ).toThrow(
      'Could not parse service account JSON from secrets (object: missing client_email or private_key).',
    );
  });
});

describe('loadCredentials', () => {
  it('trims the API key and decodes the service account', () => {
    const loaded = loadCredentials({
      googleApiKey: '  test-api-key  ',
      businessServiceAccount: JSON.stringify(SERVICE_ACCOUNT),
    });
    expect(loaded.apiKey).toBe('test-api-key');
    expect(loaded.serviceAccount).toEqual(SERVICE_ACCOUNT);
    expect(loaded.warnings).toEqual([]);
  });

  it('leaves a malformed service account unset and reports it', () => {
    const loaded = loadCredentials({
      googleApiKey: 'test-api-key',
      businessServiceAccount: '{broken',
    });
    expect(loaded.serviceAccount).toBeUndefined();
    expect(loaded.apiKey).toBe('test-api-key');
    expect(loaded.warnings).toHaveLength(1);
    expect(loaded.warnings[0]).toMatch(
      /^Could not parse service account JSON from secrets/,
    );
  });

  it('treats blank secrets as absent without warnings', () => {
    const loaded = loadCredentials({
      googleApiKey: '   ',
      businessServiceAccount: '',
    });
    expect(loaded).toEqual({ warnings: [] });
  });

  it('warns when the API key is not a string', () => {
    const loaded = loadCredentials({ googleApiKey: 42 });
    expect(loaded.apiKey).toBeUndefined();
    expect(loaded.warnings).toEqual(['google_api_key must be a plain string.']);
  });
});
