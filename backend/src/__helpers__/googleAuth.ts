import { generateKeyPairSync } from 'node:crypto';
import { delay, http, HttpResponse } from 'msw';
import type { ServiceAccountCredential } from '../types';

const TOKEN_URLS = [
  'https://www.googleapis.com/oauth2/v4/token',
  'https://oauth2.googleapis.com/token',
];

const { privateKey } = generateKeyPairSync('rsa', {
  modulusLength: 2048,
  privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  publicKeyEncoding: { type: 'spki', format: 'pem' },
});

/** A service account whose key can actually sign the token request. */
export const SIGNING_SERVICE_ACCOUNT: ServiceAccountCredential = {
  client_email: 'replier@test-project.iam.gserviceaccount.com',
  private_key: privateKey,
};

export const grantTokenHandlers = TOKEN_URLS.map((url) =>
  http.post(url, () =>
    HttpResponse.json({
      access_token: 'test-token',
      expires_in: 3600,
      token_type: 'Bearer',
    }),
  ),
);

export const stalledTokenHandlers = TOKEN_URLS.map((url) =>
  http.post(url, async () => {
    await delay('infinite');
    return HttpResponse.json({});
  }),
);
