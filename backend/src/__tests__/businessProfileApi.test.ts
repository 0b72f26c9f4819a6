import { describe, it, expect, vi } from 'vitest';
import { delay, http, HttpResponse } from 'msw';
import {
  SIGNING_SERVICE_ACCOUNT,
  grantTokenHandlers,
  stalledTokenHandlers,
} from '../__helpers__/googleAuth';
import { server } from '../__helpers__/setup';
import { FetchError } from '../errors';
import {
  BUSINESS_MANAGE_SCOPE,
  HttpBusinessProfileApi,
  MY_BUSINESS_BASE_URL,
  connectBusinessProfile,
  type AuthorizedRequester,
  type RequestOptions,
} from '../businessProfile/businessProfileApi';

function requesterReturning(data: unknown) {
  const request = vi.fn(async (_options: RequestOptions) => ({ data }));
  const requester: AuthorizedRequester = { request };
  return { requester, request };
}

describe('HttpBusinessProfileApi', () => {
  it('lists accounts from the v4 surface', async () => {
    const { requester, request } = requesterReturning({
      accounts: [{ name: 'accounts/100', accountName: 'Corner Bakery' }],
    });
    const api = new HttpBusinessProfileApi(requester, 20_000);

    await expect(api.listAccounts()).resolves.toEqual([{ name: 'accounts/100' }]);
    expect(request).toHaveBeenCalledWith({
      url: `${MY_BUSINESS_BASE_URL}/accounts`,
      method: 'GET',
      timeout: 20_000,
    });
  });

  it('lists locations and reviews under their parents', async () => {
    const { requester, request } = requesterReturning({});
    const api = new HttpBusinessProfileApi(requester, 5_000);

    await expect(api.listLocations('accounts/100')).resolves.toEqual([]);
    await expect(
      api.listReviews('accounts/100/locations/200'),
    ).resolves.toEqual([]);

    expect(request.mock.calls.map(([options]) => options.url)).toEqual([
      `${MY_BUSINESS_BASE_URL}/accounts/100/locations`,
      `${MY_BUSINESS_BASE_URL}/accounts/100/locations/200/reviews`,
    ]);
  });

  it('puts the reply comment and returns the response verbatim', async () => {
    const response = { comment: 'Thanks!', updateTime: '2026-01-01T00:00:00Z' };
    const { requester, request } = requesterReturning(response);
    const api = new HttpBusinessProfileApi(requester, 20_000);

    const result = await api.replyToReview(
      'accounts/100/locations/200/reviews/r1',
      'Thanks!',
    );

    expect(result).toEqual(response);
    expect(request).toHaveBeenCalledWith({
      url: `${MY_BUSINESS_BASE_URL}/accounts/100/locations/200/reviews/r1/reply`,
      method: 'PUT',
      data: { comment: 'Thanks!' },
      timeout: 20_000,
    });
  });

  it('rejects a response of the wrong shape', async () => {
    const { requester } = requesterReturning({ accounts: 'nope' });
    const api = new HttpBusinessProfileApi(requester, 20_000);
    await expect(api.listAccounts()).rejects.toThrow();
  });
});

describe('connectBusinessProfile', () => {
  it('builds a client without contacting Google', () => {
    const api = connectBusinessProfile(
      { client_email: 'replier@test-project.iam', private_key: 'test-private-key' },
      20_000,
    );
    expect(api).toBeInstanceOf(HttpBusinessProfileApi);
    expect(BUSINESS_MANAGE_SCOPE).toBe(
      'https://www.googleapis.com/auth/business.manage',
    );
  });

  it('sends the exchanged token with each request', async () => {
    let authorization: string | null = null;
    server.use(
      ...grantTokenHandlers,
      http.get(`${MY_BUSINESS_BASE_URL}/accounts`, ({ request }) => {
        authorization = request.headers.get('authorization');
        return HttpResponse.json({ accounts: [{ name: 'accounts/100' }] });
      }),
    );

    const api = connectBusinessProfile(SIGNING_SERVICE_ACCOUNT, 5_000);

    await expect(api.listAccounts()).resolves.toEqual([{ name: 'accounts/100' }]);
    expect(authorization).toBe('Bearer test-token');
  });

  it('fails fast on an unmocked token exchange', async () => {
    const api = connectBusinessProfile(SIGNING_SERVICE_ACCOUNT, 2_000);

    await expect(api.listAccounts()).rejects.toThrow(/not mocked|500/);
  });

  it('gives up when the token exchange stalls', async () => {
    server.use(...stalledTokenHandlers);
    const api = connectBusinessProfile(SIGNING_SERVICE_ACCOUNT, 100);

    const attempt = api.listAccounts();

    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    await expect(attempt).rejects.toThrow(
      'Business Profile request timed out after 100ms.',
    );
  });

  it('gives up when the API call stalls', async () => {
    server.use(
      ...grantTokenHandlers,
      http.get(`${MY_BUSINESS_BASE_URL}/accounts`, async () => {
        await delay('infinite');
        return HttpResponse.json({});
      }),
    );
    const api = connectBusinessProfile(SIGNING_SERVICE_ACCOUNT, 100);

    await expect(api.listAccounts()).rejects.toThrow(/time/i);
  });
});
