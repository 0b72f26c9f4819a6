import { JWT } from 'google-auth-library';
import { z } from 'zod';
import { ConnectionError, FetchError, errorMessage } from '../errors';
import type { ServiceAccountCredential } from '../types';

export const BUSINESS_MANAGE_SCOPE =
  'https://www.googleapis.com/auth/business.manage';
export const MY_BUSINESS_BASE_URL = 'https://mybusiness.googleapis.com/v4';

const accountSchema = z.object({ name: z.string() });
const locationSchema = z.object({
  name: z.string(),
  storeCode: z.string().optional(),
});
const reviewSchema = z.object({
  name: z.string().optional(),
  reviewId: z.string().optional(),
  reviewer: z.object({ displayName: z.string().optional() }).optional(),
  starRating: z.string().optional(),
  comment: z.string().optional(),
  createTime: z.string().optional(),
  reviewReply: z.object({ comment: z.string().optional() }).optional(),
});

const accountsResponseSchema = z.object({
  accounts: z.array(accountSchema).optional(),
});
const locationsResponseSchema = z.object({
  locations: z.array(locationSchema).optional(),
});
const reviewsResponseSchema = z.object({
  reviews: z.array(reviewSchema).optional(),
});

export type GbpAccount = z.infer<typeof accountSchema>;
export type GbpLocation = z.infer<typeof locationSchema>;
export type GbpReview = z.infer<typeof reviewSchema>;

/**
 * The part of the Business Profile (My Business v4) API this tool uses.
 * Kept narrow so tests can substitute an in-memory fake.
 */
export interface BusinessProfileApi {
  listAccounts(): Promise<GbpAccount[]>;
  listLocations(accountName: string): Promise<GbpLocation[]>;
  listReviews(locationName: string): Promise<GbpReview[]>;
  replyToReview(reviewName: string, comment: string): Promise<unknown>;
}

export type RequestOptions = {
  url: string;
  method?: 'GET' | 'PUT';
  data?: unknown;
  timeout?: number;
};

/** Anything that can perform an authorised request, e.g. a JWT client. */
export interface AuthorizedRequester {
  request(options: RequestOptions): Promise<{ data: unknown }>;
}

export class HttpBusinessProfileApi implements BusinessProfileApi {
  constructor(
    private readonly requester: AuthorizedRequester,
    private readonly timeoutMs: number,
    private readonly baseUrl: string = MY_BUSINESS_BASE_URL,
  ) {}

  async listAccounts(): Promise<GbpAccount[]> {
    const data = await this.get('accounts');
    return accountsResponseSchema.parse(data).accounts ?? [];
  }

  async listLocations(accountName: string): Promise<GbpLocation[]> {
    const data = await this.get(`${accountName}/locations`);
    return locationsResponseSchema.parse(data).locations ?? [];
  }

  async listReviews(locationName: string): Promise<GbpReview[]> {
    const data = await this.get(`${locationName}/reviews`);
    return reviewsResponseSchema.parse(data).reviews ?? [];
  }

  async replyToReview(reviewName: string, comment: string): Promise<unknown> {
    const res = await this.requester.request({
      url: `${this.baseUrl}/${reviewName}/reply`,
      method: 'PUT',
      data: { comment },
      timeout: this.timeoutMs,
    });
    return res.data;
  }

  private async get(path: string): Promise<unknown> {
    const res = await this.requester.request({
      url: `${this.baseUrl}/${path}`,
      method: 'GET',
      timeout: this.timeoutMs,
    });
    return res.data;
  }
}

/**
 * Rejects once `timeoutMs` has passed, whether or not `work` honours the
 * signal. The JWT token exchange does not take one.
 */
async function withDeadline<T>(
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const signal = AbortSignal.timeout(timeoutMs);
  let stopWatching: () => void = () => undefined;
  const expired = new Promise<never>((_, reject) => {
    const onAbort = () =>
      reject(
        new FetchError(
          `Business Profile request timed out after ${timeoutMs}ms.`,
        ),
      );
    signal.addEventListener('abort', onAbort, { once: true });
    stopWatching = () => signal.removeEventListener('abort', onAbort);
  });
  try {
    return await Promise.race([work(signal), expired]);
  } finally {
    stopWatching();
  }
}

/**
 * Builds an API handle authorised by the service account with the
 * business.manage scope. No network call happens until the first request;
 * each request, token exchange included, must finish within `timeoutMs`.
 */
export function connectBusinessProfile(
  credential: ServiceAccountCredential,
  timeoutMs: number,
): BusinessProfileApi {
  let jwt: JWT;
  try {
    jwt = new JWT({
      email: credential.client_email,
      key: credential.private_key,
      scopes: [BUSINESS_MANAGE_SCOPE],
    });
  } catch (err) {
    throw new ConnectionError(
      `Could not build Business Profile client: ${errorMessage(err)}`,
    );
  }

  const requester: AuthorizedRequester = {
    request: (options) =>
      withDeadline(timeoutMs, async (signal) => {
        const res = await jwt.request<unknown>({ ...options, signal });
        return { data: res.data };
      }),
  };
  return new HttpBusinessProfileApi(requester, timeoutMs);
}
