import fetch, { FetchError as HttpFetchError } from 'node-fetch';
import { z } from 'zod';
import { FetchError, ValidationError } from '../errors';
import type {
  FetchedReviews,
  PlaceInput,
  Review,
  ReviewSource,
  SourceMode,
} from '../types';

export const PLACE_DETAILS_URL =
  'https://maps.googleapis.com/maps/api/place/details/json';

const placesReviewSchema = z.object({
  author_name: z.string().optional(),
  author_url: z.string().optional(),
  rating: z.number().optional(),
  text: z.string().optional(),
  time: z.number().optional(),
});

const placeDetailsSchema = z.object({
  status: z.string().optional(),
  error_message: z.string().optional(),
  result: z
    .object({
      name: z.string().optional(),
      rating: z.number().optional(),
      reviews: z.array(placesReviewSchema).optional(),
    })
    .optional(),
});

type PlacesReview = z.infer<typeof placesReviewSchema>;
type PlaceDetailsResponse = z.infer<typeof placeDetailsSchema>;

export type PlacesApiSourceOptions = {
  apiKey: string;
  timeoutMs: number;
};

// node-fetch puts the request URL, key included, in its messages.
function describeRequestFailure(err: unknown, timeoutMs: number): string {
  if (err instanceof HttpFetchError) {
    return err.type === 'request-timeout'
      ? `timed out after ${timeoutMs}ms`
      : `failed (${err.code ?? err.type})`;
  }
  return `failed (${err instanceof Error ? err.name : 'unknown error'})`;
}

export function normalizeRating(value: unknown): number | undefined {
  return typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= 1 &&
    value <= 5
    ? value
    : undefined;
}

/**
 * Read-only source backed by the Places Details endpoint. The endpoint only
 * returns a handful of the most relevant reviews and never exposes owner
 * replies, so every review it yields counts as unanswered.
 */
export class PlacesApiSource implements ReviewSource {
  public readonly mode: SourceMode = 'placesApi';

  constructor(private readonly options: PlacesApiSourceOptions) {}

  async fetchReviews(input: PlaceInput): Promise<FetchedReviews> {
    const placeId = input.placeId?.trim();
    if (!placeId) {
      throw new ValidationError('Missing Google Place ID (place_id).');
    }

    const url = new URL(PLACE_DETAILS_URL);
    url.searchParams.set('place_id', placeId);
    url.searchParams.set('fields', 'name,rating,reviews');
    url.searchParams.set('key', this.options.apiKey);

    let data: PlaceDetailsResponse;
    try {
      const res = await fetch(url.toString(), {
        timeout: this.options.timeoutMs,
      });
      if (!res.ok) {
        throw new FetchError(
          `Places API HTTP error: ${res.status} ${res.statusText}`,
          res.status,
        );
      }
      const parsed = placeDetailsSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new FetchError('Places API returned an unexpected response.');
      }
      data = parsed.data;
    } catch (err) {
      if (err instanceof FetchError) throw err;
      throw new FetchError(
        `Places API request ${describeRequestFailure(err, this.options.timeoutMs)}.`,
      );
    }

    if (data.status !== 'OK') {
      throw new FetchError(
        `Places API error: ${data.status ?? 'UNKNOWN'} - ${
          data.error_message ?? 'no error message'
        }`,
        data.status,
      );
    }

    const result = data.result ?? {};
    return {
      placeName: result.name,
      placeRating: result.rating,
      reviews: (result.reviews ?? []).map((rev) => this.toReview(rev)),
    };
  }

  private toReview(rev: PlacesReview): Review {
    return {
      // Places exposes no review id; the author URL is the closest thing.
      reviewId: rev.author_url ?? '',
      authorName: rev.author_name ?? '',
      rating: normalizeRating(rev.rating),
      text: rev.text ?? '',
      time: rev.time,
      reply: undefined,
    };
  }
}
