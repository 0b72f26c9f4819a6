import { describe, it, expect } from 'vitest';
import { delay, http, HttpResponse } from 'msw';
import { server } from '../__helpers__/setup';
import { FetchError, ValidationError } from '../errors';
import {
  PLACE_DETAILS_URL,
  PlacesApiSource,
  normalizeRating,
} from '../places/placesApiSource';
import { draftReplies } from '../replies/replyComposer';

const PLACE_ID = 'ChIJtest-place-id';

const PLACE_DETAILS = {
  status: 'OK',
  result: {
    name: 'Corner Bakery',
    rating: 4.2,
    reviews: [
      {
        author_name: 'Ann Lee',
        author_url: 'https://www.google.com/maps/contrib/111/reviews',
        rating: 5,
        text: 'Lovely bread.',
        time: 1700000000,
      },
      {
        author_name: 'Bo Chen',
        author_url: 'https://www.google.com/maps/contrib/222/reviews',
        rating: 3,
        text: 'Fine, a bit slow.',
        time: 1700000100,
      },
      {
        author_name: 'Cy Diaz',
        author_url: 'https://www.google.com/maps/contrib/333/reviews',
        rating: 1,
        text: 'Cold coffee.',
        time: 1700000200,
      },
    ],
  },
};

function source() {
  return new PlacesApiSource({ apiKey: 'test-api-key', timeoutMs: 20_000 });
}

describe('PlacesApiSource', () => {
  it('requests name, rating and reviews for the place', async () => {
    let requested: URL | undefined;
    server.use(
      http.get(PLACE_DETAILS_URL, ({ request }) => {
        requested = new URL(request.url);
        return HttpResponse.json(PLACE_DETAILS);
      }),
    );

    await source().fetchReviews({ placeId: `  ${PLACE_ID} ` });

    expect(requested?.searchParams.get('place_id')).toBe(PLACE_ID);
    expect(requested?.searchParams.get('fields')).toBe('name,rating,reviews');
    expect(requested?.searchParams.get('key')).toBe('test-api-key');
  });

  it('treats every fetched review as unanswered', async () => {
    server.use(http.get(PLACE_DETAILS_URL, () => HttpResponse.json(PLACE_DETAILS)));

    const fetched = await source().fetchReviews({ placeId: PLACE_ID });

    expect(fetched.placeName).toBe('Corner Bakery');
    expect(fetched.placeRating).toBe(4.2);
    expect(fetched.reviews).toHaveLength(3);
    expect(fetched.reviews[0]).toEqual({
      reviewId: 'https://www.google.com/maps/contrib/111/reviews',
      authorName: 'Ann Lee',
      rating: 5,
      text: 'Lovely bread.',
      time: 1700000000,
      reply: undefined,
    });
    expect(fetched.reviews.every((r) => r.reply === undefined)).toBe(true);

    const drafts = draftReplies(fetched.reviews, '', 'Team Corner Bakery');
    expect(drafts.map((d) => d.replyText.split('\n\n')[0])).toEqual([
      'Hi Ann, Thank you for the 5 stars review. We are delighted you had an excellent experience.',
      'Hi Bo, Thank you for the 3 stars review. We appreciate your honest feedback and will work to improve.',
      "Hi Cy, We're very sorry you had a bad experience. Thank you for the 1 star review — please contact us so we can make it right.",
    ]);
  });

  it('raises a FetchError for a non-OK API status', async () => {
    server.use(
      http.get(PLACE_DETAILS_URL, () =>
        HttpResponse.json({
          status: 'REQUEST_DENIED',
          error_message: 'The provided API key is invalid.',
        }),
      ),
    );

    const attempt = source().fetchReviews({ placeId: PLACE_ID });
    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    await expect(attempt).rejects.toThrow(
      'Places API error: REQUEST_DENIED - The provided API key is invalid.',
    );
  });

  it('raises a FetchError for an HTTP failure', async () => {
    server.use(
      http.get(PLACE_DETAILS_URL, () =>
        HttpResponse.json({ error: 'boom' }, { status: 500 }),
      ),
    );

    await expect(source().fetchReviews({ placeId: PLACE_ID })).rejects.toThrow(
      /^Places API HTTP error: 500/,
    );
  });

  it('gives up on a stalled request without exposing the key', async () => {
    server.use(
      http.get(PLACE_DETAILS_URL, async () => {
        await delay('infinite');
        return HttpResponse.json(PLACE_DETAILS);
      }),
    );
    const slow = new PlacesApiSource({ apiKey: 'test-api-key', timeoutMs: 50 });

    const attempt = slow.fetchReviews({ placeId: PLACE_ID });

    await expect(attempt).rejects.toBeInstanceOf(FetchError);
    await expect(attempt).rejects.toThrow(
      /^Places API request timed out after 50ms\.$/,
    );
  });

  it('keeps the key out of network failure messages', async () => {
    server.use(http.get(PLACE_DETAILS_URL, () => HttpResponse.error()));

    const err: unknown = await source()
      .fetchReviews({ placeId: PLACE_ID })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(FetchError);
    expect(String(err)).toMatch(/Places API request failed \(/);
    expect(String(err)).not.toContain('test-api-key');
  });

  it('rejects a blank place id before calling the API', async () => {
    await expect(source().fetchReviews({ placeId: '  ' })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });
});

describe('normalizeRating', () => {
  it('keeps whole ratings between 1 and 5 only', () => {
    expect(normalizeRating(1)).toBe(1);
    expect(normalizeRating(5)).toBe(5);
    expect(normalizeRating(0)).toBeUndefined();
    expect(normalizeRating(4.5)).toBeUndefined();
    expect(normalizeRating('5')).toBeUndefined();
  });
});
