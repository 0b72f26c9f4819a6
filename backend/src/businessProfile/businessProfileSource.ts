import { ConnectionError, FetchError, ValidationError, errorMessage } from '../errors';
import type {
  AccountLocations,
  FetchedReviews,
  PlaceInput,
  Review,
  ReviewSource,
  SourceMode,
} from '../types';
import type { BusinessProfileApi, GbpReview } from './businessProfileApi';

const STAR_RATINGS: Record<string, number> = {
  ONE: 1,
  TWO: 2,
  THREE: 3,
  FOUR: 4,
  FIVE: 5,
};

export function starRatingToNumber(token: unknown): number | undefined {
  if (typeof token !== 'string') return undefined;
  return STAR_RATINGS[token.toUpperCase()];
}

export async function discoverLocations(
  api: BusinessProfileApi,
): Promise<AccountLocations> {
  const mapping: AccountLocations = {};
  try {
    const accounts = await api.listAccounts();
    for (const account of accounts) {
      const locations = await api.listLocations(account.name);
      mapping[account.name] = locations.map((loc) => ({
        name: loc.name,
        storeCode: loc.storeCode,
      }));
    }
  } catch (err) {
    throw new ConnectionError(
      `Could not list Business Profile accounts: ${errorMessage(err)}`,
    );
  }
  return mapping;
}

function toReview(review: GbpReview): Review {
  return {
    reviewId: review.reviewId ?? '',
    resourceName: review.name,
    authorName: review.reviewer?.displayName ?? '',
    rating: starRatingToNumber(review.starRating),
    text: review.comment ?? '',
    createTime: review.createTime,
    reply: review.reviewReply?.comment || undefined,
  };
}

export class BusinessProfileSource implements ReviewSource {
  public readonly mode: SourceMode = 'businessProfile';

  constructor(private readonly api: BusinessProfileApi) {}

  async fetchReviews(input: PlaceInput): Promise<FetchedReviews> {
    if (!input.locationName) {
      throw new ValidationError('Select a location first.');
    }

    let reviews: GbpReview[];
    try {
      reviews = await this.api.listReviews(input.locationName);
    } catch (err) {
      throw new FetchError(
        `Business Profile API error: ${errorMessage(err)}`,
      );
    }
    return { reviews: reviews.map(toReview) };
  }
}
