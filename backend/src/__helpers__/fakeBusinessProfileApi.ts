import type {
  BusinessProfileApi,
  GbpAccount,
  GbpLocation,
  GbpReview,
} from '../businessProfile/businessProfileApi';

type FakeData = {
  accounts?: GbpAccount[];
  locations?: Record<string, GbpLocation[]>;
  reviews?: Record<string, GbpReview[]>;
};

/** In-memory stand-in for the Business Profile API. */
export class FakeBusinessProfileApi implements BusinessProfileApi {
  readonly replies: Array<{ reviewName: string; comment: string }> = [];
  readonly failingReplies = new Set<string>();
  failListAccounts = false;

  constructor(private readonly data: FakeData = {}) {}

  async listAccounts(): Promise<GbpAccount[]> {
    if (this.failListAccounts) {
      throw new Error('Request had insufficient authentication scopes.');
    }
    return this.data.accounts ?? [];
  }

  async listLocations(accountName: string): Promise<GbpLocation[]> {
    return this.data.locations?.[accountName] ?? [];
  }

  async listReviews(locationName: string): Promise<GbpReview[]> {
    const reviews = this.data.reviews?.[locationName];
    if (!reviews) throw new Error(`Location not found: ${locationName}`);
    return reviews;
  }

  async replyToReview(reviewName: string, comment: string): Promise<unknown> {
    this.replies.push({ reviewName, comment });
    if (this.failingReplies.has(reviewName)) {
      throw new Error('Request failed with status code 403');
    }
    return { comment, updateTime: '2026-01-01T00:00:00Z' };
  }
}
