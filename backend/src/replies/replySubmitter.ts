import type { BusinessProfileApi } from '../businessProfile/businessProfileApi';
import { SubmissionError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import type {
  AccountLocations,
  ReplyItem,
  Review,
  SubmissionResult,
} from '../types';

const log = createLogger('replies');

export const SKIP_NO_REVIEW_ID = 'no reviewId';
export const SKIP_NO_RESOURCE_NAME = 'cannot construct review resource name';

/**
 * The review's own resource name when the API returned one. Otherwise the
 * name is rebuilt from the first account that has exactly one location;
 * with no such account the review cannot be addressed.
 */
export function resolveReviewResourceName(
  review: Review,
  accounts: AccountLocations,
): string | undefined {
  if (review.resourceName) return review.resourceName;

  for (const locations of Object.values(accounts)) {
    if (locations.length === 1) {
      return `${locations[0].name}/reviews/${review.reviewId}`;
    }
  }
  return undefined;
}

async function submitOne(
  api: BusinessProfileApi,
  item: ReplyItem,
  accounts: AccountLocations,
): Promise<SubmissionResult> {
  const { reviewId } = item.review;
  if (!reviewId) {
    return { status: 'skipped', reason: SKIP_NO_REVIEW_ID };
  }

  const resourceName = resolveReviewResourceName(item.review, accounts);
  if (!resourceName) {
    return { status: 'skipped', reviewId, reason: SKIP_NO_RESOURCE_NAME };
  }

  try {
    const response = await api.replyToReview(resourceName, item.replyText);
    return { status: 'posted', reviewId, resourceName, response };
  } catch (err) {
    const failure = new SubmissionError(
      `Failed to post reply: ${errorMessage(err)}`,
    );
    log.error(`${resourceName}:`, failure.message);
    return {
      status: 'failed',
      reviewId,
      error: failure.message,
      code: failure.code,
    };
  }
}

/**
 * Posts replies one at a time, in the given order. A failed or skipped
 * reply never stops the ones after it.
 */
export async function submitReplies(
  api: BusinessProfileApi,
  items: ReplyItem[],
  accounts: AccountLocations,
): Promise<SubmissionResult[]> {
  const results: SubmissionResult[] = [];
  for (const item of items) {
    results.push(await submitOne(api, item, accounts));
  }
  return results;
}
