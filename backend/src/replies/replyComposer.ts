import type { ReplyDraft, Review } from '../types';

export const DEFAULT_DRAFT_RATING = 4;
export const FALLBACK_FIRST_NAME = 'there';
export const FALLBACK_AUTHOR = 'Customer';

export function signatureFor(businessName: string): string {
  return `Team ${businessName}`;
}

function starPhrase(rating: number): string {
  return rating === 1 ? '1 star' : `${rating} stars`;
}

function opening(firstName: string, rating: number): string {
  const stars = starPhrase(rating);
  if (rating >= 5) {
    return `Hi ${firstName}, Thank you for the ${stars} review. We are delighted you had an excellent experience.`;
  }
  if (rating === 4) {
    return `Hi ${firstName}, Thank you for the ${stars} review. We appreciate the feedback.`;
  }
  if (rating === 3) {
    return `Hi ${firstName}, Thank you for the ${stars} review. We appreciate your honest feedback and will work to improve.`;
  }
  if (rating === 2) {
    return `Hi ${firstName}, We're sorry your experience was not ideal. Thank you for the ${stars} review — we'll use this to improve.`;
  }
  return `Hi ${firstName}, We're very sorry you had a bad experience. Thank you for the ${stars} review — please contact us so we can make it right.`;
}

/**
 * Canned reply for a review. Pure: the same inputs always give the same text.
 */
export function composeReply(
  firstName: string,
  rating: number,
  extraText: string,
  signature: string,
): string {
  const start = opening(firstName, rating);
  const body = extraText ? `${start} ${extraText}` : start;
  return `${body}\n\n${signature}`;
}

export function displayAuthor(review: Review): string {
  return review.authorName.trim() || FALLBACK_AUTHOR;
}

export function firstNameOf(authorName: string): string {
  const [first] = authorName.trim().split(/\s+/);
  return first || FALLBACK_FIRST_NAME;
}

export function isUnanswered(review: Review): boolean {
  return !review.reply;
}

export function draftReply(
  review: Review,
  extraText: string,
  signature: string,
): string {
  return composeReply(
    firstNameOf(displayAuthor(review)),
    review.rating ?? DEFAULT_DRAFT_RATING,
    extraText,
    signature,
  );
}

/** Drafts a reply for every unanswered review, each checked for posting. */
export function draftReplies(
  reviews: Review[],
  extraText: string,
  signature: string,
): ReplyDraft[] {
  return reviews.filter(isUnanswered).map((review) => ({
    review,
    replyText: draftReply(review, extraText, signature),
    post: true,
    edited: false,
  }));
}
