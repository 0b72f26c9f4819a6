import type { BusinessProfileApi } from '../businessProfile/businessProfileApi';
import type { LoadedCredentials } from '../credentials/credentialLoader';
import { displayAuthor } from '../replies/replyComposer';
import type {
  AccountLocations,
  ReplyDraft,
  Review,
  SessionState,
  SourceMode,
  SubmissionResult,
} from '../types';

export type PlaceSummary = {
  name?: string;
  rating?: number;
};

/**
 * Everything one interactive session knows. Lives in memory for the life of
 * the process and is only mutated by the action currently running.
 */
export type Session = {
  state: SessionState;
  mode: SourceMode;
  credentials: LoadedCredentials;
  service?: BusinessProfileApi;
  accounts: AccountLocations;
  selectedAccount?: string;
  selectedLocation?: string;
  place?: PlaceSummary;
  reviews: Review[];
  drafts: ReplyDraft[];
  extraText: string;
  results: SubmissionResult[];
  busy: boolean;
};

export type DraftView = {
  index: number;
  reviewId: string;
  authorName: string;
  rating?: number;
  text: string;
  replyText: string;
  post: boolean;
  edited: boolean;
};

export type SessionSnapshot = {
  state: SessionState;
  mode: SourceMode;
  hasApiKey: boolean;
  hasServiceAccount: boolean;
  connected: boolean;
  warnings: string[];
  accounts: AccountLocations;
  selectedAccount?: string;
  selectedLocation?: string;
  place?: PlaceSummary;
  totalFetched: number;
  unanswered: number;
  selectedToPost: number;
  extraText: string;
  drafts: DraftView[];
  results: SubmissionResult[];
};

export function createSession(credentials: LoadedCredentials): Session {
  const hasCredential = Boolean(
    credentials.apiKey || credentials.serviceAccount,
  );
  return {
    state: hasCredential ? 'idle' : 'noCredential',
    mode: credentials.apiKey ? 'placesApi' : 'businessProfile',
    credentials,
    accounts: {},
    reviews: [],
    drafts: [],
    extraText: '',
    results: [],
    busy: false,
  };
}

export function toSnapshot(session: Session): SessionSnapshot {
  return {
    state: session.state,
    mode: session.mode,
    hasApiKey: Boolean(session.credentials.apiKey),
    hasServiceAccount: Boolean(session.credentials.serviceAccount),
    connected: Boolean(session.service),
    warnings: [...session.credentials.warnings],
    accounts: session.accounts,
    selectedAccount: session.selectedAccount,
    selectedLocation: session.selectedLocation,
    place: session.place,
    totalFetched: session.reviews.length,
    unanswered: session.drafts.length,
    selectedToPost: session.drafts.filter((d) => d.post).length,
    extraText: session.extraText,
    drafts: session.drafts.map((draft, index) => ({
      index,
      reviewId: draft.review.reviewId,
      authorName: displayAuthor(draft.review),
      rating: draft.review.rating,
      text: draft.review.text,
      replyText: draft.replyText,
      post: draft.post,
      edited: draft.edited,
    })),
    results: session.results,
  };
}
