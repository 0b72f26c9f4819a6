export type SourceMode = 'placesApi' | 'businessProfile';

export type SessionState =
  | 'noCredential'
  | 'idle'
  | 'fetched'
  | 'reviewing'
  | 'posting'
  | 'done';

export type LocationSummary = {
  name: string;
  storeCode?: string;
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

export type SubmissionResult =
  | { status: 'posted'; reviewId: string; resourceName: string; response: unknown }
  | { status: 'skipped'; reviewId?: string; reason: string }
  | { status: 'failed'; reviewId: string; error: string; code: string };

export type SessionSnapshot = {
  state: SessionState;
  mode: SourceMode;
  hasApiKey: boolean;
  hasServiceAccount: boolean;
  connected: boolean;
  warnings: string[];
  accounts: Record<string, LocationSummary[]>;
  selectedAccount?: string;
  selectedLocation?: string;
  place?: { name?: string; rating?: number };
  totalFetched: number;
  unanswered: number;
  selectedToPost: number;
  extraText: string;
  drafts: DraftView[];
  results: SubmissionResult[];
};

async function call(
  path: string,
  method: 'GET' | 'POST' | 'PUT' | 'PATCH' = 'GET',
  body?: unknown,
): Promise<SessionSnapshot> {
  const res = await fetch(path, {
    method,
    headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });

  if (!res.ok) {
    const errBody = await res.json().catch(() => ({}));
    throw new Error(
      errBody.message || errBody.error || 'Backend returned a non-OK status.',
    );
  }
  return (await res.json()) as SessionSnapshot;
}

export const api = {
  session: () => call('/api/session'),
  selectMode: (mode: SourceMode) => call('/api/mode', 'POST', { mode }),
  fetchPlaceReviews: (placeId: string) =>
    call('/api/places/reviews', 'POST', { placeId }),
  connect: () => call('/api/business/connect', 'POST'),
  selectLocation: (account: string, location?: string) =>
    call('/api/business/selection', 'PUT', { account, location }),
  fetchLocationReviews: () => call('/api/business/reviews', 'POST'),
  setExtraText: (extraText: string) =>
    call('/api/drafts/extra', 'PUT', { extraText }),
  updateDraft: (index: number, patch: { replyText?: string; post?: boolean }) =>
    call(`/api/drafts/${index}`, 'PATCH', patch),
  postReplies: () => call('/api/replies', 'POST'),
};
