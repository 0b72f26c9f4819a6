export type Review = {
  reviewId: string; // author URL for Places, opaque id for Business Profile
  resourceName?: string; // accounts/{a}/locations/{l}/reviews/{r}
  authorName: string;
  rating?: number; // 1–5
  text: string;
  time?: number; // epoch seconds (Places)
  createTime?: string; // RFC 3339 (Business Profile)
  reply?: string;
};

export type SourceMode = 'placesApi' | 'businessProfile';

export type PlaceInput = {
  placeId?: string; // for Places API
  locationName?: string; // for Business Profile
};

export type FetchedReviews = {
  placeName?: string;
  placeRating?: number;
  reviews: Review[];
};

export interface ReviewSource {
  mode: SourceMode;
  fetchReviews(input: PlaceInput): Promise<FetchedReviews>;
}

export type LocationSummary = {
  name: string; // accounts/{a}/locations/{l}
  storeCode?: string;
};

export type AccountLocations = {
  [accountName: string]: LocationSummary[];
};

export type ReplyItem = {
  review: Review;
  replyText: string;
};

export type SubmissionResult =
  | {
      status: 'posted';
      reviewId: string;
      resourceName: string;
      response: unknown;
    }
  | { status: 'skipped'; reviewId?: string; reason: string }
  | { status: 'failed'; reviewId: string; error: string; code: string };

export type ServiceAccountCredential = {
  client_email: string;
  private_key: string;
  [field: string]: unknown;
};

export type SessionState =
  | 'noCredential'
  | 'idle'
  | 'fetched'
  | 'reviewing'
  | 'posting'
  | 'done';

export type ReplyDraft = {
  review: Review;
  replyText: string;
  post: boolean;
  edited: boolean;
};
