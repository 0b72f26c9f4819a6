import type { BusinessProfileApi } from '../businessProfile/businessProfileApi';
import {
  BusinessProfileSource,
  discoverLocations,
} from '../businessProfile/businessProfileSource';
import {
  ActionInProgressError,
  AppError,
  ConnectionError,
  ValidationError,
  errorMessage,
} from '../errors';
import { createLogger } from '../logger';
import { draftReplies, draftReply } from '../replies/replyComposer';
import { submitReplies } from '../replies/replySubmitter';
import type {
  Review,
  ReviewSource,
  ServiceAccountCredential,
  SourceMode,
} from '../types';
import { toSnapshot, type Session, type SessionSnapshot } from './session';

const log = createLogger('flow');

export type FlowDependencies = {
  createPlacesSource(apiKey: string): ReviewSource;
  connect(credential: ServiceAccountCredential): BusinessProfileApi;
  signature: string;
};

export type DraftPatch = {
  replyText?: string;
  post?: boolean;
};

/**
 * Runs the user's actions against the session, one at a time. An action
 * that fails leaves the session exactly as it found it.
 */
export class FlowController {
  constructor(
    private readonly session: Session,
    private readonly deps: FlowDependencies,
  ) {}

  snapshot(): SessionSnapshot {
    return toSnapshot(this.session);
  }

  selectMode(mode: SourceMode): SessionSnapshot {
    this.ensureNotBusy('select mode');
    this.session.mode = mode;
    return this.snapshot();
  }

  fetchPlaceReviews(placeId: string): Promise<SessionSnapshot> {
    return this.exclusive('fetch reviews', async () => {
      const { apiKey } = this.session.credentials;
      if (!apiKey) {
        throw new ValidationError(
          'No google_api_key found. Add it to fetch reviews with the Places API.',
        );
      }

      const source = this.deps.createPlacesSource(apiKey);
      const fetched = await source.fetchReviews({ placeId });

      this.session.mode = source.mode;
      this.session.place = {
        name: fetched.placeName,
        rating: fetched.placeRating,
      };
      this.applyFetched(fetched.reviews);
      log.info(
        `Fetched ${fetched.reviews.length} reviews (Places API returns only recent reviews).`,
      );
    });
  }

  connect(): Promise<SessionSnapshot> {
    return this.exclusive('connect', async () => {
      const { serviceAccount } = this.session.credentials;
      if (!serviceAccount) {
        throw new ValidationError(
          'No Business Profile service account found. It is required to post replies.',
        );
      }

      let service: BusinessProfileApi;
      try {
        service = this.deps.connect(serviceAccount);
      } catch (err) {
        if (err instanceof AppError) throw err;
        throw new ConnectionError(`Error connecting: ${errorMessage(err)}`);
      }
      const accounts = await discoverLocations(service);

      const [firstAccount] = Object.keys(accounts);
      this.session.service = service;
      this.session.accounts = accounts;
      this.session.mode = 'businessProfile';
      this.session.selectedAccount = firstAccount;
      this.session.selectedLocation = firstAccount
        ? accounts[firstAccount][0]?.name
        : undefined;
      log.info(`Connected. Found ${Object.keys(accounts).length} account(s).`);
    });
  }

  selectLocation(account: string, location?: string): SessionSnapshot {
    this.ensureNotBusy('select location');
    const locations = this.session.accounts[account];
    if (!locations) {
      throw new ValidationError(`Unknown account: ${account}`);
    }
    const chosen = location ?? locations[0]?.name;
    if (chosen !== undefined && !locations.some((l) => l.name === chosen)) {
      throw new ValidationError(`Unknown location for ${account}: ${chosen}`);
    }

    this.session.selectedAccount = account;
    this.session.selectedLocation = chosen;
    return this.snapshot();
  }

  fetchLocationReviews(): Promise<SessionSnapshot> {
    return this.exclusive('fetch location reviews', async () => {
      const { service, selectedLocation } = this.session;
      if (!service) {
        throw new ValidationError('Connect to the Business Profile API first.');
      }
      if (!selectedLocation) {
        throw new ValidationError('Select a location first.');
      }

      const source = new BusinessProfileSource(service);
      const fetched = await source.fetchReviews({
        locationName: selectedLocation,
      });

      this.session.mode = source.mode;
      this.session.place = undefined;
      this.applyFetched(fetched.reviews);
      log.info(`Fetched ${fetched.reviews.length} reviews.`);
    });
  }

  /** Re-drafts every reply the user has not edited by hand. */
  setExtraText(extraText: string): SessionSnapshot {
    this.ensureNotBusy('set extra text');
    this.session.extraText = extraText;
    this.session.drafts = this.session.drafts.map((draft) =>
      draft.edited
        ? draft
        : {
            ...draft,
            replyText: draftReply(draft.review, extraText, this.deps.signature),
          },
    );
    this.markReviewing();
    return this.snapshot();
  }

  updateDraft(index: number, patch: DraftPatch): SessionSnapshot {
    this.ensureNotBusy('edit reply');
    const draft = this.session.drafts[index];
    if (!draft) {
      throw new ValidationError(`No drafted reply at index ${index}.`);
    }

    const replyText = patch.replyText ?? draft.replyText;
    this.session.drafts[index] = {
      ...draft,
      replyText,
      post: patch.post ?? draft.post,
      edited: draft.edited || replyText !== draft.replyText,
    };
    this.markReviewing();
    return this.snapshot();
  }

  postSelected(): Promise<SessionSnapshot> {
    return this.exclusive('post replies', async () => {
      const { service } = this.session;
      if (!service) {
        throw new ValidationError(
          'No Business Profile service available. Please connect using the Business Profile flow.',
        );
      }

      const items = this.session.drafts
        .filter((draft) => draft.post)
        .map((draft) => ({ review: draft.review, replyText: draft.replyText }));

      const previousState = this.session.state;
      this.session.state = 'posting';
      try {
        this.session.results = await submitReplies(
          service,
          items,
          this.session.accounts,
        );
      } catch (err) {
        this.session.state = previousState;
        throw err;
      }
      this.session.state = 'done';

      const posted = this.session.results.filter(
        (r) => r.status === 'posted',
      ).length;
      log.info(`Posted ${posted} of ${items.length} selected replies.`);
    });
  }

  private applyFetched(reviews: Review[]): void {
    this.session.reviews = reviews;
    this.session.drafts = draftReplies(
      reviews,
      this.session.extraText,
      this.deps.signature,
    );
    this.session.results = [];
    this.session.state = 'fetched';
  }

  private markReviewing(): void {
    if (this.session.drafts.length > 0) {
      this.session.state = 'reviewing';
    }
  }

  private ensureNotBusy(action: string): void {
    if (this.session.busy) {
      throw new ActionInProgressError(action);
    }
  }

  private async exclusive(
    action: string,
    run: () => Promise<void>,
  ): Promise<SessionSnapshot> {
    this.ensureNotBusy(action);
    this.session.busy = true;
    try {
      await run();
    } finally {
      this.session.busy = false;
    }
    return this.snapshot();
  }
}
