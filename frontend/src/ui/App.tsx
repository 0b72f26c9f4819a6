import React, { useEffect, useRef, useState } from 'react';
import {
  api,
  type SessionSnapshot,
  type SourceMode,
  type SubmissionResult,
} from '../api';
import { ReviewCard } from './ReviewCard';

type LogLevel = 'info' | 'error';

type LogEntry = {
  id: number;
  level: LogLevel;
  message: string;
};

function describeResult(result: SubmissionResult): string {
  switch (result.status) {
    case 'posted':
      return `Posted reply to ${result.reviewId}`;
    case 'skipped':
      return `Skipped ${result.reviewId ?? 'review'}: ${result.reason}`;
    case 'failed':
      return `Failed ${result.reviewId}: ${result.error}`;
  }
}

export const App: React.FC = () => {
  const [session, setSession] = useState<SessionSnapshot | null>(null);
  const [placeId, setPlaceId] = useState('');
  const [extraText, setExtraText] = useState('');
  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [logs, setLogs] = useState<LogEntry[]>([]);
  const logCounter = useRef(0);
  const unsavedReplies = useRef(new Map<number, string>());
  const unsavedExtraText = useRef<string | undefined>(undefined);
  const saving = useRef<Promise<void>>(Promise.resolve());

  const pushLog = (message: string, level: LogLevel = 'info') => {
    logCounter.current += 1;
    const id = logCounter.current;
    setLogs((prev) => [...prev, { id, level, message }]);
  };

  const run = async (
    label: string,
    action: () => Promise<SessionSnapshot>,
    describe?: (next: SessionSnapshot) => string,
  ) => {
    setError(null);
    setLoading(true);
    pushLog(`${label}…`);
    try {
      const next = await action();
      setSession(next);
      if (describe) pushLog(describe(next));
    } catch (e) {
      const msg = e instanceof Error ? e.message : `Unexpected error: ${label}.`;
      setError(msg);
      pushLog(msg, 'error');
    } finally {
      setLoading(false);
    }
  };

  // Sends typed-but-unsaved text, after any save already in flight.
  const flushEdits = (): Promise<void> => {
    const flush = saving.current.then(async () => {
      const extra = unsavedExtraText.current;
      if (extra !== undefined) {
        unsavedExtraText.current = undefined;
        setSession(await api.setExtraText(extra));
        pushLog('Updated extra text.');
      }
      for (const [index, replyText] of [...unsavedReplies.current]) {
        unsavedReplies.current.delete(index);
        setSession(await api.updateDraft(index, { replyText }));
        pushLog(`Saved reply #${index + 1}.`);
      }
    });
    // The caller reports a failed flush; later flushes still run.
    saving.current = flush.catch(() => undefined);
    return flush;
  };

  const saveOnBlur = () => {
    flushEdits().catch((e: unknown) => {
      const msg = e instanceof Error ? e.message : 'Could not save your edit.';
      setError(msg);
      pushLog(msg, 'error');
    });
  };

  useEffect(() => {
    api
      .session()
      .then((snapshot) => {
        setSession(snapshot);
        setExtraText(snapshot.extraText);
      })
      .catch((e: unknown) => {
        setError(e instanceof Error ? e.message : 'Could not load session.');
      });
  }, []);

  if (!session) {
    return (
      <div className="app-root">
        <h1>Google Reviews Reply Assistant</h1>
        {error ? <div className="error-banner">{error}</div> : <p>Loading…</p>}
      </div>
    );
  }

  const handleModeChange = (mode: SourceMode) =>
    run('Switching fetch method', () => api.selectMode(mode));

  const handleFetchPlaces = () => {
    if (!placeId.trim()) {
      const msg = 'Validation failed: please enter a Google Place ID.';
      setError(msg);
      pushLog(msg, 'error');
      return;
    }
    return run(
      'Fetching reviews from Places API',
      () => api.fetchPlaceReviews(placeId.trim()),
      (next) =>
        `Fetched ${next.totalFetched} reviews (Places API returns only recent reviews).`,
    );
  };

  const handleConnect = () =>
    run('Connecting', () => api.connect(), () => 'Connected.');

  const handleAccountChange = (account: string) =>
    run('Selecting account', () => api.selectLocation(account));

  const handleLocationChange = (location: string) =>
    run('Selecting location', () =>
      api.selectLocation(session.selectedAccount ?? '', location),
    );

  const handleFetchLocation = () =>
    run(
      'Fetching reviews',
      () => api.fetchLocationReviews(),
      (next) => `Fetched ${next.totalFetched} reviews.`,
    );

  const handlePost = () =>
    run(
      'Posting selected replies',
      async () => {
        await flushEdits();
        return api.postReplies();
      },
      (next) =>
        `Finished posting: ${
          next.results.filter((r) => r.status === 'posted').length
        } of ${next.results.length} posted.`,
    );

  const accountNames = Object.keys(session.accounts);
  const locations = session.selectedAccount
    ? session.accounts[session.selectedAccount] ?? []
    : [];
  const busy = loading || session.state === 'posting';

  return (
    <div className="app-root">
      <header className="app-header">
        <h1>Google Reviews Reply Assistant</h1>
        <p>
          Fetch Google reviews (Places API with an API key, or Business
          Profile API with a service account), then prepare and post
          replies. Posting needs Business Profile credentials with the{' '}
          <code>business.manage</code> scope.
        </p>
        <p>
          Places API key present: <strong>{String(session.hasApiKey)}</strong>
          {' · '}
          Business Profile Service Account present:{' '}
          <strong>{String(session.hasServiceAccount)}</strong>
        </p>
        {session.warnings.map((warning) => (
          <div key={warning} className="warning-banner">
            {warning}
          </div>
        ))}
      </header>

      <section className="card">
        <h2>Fetch method</h2>
        <div className="mode-options">
          <label className="mode-option">
            <input
              type="radio"
              name="mode"
              value="placesApi"
              checked={session.mode === 'placesApi'}
              disabled={busy}
              onChange={() => handleModeChange('placesApi')}
            />
            Places API (API key, limited, read-only)
          </label>
          <label className="mode-option">
            <input
              type="radio"
              name="mode"
              value="businessProfile"
              checked={session.mode === 'businessProfile'}
              disabled={busy}
              onChange={() => handleModeChange('businessProfile')}
            />
            Business Profile API (full, requires service account)
          </label>
        </div>

        {session.mode === 'placesApi' &&
          (session.hasApiKey ? (
            <>
              <label className="field-label" htmlFor="place-id-input">
                Google Place ID (place_id)
              </label>
              <input
                id="place-id-input"
                className="text-input"
                value={placeId}
                onChange={(e) => setPlaceId(e.target.value)}
              />
              <button
                className="primary-btn"
                onClick={handleFetchPlaces}
                disabled={busy}
              >
                Fetch reviews (Places API)
              </button>
            </>
          ) : (
            <div className="warning-banner">
              No google_api_key configured. Add it to fetch reviews with the
              Places API.
            </div>
          ))}

        {session.mode === 'businessProfile' &&
          (session.hasServiceAccount ? (
            <>
              <button
                className="primary-btn"
                onClick={handleConnect}
                disabled={busy}
              >
                Connect &amp; list accounts/locations
              </button>

              {accountNames.length > 0 && (
                <>
                  <label className="field-label" htmlFor="account-select">
                    Select account
                  </label>
                  <select
                    id="account-select"
                    className="select-input"
                    value={session.selectedAccount ?? ''}
                    disabled={busy}
                    onChange={(e) => handleAccountChange(e.target.value)}
                  >
                    {accountNames.map((name) => (
                      <option key={name} value={name}>
                        {name}
                      </option>
                    ))}
                  </select>

                  <label className="field-label" htmlFor="location-select">
                    Select location
                  </label>
                  <select
                    id="location-select"
                    className="select-input"
                    value={session.selectedLocation ?? ''}
                    disabled={busy}
                    onChange={(e) => handleLocationChange(e.target.value)}
                  >
                    {locations.map((loc) => (
                      <option key={loc.name} value={loc.name}>
                        {loc.storeCode ? `${loc.name} (${loc.storeCode})` : loc.name}
                      </option>
                    ))}
                  </select>

                  <button
                    className="primary-btn"
                    onClick={handleFetchLocation}
                    disabled={busy || !session.selectedLocation}
                  >
                    Fetch reviews for selected location
                  </button>
                </>
              )}
            </>
          ) : (
            <div className="warning-banner">
              No Business Profile service account configured. It is required
              to post replies.
            </div>
          ))}

        {error && <div className="error-banner">{error}</div>}

        {logs.length > 0 && (
          <div className="log-panel" aria-live="polite">
            <h3 className="log-panel-title">Activity log</h3>
            <ul className="log-list">
              {logs.map((log) => (
                <li
                  key={log.id}
                  className={`log-entry log-entry-${log.level}`}
                >
                  {log.message}
                </li>
              ))}
            </ul>
          </div>
        )}
      </section>

      {session.totalFetched > 0 && (
        <section className="card">
          <h2>Unanswered reviews &amp; replies</h2>
          {session.place?.name && (
            <p>
              {session.place.name}
              {session.place.rating !== undefined &&
                ` (${session.place.rating} average)`}
            </p>
          )}
          <p data-testid="review-counts">
            Total fetched: {session.totalFetched} — Unanswered:{' '}
            {session.unanswered}
          </p>

          <label className="field-label" htmlFor="extra-text">
            Optional extra text to append to every reply
          </label>
          <textarea
            id="extra-text"
            className="text-area"
            rows={3}
            value={extraText}
            disabled={busy}
            onChange={(e) => {
              setExtraText(e.target.value);
              unsavedExtraText.current = e.target.value;
            }}
            onBlur={saveOnBlur}
          />

          {session.drafts.map((draft) => (
            <ReviewCard
              key={`${draft.index}-${draft.reviewId}`}
              draft={draft}
              disabled={busy}
              onReplyInput={(index, replyText) => {
                unsavedReplies.current.set(index, replyText);
              }}
              onReplyBlur={saveOnBlur}
              onPostToggle={(index, post) =>
                run(`Updating review #${index + 1}`, () =>
                  api.updateDraft(index, { post }),
                )
              }
            />
          ))}

          <p data-testid="selected-count">
            Selected to post: {session.selectedToPost}
          </p>
          <button
            className="primary-btn"
            onClick={handlePost}
            disabled={busy || session.selectedToPost === 0}
          >
            Post selected replies now
          </button>
        </section>
      )}

      {session.results.length > 0 && (
        <section className="card">
          <h2>Results</h2>
          <ul className="result-list">
            {session.results.map((result, idx) => (
              <li key={idx} className={`result-${result.status}`}>
                {describeResult(result)}
              </li>
            ))}
          </ul>
        </section>
      )}

      <footer className="app-footer card">
        <h2>Notes</h2>
        <ul className="list">
          <li>
            An API key (Places) can only fetch a limited set of recent reviews
            and cannot post replies.
          </li>
          <li>
            To post replies you must use Business Profile API credentials with
            the business.manage scope.
          </li>
          <li>
            Do not commit service account JSON to your repo. Keep it in
            environment variables or a secrets file outside version control.
          </li>
        </ul>
      </footer>
    </div>
  );
};
