import React, { useEffect, useState } from 'react';
import type { DraftView } from '../api';

type ReviewCardProps = {
  draft: DraftView;
  disabled: boolean;
  onReplyInput: (index: number, replyText: string) => void;
  onReplyBlur: () => void;
  onPostToggle: (index: number, post: boolean) => void;
};

export const ReviewCard: React.FC<ReviewCardProps> = ({
  draft,
  disabled,
  onReplyInput,
  onReplyBlur,
  onPostToggle,
}) => {
  const [replyText, setReplyText] = useState(draft.replyText);
  const number = draft.index + 1;

  // The server re-drafts untouched replies when the extra text changes.
  useEffect(() => {
    setReplyText(draft.replyText);
  }, [draft.replyText]);

  return (
    <div className="review-card" data-testid={`review-${number}`}>
      <p>
        <strong>
          Review #{number} — {draft.authorName} (
          {draft.rating ?? '?'} stars)
        </strong>
      </p>
      <p>{draft.text}</p>

      <label className="field-label" htmlFor={`reply-${number}`}>
        Reply text (editable) — review #{number}
      </label>
      <textarea
        id={`reply-${number}`}
        className="text-area"
        rows={6}
        value={replyText}
        disabled={disabled}
        onChange={(e) => {
          setReplyText(e.target.value);
          onReplyInput(draft.index, e.target.value);
        }}
        onBlur={onReplyBlur}
      />

      <label className="mode-option">
        <input
          type="checkbox"
          checked={draft.post}
          disabled={disabled}
          onChange={(e) => onPostToggle(draft.index, e.target.checked)}
        />
        Post reply for this review
      </label>
    </div>
  );
};
