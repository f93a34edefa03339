import { fullnameOf } from '../clients/reddit.js';
import { epochToIso } from '../utils/time.js';
import type { CommentOutcome, MutationResult, RedditComment } from '../types/index.js';
import type { CsvRow } from './writer.js';

export function outcomeToRow(comment: RedditComment, outcome: CommentOutcome): CsvRow {
  return {
    comment_id: comment.id,
    fullname: fullnameOf(comment),
    created_iso: epochToIso(comment.source.createdUtc),
    subreddit: comment.subreddit,
    score: comment.source.score,
    outcome: outcome.status === 'skipped' ? outcome.disposition.action : outcome.status,
    reason: outcome.status === 'skipped' ? outcome.disposition.reason : '',
    edit: outcome.status === 'removed' ? resultLabel(outcome.edit) : '',
    delete: outcome.status === 'removed' ? resultLabel(outcome.delete) : '',
    comment_link: `https://reddit.com${comment.permalink}`,
  } satisfies CsvRow;
}

function resultLabel(result: MutationResult): string {
  return result.ok ? 'ok' : `${result.kind}: ${result.message}`;
}
