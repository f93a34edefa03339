import { epochToDate } from '../utils/time.js';
import type { Disposition, RedditComment, RetentionPolicy, SkipDisposition } from '../types/index.js';

/**
 * Decides whether a comment is eligible for removal. Checks run in a fixed
 * order and the first match wins, so each skipped comment reports one reason.
 */
export function decide(comment: RedditComment, policy: RetentionPolicy): Disposition {
  if (policy.preservedIds.has(comment.id)) {
    return { action: 'skip-by-id', reason: `comment ${comment.id} is in the preserved id list` };
  }

  if (policy.preservedSubreddits.has(comment.subreddit)) {
    return { action: 'skip-by-subreddit', reason: `r/${comment.subreddit} is in the preserved subreddit list` };
  }

  const createdAt = epochToDate(comment.source.createdUtc);
  if (createdAt.getTime() > policy.cutoff.getTime()) {
    return {
      action: 'skip-by-date',
      reason: `created ${createdAt.toISOString()}, after the cutoff ${policy.cutoff.toISOString()}`,
    };
  }

  if (comment.source.score > policy.maxScore) {
    return { action: 'skip-by-score', reason: `score ${comment.source.score} is above the maximum ${policy.maxScore}` };
  }

  return { action: 'keep' };
}

export function isSkip(disposition: Disposition): disposition is SkipDisposition {
  return disposition.action !== 'keep';
}
