import { describe, it, expect } from 'vitest';
import { decide, isSkip } from '../src/retention/filter.js';
import { createPolicy, type PolicyInput } from '../src/retention/policy.js';
import { makeComment, NOW, yearsAgo } from './helpers.js';

const cutoff = new Date('2016-06-15T12:00:00Z');

function policy(overrides: Partial<PolicyInput> = {}) {
  return createPolicy({ cutoff, maxScore: 5, ...overrides });
}

describe('decide', () => {
  it('keeps an old, low-scored comment outside the preserved lists', () => {
    expect(decide(makeComment({ score: 1 }), policy())).toEqual({ action: 'keep' });
  });

  it('gives the preserved id list precedence over every other rule', () => {
    const comment = makeComment({ id: 'pinned', subreddit: 'mod_only', score: 99, createdUtc: yearsAgo(1) });

    const result = decide(comment, policy({ preservedIds: ['pinned'], preservedSubreddits: ['mod_only'] }));

    expect(result).toEqual({ action: 'skip-by-id', reason: 'comment pinned is in the preserved id list' });
  });

  it('checks the subreddit before the date and the score', () => {
    const comment = makeComment({ subreddit: 'mod_only', score: 99, createdUtc: yearsAgo(1) });

    expect(decide(comment, policy({ preservedSubreddits: ['mod_only'] })).action).toBe('skip-by-subreddit');
  });

  it('compares subreddit names exactly', () => {
    const comment = makeComment({ subreddit: 'Mod_Only' });

    expect(decide(comment, policy({ preservedSubreddits: ['mod_only'] })).action).toBe('keep');
  });

  it('skips comments newer than the cutoff even when everything else passes', () => {
    const comment = makeComment({ score: -10, createdUtc: cutoff.getTime() / 1000 + 1 });

    expect(decide(comment, policy())).toEqual({
      action: 'skip-by-date',
      reason: 'created 2016-06-15T12:00:01.000Z, after the cutoff 2016-06-15T12:00:00.000Z',
    });
  });

  it('treats a comment created exactly at the cutoff as eligible', () => {
    const comment = makeComment({ createdUtc: cutoff.getTime() / 1000 });

    expect(decide(comment, policy()).action).toBe('keep');
  });

  it('drops the fractional part of the creation time', () => {
    const comment = makeComment({ createdUtc: cutoff.getTime() / 1000 + 0.9 });

    expect(decide(comment, policy()).action).toBe('keep');
  });

  it('skips comments scored above the maximum', () => {
    expect(decide(makeComment({ score: 6 }), policy())).toEqual({
      action: 'skip-by-score',
      reason: 'score 6 is above the maximum 5',
    });
    expect(decide(makeComment({ score: 5 }), policy()).action).toBe('keep');
  });

  it('returns the same disposition however often and in whatever order it is asked', () => {
    const rules = policy({ preservedSubreddits: ['mod_only'] });
    const comments = [
      makeComment({ id: 'a', score: 9 }),
      makeComment({ id: 'b', subreddit: 'mod_only' }),
      makeComment({ id: 'c', createdUtc: yearsAgo(1) }),
      makeComment({ id: 'd' }),
    ];

    const forward = comments.map((comment) => decide(comment, rules));
    const backward = [...comments].reverse().map((comment) => decide(comment, rules)).reverse();

    expect(backward).toEqual(forward);
    expect(forward.map((result) => result.action)).toEqual(['skip-by-score', 'skip-by-subreddit', 'skip-by-date', 'keep']);
  });
});

describe('isSkip', () => {
  it('is false only for keep', () => {
    expect(isSkip({ action: 'keep' })).toBe(false);
    expect(isSkip({ action: 'skip-by-score', reason: 'x' })).toBe(true);
  });
});

describe('createPolicy', () => {
  it('freezes the policy and applies defaults', () => {
    const created = createPolicy({ cutoff: NOW });

    expect(Object.isFrozen(created)).toBe(true);
    expect(created.maxScore).toBe(0);
    expect(created.replacementText).toBe('');
    expect(created.dryRun).toBe(false);
    expect(created.preservedIds.size).toBe(0);
  });

  it('copies the cutoff so later changes to the input do not leak in', () => {
    const input = new Date(NOW);
    const created = createPolicy({ cutoff: input });
    input.setUTCFullYear(2000);

    expect(created.cutoff.toISOString()).toBe('2026-06-15T12:00:00.000Z');
  });
});
