import { vi } from 'vitest';
import type { RedditComment } from '../src/types/index.js';

export const NOW = new Date('2026-06-15T12:00:00Z');

export function yearsAgo(years: number, from: Date = NOW): number {
  const date = new Date(from);
  date.setUTCFullYear(date.getUTCFullYear() - years);
  return date.getTime() / 1000;
}

export function makeComment(overrides: Partial<RedditComment> & { score?: number; createdUtc?: number } = {}): RedditComment {
  const { score, createdUtc, ...rest } = overrides;
  return {
    id: 'abc123',
    body: 'old comment text',
    permalink: '/r/x/comments/post/_/abc123/',
    subreddit: 'x',
    source: {
      score: score ?? 1,
      createdUtc: createdUtc ?? yearsAgo(11),
      canGild: true,
    },
    ...rest,
  };
}

export function rawChild(comment: RedditComment) {
  return {
    kind: 't1',
    data: {
      id: comment.id,
      body: comment.body,
      permalink: comment.permalink,
      subreddit: comment.subreddit,
      score: comment.source.score,
      created_utc: comment.source.createdUtc,
      can_gild: comment.source.canGild,
      author: 'test-user',
    },
  };
}

export function listingPage(comments: RedditComment[], after: string | null) {
  return {
    kind: 'Listing',
    data: { children: comments.map(rawChild), after, before: null, dist: comments.length },
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function mockFetch(...responses: Array<Response | Error>) {
  const fn = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();
  for (const response of responses) {
    if (response instanceof Error) {
      fn.mockRejectedValueOnce(response);
    } else {
      fn.mockResolvedValueOnce(response);
    }
  }
  return fn;
}

export function requestUrl(fn: ReturnType<typeof mockFetch>, call: number): string {
  return String(fn.mock.calls[call]?.[0]);
}

export function requestForm(fn: ReturnType<typeof mockFetch>, call: number): Record<string, string> {
  const body = fn.mock.calls[call]?.[1]?.body;
  return Object.fromEntries(new URLSearchParams(body instanceof URLSearchParams ? body : undefined));
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
