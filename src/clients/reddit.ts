import { AuthenticationError, StreamError, describeError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { truncate } from '../utils/text.js';
import type { Logger } from '../utils/log.js';
import type { Credentials, MutationResult, RedditComment } from '../types/index.js';
import { accessTokenNode, listingNode, type AccessTokenPayload, type ListingPayload } from './schemas.js';

export interface RedditClientOptions {
  userAgent: string;
  baseUrl?: string;
  oauthBaseUrl?: string;
  maxRetries?: number;
  retryBackoffMs?: number;
  /** Minimum gap between two listing page requests. */
  pageSpacingMs?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger | undefined;
}

export interface StreamOptions {
  signal?: AbortSignal | undefined;
}

interface RequestSpec {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: URLSearchParams;
}

const DEFAULT_BASE_URL = 'https://www.reddit.com';
const DEFAULT_OAUTH_BASE_URL = 'https://oauth.reddit.com';
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/** Unauthenticated listing calls are limited to about ten a minute. */
export const DEFAULT_PAGE_SPACING_MS = 6_000;

/** Type tag Reddit prefixes to comment ids to form a fullname. */
export const COMMENT_KIND = 't1';

export function fullnameOf(comment: Pick<RedditComment, 'id'>): string {
  return `${COMMENT_KIND}_${comment.id}`;
}

export class RedditClient {
  private readonly userAgent: string;
  private readonly baseUrl: string;
  private readonly oauthBaseUrl: string;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly pageSpacingMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger | undefined;

  constructor(options: RedditClientOptions) {
    this.userAgent = options.userAgent;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.oauthBaseUrl = (options.oauthBaseUrl ?? DEFAULT_OAUTH_BASE_URL).replace(/\/+$/, '');
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBackoffMs = options.retryBackoffMs ?? 5000;
    this.pageSpacingMs = options.pageSpacingMs ?? DEFAULT_PAGE_SPACING_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger;
  }

  /** Password grant against the token endpoint. Throws `AuthenticationError` on any failure. */
  async authenticate(credentials: Credentials, signal?: AbortSignal): Promise<string> {
    const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
    const body = new URLSearchParams({
      grant_type: 'password',
      username: credentials.username,
      password: credentials.password,
    });

    let response: Response;
    try {
      response = await this.send(
        `${this.baseUrl}/api/v1/access_token`,
        { method: 'POST', headers: { Authorization: `Basic ${basic}`, 'Content-Type': FORM_CONTENT_TYPE }, body },
        signal,
      );
    } catch (error) {
      throw new AuthenticationError(`Token request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new AuthenticationError(`Token request failed with status ${response.status}`);
    }

    let payload: AccessTokenPayload;
    try {
      payload = accessTokenNode.parse(await response.json(), 'token response');
    } catch (error) {
      throw new AuthenticationError(`Unable to decode token response: ${describeError(error)}`, { cause: error });
    }

    if (payload.error) {
      throw new AuthenticationError(payload.error_description || payload.error);
    }
    if (!payload.access_token) {
      throw new AuthenticationError('Token response did not include an access token.');
    }

    return payload.access_token;
  }

  /**
   * Lazily walks the user's comment listing, newest first. The next page is
   * only requested once every comment of the current page has been consumed.
   */
  async *streamComments(username: string, options: StreamOptions = {}): AsyncGenerator<RedditComment, void, undefined> {
    const { signal } = options;
    let cursor = '';
    let page = 0;
    let lastPageAt: number | undefined;

    while (!signal?.aborted) {
      if (lastPageAt !== undefined && this.pageSpacingMs > 0) {
        const waitMs = this.pageSpacingMs - (Date.now() - lastPageAt);
        if (waitMs > 0) {
          await this.sleep(waitMs, signal);
          if (signal?.aborted) {
            return;
          }
        }
      }

      const query = cursor ? `?${new URLSearchParams({ after: cursor }).toString()}` : '';
      const url = `${this.baseUrl}/user/${encodeURIComponent(username)}/comments.json${query}`;
      page += 1;
      this.logger?.(`Fetching page ${page}${cursor ? ` (after ${cursor})` : ''}`);

      let payload: ListingPayload;
      lastPageAt = Date.now();
      try {
        payload = await this.fetchListingPage(url, signal);
      } catch (error) {
        if (signal?.aborted) {
          return;
        }
        throw error;
      }

      const comments = payload.data.children.map((child) => toComment(child.data));
      for (const comment of comments) {
        yield comment;
      }

      const after = payload.data.after ?? '';
      if (comments.length === 0 || after === '') {
        this.logger?.(`Listing exhausted after ${page} page(s).`);
        return;
      }
      cursor = after;
    }
  }

  async editComment(token: string, fullname: string, text: string): Promise<MutationResult> {
    const body = new URLSearchParams({ thing_id: fullname, text });

    let response: Response;
    try {
      response = await this.send(
        `${this.oauthBaseUrl}/api/editusertext?raw_json=1`,
        { method: 'POST', headers: this.bearerHeaders(token), body },
        undefined,
      );
    } catch (error) {
      return { ok: false, kind: 'transport', message: describeError(error) };
    }

    if (!response.ok) {
      return { ok: false, kind: 'http', message: `status ${response.status}` };
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      return { ok: false, kind: 'decode', message: describeError(error) };
    }

    if (typeof payload === 'object' && payload !== null && 'jquery' in payload) {
      return { ok: true };
    }
    return { ok: false, kind: 'rejected', message: truncate(JSON.stringify(payload), 200) };
  }

  async deleteComment(token: string, fullname: string): Promise<MutationResult> {
    const body = new URLSearchParams({ id: fullname });

    let response: Response;
    try {
      response = await this.send(
        `${this.oauthBaseUrl}/api/del`,
        { method: 'POST', headers: this.bearerHeaders(token), body },
        undefined,
      );
    } catch (error) {
      return { ok: false, kind: 'transport', message: describeError(error) };
    }

    if (!response.ok) {
      return { ok: false, kind: 'http', message: `status ${response.status}` };
    }
    return { ok: true };
  }

  private async fetchListingPage(url: string, signal: AbortSignal | undefined): Promise<ListingPayload> {
    let response: Response;
    try {
      response = await this.send(url, { method: 'GET' }, signal);
    } catch (error) {
      throw new StreamError(`Failed to fetch comments: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new StreamError(`Comment listing request failed with status ${response.status}`);
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (error) {
      throw new StreamError(`Failed to decode comment listing: ${describeError(error)}`, { cause: error });
    }

    try {
      return listingNode.parse(raw, 'listing');
    } catch (error) {
      throw new StreamError(`Malformed comment listing: ${describeError(error)}`, { cause: error });
    }
  }

  private async send(url: string, spec: RequestSpec, signal: AbortSignal | undefined): Promise<Response> {
    for (let attempt = 0; ; attempt += 1) {
      const response = await this.fetchImpl(url, {
        method: spec.method,
        headers: { 'User-Agent': this.userAgent, ...spec.headers },
        ...(spec.body ? { body: spec.body } : {}),
        signal: signal ?? null,
      });

      if (response.status !== 429 || attempt >= this.maxRetries) {
        return response;
      }

      const header = response.headers.get('retry-after');
      const fromHeader = header === null ? Number.NaN : Number(header);
      const waitMs = Number.isFinite(fromHeader) ? fromHeader * 1000 : this.retryBackoffMs * 2 ** attempt;
      this.logger?.(`Hit Reddit rate limit (429). Waiting ${Math.round(waitMs / 1000)}s before retry #${attempt + 1}.`);
      await this.sleep(waitMs, signal);
      if (signal?.aborted) {
        return response;
      }
    }
  }

  private bearerHeaders(token: string): Record<string, string> {
    return {
      Authorization: `Bearer ${token}`,
      'Content-Type': FORM_CONTENT_TYPE,
    };
  }
}

function toComment(raw: ListingPayload['data']['children'][number]['data']): RedditComment {
  return {
    id: raw.id,
    body: raw.body,
    permalink: raw.permalink,
    subreddit: raw.subreddit,
    source: {
      score: raw.score,
      createdUtc: raw.created_utc,
      canGild: raw.can_gild ?? false,
    },
  } satisfies RedditComment;
}
