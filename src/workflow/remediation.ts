import { fullnameOf, type RedditClient } from '../clients/reddit.js';
import { decide, isSkip } from '../retention/filter.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { preview } from '../utils/text.js';
import { epochToIso } from '../utils/time.js';
import type { Logger } from '../utils/log.js';
import type { CommentOutcome, MutationResult, RedditComment, RetentionPolicy, RunSummary } from '../types/index.js';

export const DEFAULT_PACING_MS = 15_000;

export type CommentMutator = Pick<RedditClient, 'editComment' | 'deleteComment'>;

export interface RemediationWorkflowOptions {
  client: CommentMutator;
  token: string;
  policy: RetentionPolicy;
  pacingMs?: number | undefined;
  signal?: AbortSignal | undefined;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onOutcome?: ((comment: RedditComment, outcome: CommentOutcome) => Promise<void> | void) | undefined;
  logger?: Logger | undefined;
}

export function emptySummary(): RunSummary {
  return {
    seen: 0,
    skipped: { 'skip-by-id': 0, 'skip-by-subreddit': 0, 'skip-by-date': 0, 'skip-by-score': 0 },
    wouldRemove: 0,
    edited: 0,
    editFailed: 0,
    deleted: 0,
    deleteFailed: 0,
  };
}

export function tally(summary: RunSummary, outcome: CommentOutcome): void {
  summary.seen += 1;
  switch (outcome.status) {
    case 'skipped':
      summary.skipped[outcome.disposition.action] += 1;
      break;
    case 'would-remove':
      summary.wouldRemove += 1;
      break;
    case 'removed':
      if (outcome.edit.ok) {
        summary.edited += 1;
      } else {
        summary.editFailed += 1;
      }
      if (outcome.delete.ok) {
        summary.deleted += 1;
      } else {
        summary.deleteFailed += 1;
      }
      break;
  }
}

export function formatSummary(summary: RunSummary): string {
  const skipped = Object.values(summary.skipped).reduce((total, count) => total + count, 0);
  const reasons = Object.entries(summary.skipped)
    .filter(([, count]) => count > 0)
    .map(([action, count]) => `${action}=${count}`)
    .join(', ');
  return [
    `seen ${summary.seen}`,
    `skipped ${skipped}${reasons ? ` (${reasons})` : ''}`,
    `would remove ${summary.wouldRemove}`,
    `edited ${summary.edited}`,
    `edit failures ${summary.editFailed}`,
    `deleted ${summary.deleted}`,
    `delete failures ${summary.deleteFailed}`,
  ].join(', ');
}

/**
 * Edits then deletes every comment the retention policy lets go, one at a
 * time and in stream order, pausing between comments that touched the API.
 */
export class RemediationWorkflow {
  private readonly client: CommentMutator;
  private readonly token: string;
  private readonly policy: RetentionPolicy;
  private readonly pacingMs: number;
  private readonly signal: AbortSignal | undefined;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly onOutcome: RemediationWorkflowOptions['onOutcome'];
  private readonly logger: Logger | undefined;

  constructor(options: RemediationWorkflowOptions) {
    this.client = options.client;
    this.token = options.token;
    this.policy = options.policy;
    this.pacingMs = options.pacingMs ?? DEFAULT_PACING_MS;
    this.signal = options.signal;
    this.sleep = options.sleep ?? defaultSleep;
    this.onOutcome = options.onOutcome;
    this.logger = options.logger;
  }

  async run(comments: AsyncIterable<RedditComment>): Promise<RunSummary> {
    const summary = emptySummary();

    for await (const comment of comments) {
      if (this.signal?.aborted) {
        this.logger?.('Cancelled; stopping before the next comment.');
        break;
      }

      const outcome = await this.process(comment);
      tally(summary, outcome);
      await this.onOutcome?.(comment, outcome);
    }

    this.logger?.(`Done: ${formatSummary(summary)}`);
    return summary;
  }

  async process(comment: RedditComment): Promise<CommentOutcome> {
    const fullname = fullnameOf(comment);
    const label = `${fullname} (r/${comment.subreddit}, score ${comment.source.score}, ${epochToIso(comment.source.createdUtc)})`;

    const disposition = decide(comment, this.policy);
    if (isSkip(disposition)) {
      this.logger?.(`${label}: skipping, ${disposition.reason}`);
      return { status: 'skipped', disposition };
    }

    if (this.policy.dryRun) {
      this.logger?.(`${label}: would remove "${preview(comment.body)}"`);
      return { status: 'would-remove' };
    }

    this.logger?.(`${label}: editing...`);
    const edit = await this.client.editComment(this.token, fullname, this.policy.replacementText);
    this.logger?.(`${label}: ${describeResult('edit', edit)}`);

    this.logger?.(`${label}: deleting...`);
    const deletion = await this.client.deleteComment(this.token, fullname);
    this.logger?.(`${label}: ${describeResult('delete', deletion)}`);

    if (this.pacingMs > 0 && !this.signal?.aborted) {
      this.logger?.(`Sleeping ${Math.round(this.pacingMs / 1000)}s`);
      await this.sleep(this.pacingMs, this.signal);
    }

    return { status: 'removed', edit, delete: deletion };
  }
}

function describeResult(operation: string, result: MutationResult): string {
  return result.ok ? `${operation} succeeded` : `${operation} failed (${result.kind}): ${result.message}`;
}
