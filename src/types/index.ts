export interface CommentSource {
  score: number;
  createdUtc: number;
  canGild: boolean;
}

export interface RedditComment {
  id: string;
  body: string;
  permalink: string;
  subreddit: string;
  source: CommentSource;
}

export interface Credentials {
  username: string;
  password: string;
  clientId: string;
  clientSecret: string;
  userAgent: string;
}

export interface RetentionPolicy {
  readonly preservedIds: ReadonlySet<string>;
  readonly preservedSubreddits: ReadonlySet<string>;
  /** Only comments created at or before this instant may be removed. */
  readonly cutoff: Date;
  readonly maxScore: number;
  readonly replacementText: string;
  readonly dryRun: boolean;
}

export type SkipAction = 'skip-by-id' | 'skip-by-subreddit' | 'skip-by-date' | 'skip-by-score';

export interface SkipDisposition {
  action: SkipAction;
  reason: string;
}

export type Disposition = { action: 'keep' } | SkipDisposition;

export type MutationFailureKind = 'transport' | 'http' | 'decode' | 'rejected';

export type MutationResult = { ok: true } | { ok: false; kind: MutationFailureKind; message: string };

export type CommentOutcome =
  | { status: 'skipped'; disposition: SkipDisposition }
  | { status: 'would-remove' }
  | { status: 'removed'; edit: MutationResult; delete: MutationResult };

export interface RunSummary {
  seen: number;
  skipped: Record<SkipAction, number>;
  wouldRemove: number;
  edited: number;
  editFailed: number;
  deleted: number;
  deleteFailed: number;
}
