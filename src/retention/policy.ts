import type { RetentionPolicy } from '../types/index.js';

export interface PolicyInput {
  cutoff: Date;
  preservedIds?: Iterable<string> | undefined;
  preservedSubreddits?: Iterable<string> | undefined;
  maxScore?: number | undefined;
  replacementText?: string | undefined;
  dryRun?: boolean | undefined;
}

export function createPolicy(input: PolicyInput): RetentionPolicy {
  return Object.freeze({
    preservedIds: new Set(input.preservedIds ?? []),
    preservedSubreddits: new Set(input.preservedSubreddits ?? []),
    cutoff: new Date(input.cutoff),
    maxScore: input.maxScore ?? 0,
    replacementText: input.replacementText ?? '',
    dryRun: input.dryRun ?? false,
  });
}

export function describePolicy(policy: RetentionPolicy): string {
  const parts = [
    `cutoff ${policy.cutoff.toISOString()}`,
    `max score ${policy.maxScore}`,
    `${policy.preservedIds.size} preserved id(s)`,
    `${policy.preservedSubreddits.size} preserved subreddit(s)`,
  ];
  if (policy.dryRun) {
    parts.push('dry run');
  }
  return parts.join(', ');
}
