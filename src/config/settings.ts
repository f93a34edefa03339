import path from 'node:path';
import { promises as fs } from 'node:fs';
import { DEFAULT_PAGE_SPACING_MS } from '../clients/reddit.js';
import { ConfigurationError, describeError } from '../errors.js';
import { jot, type InferJot } from '../jot.js';
import { createPolicy } from '../retention/policy.js';
import { subtractYears } from '../utils/time.js';
import { DEFAULT_PACING_MS } from '../workflow/remediation.js';
import type { Credentials, RetentionPolicy } from '../types/index.js';

export interface RawSettingsOptions {
  config?: string;
  yearsBack?: string;
  maxScore?: string;
  replacement?: string;
  dryRun?: boolean;
  skipIds?: string;
  skipSubreddits?: string;
  pacing?: string;
  pageSpacing?: string;
  report?: string;
}

export interface Settings {
  credentials: Partial<Credentials>;
  policy: RetentionPolicy;
  pacingMs: number;
  pageSpacingMs: number;
  reportPath: string | undefined;
}

type Environment = Record<string, string | undefined>;

const CREDENTIAL_ENV: Record<keyof Credentials, string> = {
  username: 'REDDIT_USERNAME',
  password: 'REDDIT_PASSWORD',
  clientId: 'REDDIT_CLIENT_ID',
  clientSecret: 'REDDIT_CLIENT_SECRET',
  userAgent: 'REDDIT_USER_AGENT',
};

const CREDENTIAL_KEYS = ['username', 'password', 'clientId', 'clientSecret', 'userAgent'] as const satisfies ReadonlyArray<
  keyof Credentials
>;

const configFileNode = jot.object({
  credentials: jot.optional(
    jot.object({
      username: jot.optional(jot.string()),
      password: jot.optional(jot.string()),
      clientId: jot.optional(jot.string()),
      clientSecret: jot.optional(jot.string()),
      userAgent: jot.optional(jot.string()),
    }),
  ),
  policy: jot.optional(
    jot.object({
      skipCommentIds: jot.optional(jot.array(jot.string())),
      skipSubreddits: jot.optional(jot.array(jot.string())),
      maxScore: jot.optional(jot.number({ integer: true })),
      replacementText: jot.optional(jot.string()),
      yearsBack: jot.optional(jot.number({ integer: true, min: 0 })),
      dryRun: jot.optional(jot.boolean()),
    }),
  ),
  pacingMs: jot.optional(jot.number({ integer: true, min: 0 })),
  pageSpacingMs: jot.optional(jot.number({ integer: true, min: 0 })),
});

export type ConfigFile = InferJot<typeof configFileNode>;

/**
 * Merges the config file, the environment and command-line flags, later
 * sources winning. The cutoff is fixed against `now` once, here.
 */
export async function loadSettings(
  raw: RawSettingsOptions,
  env: Environment = process.env,
  now: Date = new Date(),
): Promise<Settings> {
  const file = raw.config ? await readConfigFile(path.resolve(raw.config)) : undefined;
  const filePolicy = file?.policy;

  const credentials: Partial<Credentials> = {};
  for (const key of CREDENTIAL_KEYS) {
    const value = present(env[CREDENTIAL_ENV[key]]) ?? present(file?.credentials?.[key]);
    if (value !== undefined) {
      credentials[key] = value;
    }
  }

  const yearsBack =
    parseNonNegativeInteger(raw.yearsBack, '--years-back') ??
    parseNonNegativeInteger(env.REDDIT_YEARS_BACK, 'REDDIT_YEARS_BACK') ??
    filePolicy?.yearsBack ??
    0;
  const dryRun = raw.dryRun ?? parseBoolean(env.REDDIT_DRY_RUN, 'REDDIT_DRY_RUN') ?? filePolicy?.dryRun ?? false;
  const skipIds = raw.skipIds !== undefined ? parseCommaList(raw.skipIds) : filePolicy?.skipCommentIds;
  const skipSubreddits =
    raw.skipSubreddits !== undefined ? parseCommaList(raw.skipSubreddits) : filePolicy?.skipSubreddits;

  const policy = createPolicy({
    cutoff: subtractYears(now, yearsBack),
    preservedIds: skipIds,
    preservedSubreddits: skipSubreddits,
    maxScore: parseInteger(raw.maxScore, '--max-score') ?? filePolicy?.maxScore,
    replacementText: raw.replacement ?? filePolicy?.replacementText,
    dryRun,
  });

  return {
    credentials,
    policy,
    pacingMs: parseNonNegativeInteger(raw.pacing, '--pacing') ?? file?.pacingMs ?? DEFAULT_PACING_MS,
    pageSpacingMs:
      parseNonNegativeInteger(raw.pageSpacing, '--page-spacing') ?? file?.pageSpacingMs ?? DEFAULT_PAGE_SPACING_MS,
    reportPath: nonEmpty(raw.report),
  };
}

export function requireCredentials(partial: Partial<Credentials>): Credentials {
  assertPresent(partial, CREDENTIAL_KEYS);
  return {
    username: partial.username ?? '',
    password: partial.password ?? '',
    clientId: partial.clientId ?? '',
    clientSecret: partial.clientSecret ?? '',
    userAgent: partial.userAgent ?? '',
  };
}

/** The listing endpoint is public; it needs only the account name and a user agent. */
export function requireListingIdentity(partial: Partial<Credentials>): Pick<Credentials, 'username' | 'userAgent'> {
  assertPresent(partial, ['username', 'userAgent']);
  return { username: partial.username ?? '', userAgent: partial.userAgent ?? '' };
}

function assertPresent(partial: Partial<Credentials>, keys: ReadonlyArray<keyof Credentials>): void {
  const missing = keys.filter((key) => !partial[key]);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing required setting(s): ${missing.map((key) => CREDENTIAL_ENV[key]).join(', ')}`,
    );
  }
}

async function readConfigFile(filePath: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ConfigurationError(`Config file not found at ${filePath}`);
    }
    throw new ConfigurationError(`Unable to read config file ${filePath}: ${describeError(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${describeError(error)}`, { cause: error });
  }

  try {
    return configFileNode.parse(parsed, 'config');
  } catch (error) {
    throw new ConfigurationError(`Invalid config file ${filePath}: ${describeError(error)}`, { cause: error });
  }
}

function present(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseInteger(value: string | undefined, name: string): number | undefined {
  const trimmed = nonEmpty(value);
  if (trimmed === undefined) {
    return undefined;
  }

  const parsed = Number(trimmed);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer.`);
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string | undefined, name: string): number | undefined {
  const parsed = parseInteger(value, name);
  if (parsed !== undefined && parsed < 0) {
    throw new ConfigurationError(`${name} must be zero or a positive integer.`);
  }
  return parsed;
}

export function parseBoolean(value: string | undefined, name: string): boolean | undefined {
  const normalized = nonEmpty(value)?.toLowerCase();
  if (normalized === undefined) {
    return undefined;
  }
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  throw new ConfigurationError(`${name} must be a boolean (true/false, yes/no, on/off, 1/0).`);
}

export function parseCommaList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const seen = new Set<string>();
  const parts: string[] = [];
  for (const rawPart of value.split(',')) {
    const trimmed = rawPart.trim();
    if (!trimmed || seen.has(trimmed)) {
      continue;
    }
    seen.add(trimmed);
    parts.push(trimmed);
  }
  return parts;
}
