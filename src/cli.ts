import path from 'node:path';
import { Command } from 'commander';
import { RedditClient } from './clients/reddit.js';
import { loadSettings, requireCredentials, requireListingIdentity, type RawSettingsOptions, type Settings } from './config/settings.js';
import { outcomeToRow } from './csv/report.js';
import { CsvStreamWriter } from './csv/writer.js';
import { describeError, PurgeError } from './errors.js';
import { createPolicy, describePolicy } from './retention/policy.js';
import { createLogger, type Logger } from './utils/log.js';
import { RemediationWorkflow } from './workflow/remediation.js';
import type { RetentionPolicy } from './types/index.js';

/**
 * What the commands take from the outside world. Left empty, they read
 * `process.env`, call the global `fetch` and cancel on SIGINT.
 */
export interface CliDependencies {
  env?: Record<string, string | undefined>;
  fetch?: typeof fetch;
  signal?: AbortSignal;
}

export function buildProgram(deps: CliDependencies = {}): Command {
  const program = new Command();
  program
    .name('reddit-comment-purge')
    .description('Overwrite and delete old Reddit comments, keeping the ones your retention rules protect.');

  configureCommonOptions(
    program
      .command('purge')
      .description('Edit then delete every comment the retention rules do not protect.'),
  )
    .option('--replacement <text>', 'Text written over each comment before it is deleted (default empty).')
    .option('--dry-run', 'Report what would be removed without editing or deleting anything.')
    .option('--pacing <ms>', 'Delay after each removed comment in ms (default 15000).')
    .action(async (rawOptions: RawSettingsOptions) => {
      await handlePurge(rawOptions, deps);
    });

  configureCommonOptions(
    program
      .command('list')
      .description('Stream comments and show what the retention rules decide, without signing in.'),
  ).action(async (rawOptions: RawSettingsOptions) => {
    await handleList(rawOptions, deps);
  });

  return program;
}

/** Parses `argv` (without the node and script entries) and runs the chosen command. */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<void> {
  await buildProgram(deps)
    .parseAsync(argv, { from: 'user' })
    .catch(handleFatal);
}

function configureCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'JSON config file with credentials and policy.')
    .option('--years-back <number>', 'Only comments older than this many years are removed (default 0).')
    .option('--max-score <number>', 'Comments scored above this are kept (default 0).')
    .option('--skip-ids <ids>', 'Comma-separated comment ids to keep.')
    .option('--skip-subreddits <names>', 'Comma-separated subreddit names whose comments are kept.')
    .option('--page-spacing <ms>', 'Minimum gap between listing page requests in ms (default 6000).')
    .option('--report <path>', 'Write a CSV row for every processed comment.');
}

export async function handlePurge(rawOptions: RawSettingsOptions, deps: CliDependencies = {}) {
  const settings = await loadSettings(rawOptions, deps.env);
  const credentials = requireCredentials(settings.credentials);
  const logger = createLogger('purge', credentials.username);
  const signal = deps.signal ?? cancelOnInterrupt(logger);
  const client = createClient(credentials.userAgent, settings, deps);

  logger(`Policy: ${describePolicy(settings.policy)}`);
  const token = await client.authenticate(credentials, signal);
  logger('Authenticated.');

  await runWorkflow(settings, settings.policy, client, token, credentials.username, signal, logger);
}

export async function handleList(rawOptions: RawSettingsOptions, deps: CliDependencies = {}) {
  const settings = await loadSettings(rawOptions, deps.env);
  const identity = requireListingIdentity(settings.credentials);
  const logger = createLogger('list', identity.username);
  const signal = deps.signal ?? cancelOnInterrupt(logger);
  const client = createClient(identity.userAgent, settings, deps);
  const policy = createPolicy({ ...settings.policy, dryRun: true });

  logger(`Policy: ${describePolicy(policy)}`);
  await runWorkflow(settings, policy, client, '', identity.username, signal, logger);
}

export function handleFatal(error: unknown) {
  const prefix = error instanceof PurgeError ? `${error.kind} error` : 'Error';
  console.error(`${prefix}: ${describeError(error)}`);
  process.exitCode = 1;
}

function createClient(userAgent: string, settings: Settings, deps: CliDependencies): RedditClient {
  return new RedditClient({
    userAgent,
    pageSpacingMs: settings.pageSpacingMs,
    logger: createLogger('reddit'),
    ...(deps.fetch ? { fetch: deps.fetch } : {}),
  });
}

async function runWorkflow(
  settings: Settings,
  policy: RetentionPolicy,
  client: RedditClient,
  token: string,
  username: string,
  signal: AbortSignal,
  logger: Logger,
) {
  const writer = settings.reportPath ? await CsvStreamWriter.create(path.resolve(settings.reportPath)) : undefined;
  const workflow = new RemediationWorkflow({
    client,
    token,
    policy,
    pacingMs: settings.pacingMs,
    signal,
    logger,
    onOutcome: writer ? (comment, outcome) => writer.writeRow(outcomeToRow(comment, outcome)) : undefined,
  });

  try {
    await workflow.run(client.streamComments(username, { signal }));
  } finally {
    await writer?.close();
  }

  if (writer) {
    logger(`Wrote report to ${writer.path}`);
  }
}

function cancelOnInterrupt(logger: Logger): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger('Interrupted; stopping after the current step. Press Ctrl-C again to exit immediately.');
    controller.abort();
  });
  return controller.signal;
}
