import { Command, InvalidArgumentError, Option } from 'commander';
import { runCheck } from '../../checker.js';
import {
  EnvSecretSource,
  FileSecretStore,
  SecretSource,
  resolveCredentials,
  resolveSecret,
} from '../../credentials/store.js';
import { AuthenticationError, describeError } from '../../errors.js';
import { renderMessage, shouldNotify } from '../../notify/message.js';
import { Notifier, createNotifier } from '../../notify/notifier.js';
import { Sleep, pollEvery } from '../../scheduler/poll.js';
import { config } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';

export interface CheckCommandOptions {
  dueWithin: number;
  watch?: number;
  checkSubmissions?: boolean;
  dryRun?: boolean;
  quiet?: boolean;
}

export interface CheckCommandDeps {
  sources: SecretSource[];
  check?: typeof runCheck;
  /** Built from config and the resolved token when omitted. */
  notifier?: Notifier;
  signal?: AbortSignal;
  sleep?: Sleep;
  print?: (line: string) => void;
  clock?: () => Date;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

export function exitCodeFor(error: unknown): number {
  return error instanceof AuthenticationError ? 2 : 1;
}

/** Runs one check, or keeps checking with `watch`. Returns the number of checks run. */
export async function runCheckCommand(options: CheckCommandOptions, deps: CheckCommandDeps): Promise<number> {
  const { sources, check = runCheck, print = console.log, clock = () => new Date() } = deps;

  const credentials = await resolveCredentials(sources);
  const notifier =
    deps.notifier ??
    createNotifier(config.notify, {
      dryRun: options.dryRun,
      token: await resolveSecret(sources, 'NOTIFY_TOKEN'),
    });
  const lookaheadMs = options.dueWithin * 60 * 60 * 1000;

  const checkOnce = async () => {
    const now = clock();
    const result = await check(credentials, {
      now,
      lookaheadMs,
      checkSubmissions: options.checkSubmissions,
    });

    if (shouldNotify(result)) {
      await notifier.send(renderMessage(result, now));
    } else if (!options.quiet) {
      print(`No deadlines within ${options.dueWithin}h.`);
    }
  };

  if (!options.watch) {
    await checkOnce();
    return 1;
  }

  print(`Checking every ${options.watch} min (Ctrl+C to stop)...`);
  const runs = await pollEvery(checkOnce, {
    intervalMs: options.watch * 60 * 1000,
    signal: deps.signal,
    sleep: deps.sleep,
    shouldStop: (error) => error instanceof AuthenticationError,
  });
  print('Stopped.');
  return runs;
}

export const checkCommand = new Command('check')
  .description('Check the portal for assignments due soon')
  .option('--due-within <hours>', 'Deadline window in hours', parsePositiveNumber, config.check.dueWithinHours)
  .addOption(
    new Option('--watch [minutes]', 'Keep running and check every N minutes')
      .preset(String(config.check.watchIntervalMinutes))
      .argParser(parsePositiveNumber)
  )
  .option('--check-submissions', 'Open each due assignment and skip ones already submitted')
  .option('--dry-run', 'Print the message instead of sending it')
  .option('--quiet', 'Suppress output when nothing is due')
  .action(async (options: CheckCommandOptions) => {
    const controller = new AbortController();
    if (options.watch) {
      process.once('SIGINT', () => controller.abort());
    }

    try {
      await runCheckCommand(options, {
        sources: [new EnvSecretSource(), new FileSecretStore(config.paths.secrets)],
        signal: controller.signal,
      });
    } catch (error) {
      logger.error(`Check failed: ${describeError(error)}`);
      console.error(`\nCheck failed: ${describeError(error)}`);
      process.exit(exitCodeFor(error));
    }
  });
