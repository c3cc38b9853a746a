// ── Tests: cli/commands/check.ts ──────────────────────────────────────────────

import { describe, it, expect, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { checkCommand, exitCodeFor, parsePositiveNumber, runCheckCommand } from '../commands/check.js';
import { runCheck } from '../../checker.js';
import { EnvSecretSource } from '../../credentials/store.js';
import { AuthenticationError, MissingCredentialsError, ParseError, TransportError } from '../../errors.js';
import { Notifier } from '../../notify/notifier.js';
import { CheckResult, DatedAssignment } from '../../types/index.js';
import { dayjs } from '../../utils/time.js';

const HOUR = 60 * 60 * 1000;
const now = new Date('2024-05-01T09:00:00+09:00');
const sources = [new EnvSecretSource({ LMS_USERNAME: 'student', LMS_PASSWORD: 'test-password' })];

const essay: DatedAssignment = {
  title: 'Essay',
  course: 'Writing',
  dueAt: dayjs.tz('2024-05-01 23:59', 'Asia/Tokyo'),
  sourceText: '2024年5月1日 23:59',
};

function resultWith(due: DatedAssignment[]): CheckResult {
  const windowStart = dayjs(now).tz('Asia/Tokyo');
  return {
    due,
    unparseable: [],
    unparseableCount: 0,
    submittedCount: 0,
    total: due.length,
    windowStart,
    windowEnd: windowStart.add(24, 'hour'),
  };
}

function harness(check: typeof runCheck) {
  const send = vi.fn<Notifier['send']>(async () => {});
  const print = vi.fn<(line: string) => void>();
  const sleep = vi.fn(async () => {});
  return { send, print, sleep, deps: { sources, check, notifier: { send }, print, sleep, clock: () => now } };
}

describe('parsePositiveNumber', () => {
  it('accepts positive numbers including fractions', () => {
    expect(parsePositiveNumber('24')).toBe(24);
    expect(parsePositiveNumber('0.5')).toBe(0.5);
  });

  it('rejects zero, negatives and text', () => {
    expect(() => parsePositiveNumber('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveNumber('-3')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveNumber('soon')).toThrow(InvalidArgumentError);
  });
});

describe('exitCodeFor', () => {
  it('uses 2 for authentication problems and 1 otherwise', () => {
    expect(exitCodeFor(new MissingCredentialsError())).toBe(2);
    expect(exitCodeFor(new TransportError('down'))).toBe(1);
    expect(exitCodeFor(new ParseError('layout'))).toBe(1);
  });
});

describe('checkCommand', () => {
  it('defaults the window to 48 hours', () => {
    const option = checkCommand.options.find((o) => o.long === '--due-within');
    expect(option?.defaultValue).toBe(48);
  });

  it('watches hourly when --watch has no value', () => {
    const option = checkCommand.options.find((o) => o.long === '--watch');
    expect(option?.presetArg).toBe('60');
  });
});

describe('runCheckCommand', () => {
  it('sends the rendered message when something is due', async () => {
    const check = vi.fn<typeof runCheck>(async () => resultWith([essay]));
    const { send, print, deps } = harness(check);

    await expect(runCheckCommand({ dueWithin: 24 }, deps)).resolves.toBe(1);

    expect(check).toHaveBeenCalledWith(
      { username: 'student', password: 'test-password' },
      { now, lookaheadMs: 24 * HOUR, checkSubmissions: undefined }
    );
    expect(send).toHaveBeenCalledWith(
      '⚠ LMS: 1 assignment(s) due within 24h\n• Writing | Essay (due 2024-05-01 23:59, in 14h)'
    );
    expect(print).not.toHaveBeenCalled();
  });

  it('prints a line instead of notifying when nothing is due', async () => {
    const { send, print, deps } = harness(async () => resultWith([]));

    await runCheckCommand({ dueWithin: 24 }, deps);

    expect(send).not.toHaveBeenCalled();
    expect(print).toHaveBeenCalledWith('No deadlines within 24h.');
  });

  it('stays silent with --quiet when nothing is due', async () => {
    const { send, print, deps } = harness(async () => resultWith([]));

    await runCheckCommand({ dueWithin: 24, quiet: true }, deps);

    expect(send).not.toHaveBeenCalled();
    expect(print).not.toHaveBeenCalled();
  });

  it('fails before checking when no credentials are available', async () => {
    const check = vi.fn<typeof runCheck>(async () => resultWith([]));
    const { deps } = harness(check);

    await expect(runCheckCommand({ dueWithin: 24 }, { ...deps, sources: [new EnvSecretSource({})] })).rejects.toBeInstanceOf(
      MissingCredentialsError
    );
    expect(check).not.toHaveBeenCalled();
  });

  it('stops watching when the portal rejects the login', async () => {
    const check = vi
      .fn<typeof runCheck>()
      .mockResolvedValueOnce(resultWith([]))
      .mockRejectedValueOnce(new AuthenticationError('rejected'));
    const { sleep, deps } = harness(check);

    await expect(runCheckCommand({ dueWithin: 24, watch: 30, quiet: true }, deps)).rejects.toBeInstanceOf(
      AuthenticationError
    );
    expect(check).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(30 * 60 * 1000, undefined);
  });

  it('keeps watching after a transport failure until aborted', async () => {
    const controller = new AbortController();
    const check = vi
      .fn<typeof runCheck>()
      .mockRejectedValueOnce(new TransportError('portal unreachable'))
      .mockImplementationOnce(async () => {
        controller.abort();
        return resultWith([]);
      });
    const { print, deps } = harness(check);

    await expect(runCheckCommand({ dueWithin: 24, watch: 30 }, { ...deps, signal: controller.signal })).resolves.toBe(2);
    expect(print.mock.calls.map(([line]) => line)).toEqual([
      'Checking every 30 min (Ctrl+C to stop)...',
      'No deadlines within 24h.',
      'Stopped.',
    ]);
  });
});
