// ── Tests: checker.ts ─────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { runCheck } from '../checker.js';
import { ParseError } from '../errors.js';
import { timelinePage } from '../extractor/__tests__/fixtures.js';
import { FakeBrowser, fakeLauncher, testSettings } from '../scraper/__tests__/fakeBrowser.js';

const HOUR = 60 * 60 * 1000;
const credentials = { username: 'student', password: 'test-password' };
const now = new Date('2024-05-01T09:00:00+09:00');

const listing = timelinePage([
  { title: 'Essay', course: 'Writing', due: '2024年5月1日 23:59', href: '/mod/assign/view.php?id=1' },
  { title: 'Lab', course: 'Physics', due: '2024年5月1日 17:00', href: '/mod/assign/view.php?id=2' },
  { title: 'Reading', course: 'History', due: '2024年5月1日 12:00' },
  { title: 'Project', course: 'Design', due: '2024年5月9日 12:00', href: '/mod/assign/view.php?id=4' },
]);

function setup(pages: Record<string, string> = {}, page = listing) {
  const browser = new FakeBrowser({ username: 'student', password: 'test-password', listing: page, pages });
  return { browser, deps: { session: { settings: testSettings, launch: fakeLauncher(browser) } } };
}

describe('runCheck', () => {
  it('returns the assignments due in the window', async () => {
    const { browser, deps } = setup();

    const result = await runCheck(credentials, { now, lookaheadMs: 24 * HOUR }, deps);

    expect(result.due.map((a) => a.title)).toEqual(['Reading', 'Lab', 'Essay']);
    expect(result.submittedCount).toBe(0);
    expect(browser.closed).toBe(true);
  });

  it('drops submitted assignments when asked to check submissions', async () => {
    const { browser, deps } = setup({
      'https://lms.test/mod/assign/view.php?id=1': '<td>Submitted for grading</td>',
      'https://lms.test/mod/assign/view.php?id=2': '<td>No attempt</td>',
    });

    const result = await runCheck(credentials, { now, lookaheadMs: 24 * HOUR, checkSubmissions: true }, deps);

    expect(result.due.map((a) => a.title)).toEqual(['Reading', 'Lab']);
    expect(result.submittedCount).toBe(1);
    // Reading has no link, Project is outside the window
    expect(browser.page.visited).not.toContain('https://lms.test/mod/assign/view.php?id=4');
    expect(browser.closed).toBe(true);
  });

  it('propagates ParseError when the layout changed', async () => {
    const { browser, deps } = setup({}, '<div class="dashboard">Welcome back</div>');

    await expect(runCheck(credentials, { now, lookaheadMs: 24 * HOUR }, deps)).rejects.toBeInstanceOf(ParseError);
    expect(browser.closed).toBe(true);
  });
});
