import type { Dayjs } from 'dayjs';
import { config } from '../utils/config.js';
import { dayjs } from '../utils/time.js';
import {
  AssignmentRecord,
  CheckResult,
  DatedAssignment,
  ListingSelectors,
  NumericDateOrder,
  RawListingPage,
} from '../types/index.js';
import { DEFAULT_MATCHERS, DateMatcher, normalizeDueText } from './dateMatchers.js';
import { parseListing } from './listing.js';

export interface ExtractOptions {
  zone: string;
  numericDateOrder: NumericDateOrder;
  selectors: ListingSelectors;
  matchers: readonly DateMatcher[];
}

export const defaultExtractOptions: ExtractOptions = {
  zone: config.portal.timezone,
  numericDateOrder: config.portal.numericDateOrder,
  selectors: config.portal.selectors,
  matchers: DEFAULT_MATCHERS,
};

export function hasDueDate(record: AssignmentRecord): record is DatedAssignment {
  return record.dueAt !== null;
}

/** Half-open window: due exactly at `now` counts, due exactly at the far edge does not. */
export function isWithinWindow(dueAt: Dayjs, now: Date, lookaheadMs: number): boolean {
  const due = dueAt.valueOf();
  const start = now.getTime();
  return start <= due && due < start + lookaheadMs;
}

export function compareByDue(a: DatedAssignment, b: DatedAssignment): number {
  const diff = a.dueAt.valueOf() - b.dueAt.valueOf();
  if (diff !== 0) return diff;
  if (a.title === b.title) return 0;
  return a.title < b.title ? -1 : 1;
}

/**
 * Parses the listing page and returns the assignments due in
 * `[now, now + lookaheadMs)`, earliest first. Records whose date text no
 * matcher understands are returned separately in `unparseable`.
 */
export function extractDue(
  page: RawListingPage,
  now: Date,
  lookaheadMs: number,
  options: Partial<ExtractOptions> = {}
): CheckResult {
  if (!Number.isFinite(lookaheadMs) || lookaheadMs < 0) {
    throw new RangeError(`Lookahead must be a non-negative duration, got ${lookaheadMs}`);
  }
  const { zone, numericDateOrder, selectors, matchers } = { ...defaultExtractOptions, ...options };
  const context = { zone, now, numericDateOrder };

  const records: AssignmentRecord[] = parseListing(page, selectors).map((block) => ({
    title: block.title,
    course: block.course,
    dueAt: normalizeDueText(block.dateText, context, matchers),
    sourceText: block.dateText,
    ...(block.url ? { url: block.url } : {}),
  }));

  const due = records
    .filter(hasDueDate)
    .filter((record) => isWithinWindow(record.dueAt, now, lookaheadMs))
    .sort(compareByDue);
  const unparseable = records.filter((record) => !hasDueDate(record));

  return {
    due,
    unparseable,
    unparseableCount: unparseable.length,
    submittedCount: 0,
    total: records.length,
    windowStart: dayjs(now).tz(zone),
    windowEnd: dayjs(now.getTime() + lookaheadMs).tz(zone),
  };
}
