import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { ParseError } from '../errors.js';
import { ListingSelectors, RawListingPage } from '../types/index.js';

export interface AssignmentBlock {
  title: string;
  course: string;
  dateText: string;
  url?: string;
}

export const UNTITLED = '(untitled)';
export const UNKNOWN_COURSE = '(unknown course)';

const TIME_ONLY = /^\d{1,2}[:：]\d{2}(\s*[AP]M)?$/i;

type Selection = cheerio.Cheerio<AnyNode>;

function squash(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// Selector lists are tried in priority order, not document order.
function firstMatch(scope: Selection, selectors: string[]): Selection | null {
  for (const selector of selectors) {
    const found = scope.find(selector).first();
    if (found.length > 0) return found;
  }
  return null;
}

function firstText(scope: Selection, selectors: string[]): string {
  for (const selector of selectors) {
    const text = squash(scope.find(selector).first().text());
    if (text) return text;
  }
  return '';
}

function dateTextFor(item: Selection, selectors: ListingSelectors): string {
  const dueEl = firstMatch(item, selectors.due);
  if (!dueEl) return squash(item.text());

  const datetime = dueEl.attr('datetime');
  if (datetime) return datetime.trim();

  const text = squash(dueEl.text());
  if (!TIME_ONLY.test(text)) return text || squash(item.text());

  // Timeline groups items under a day heading and shows only the time per item
  for (const groupSelector of selectors.dateGroup) {
    const group = item.closest(groupSelector);
    if (group.length === 0) continue;
    const heading = firstText(group, selectors.dateHeading);
    if (heading) return `${heading} ${text}`;
  }
  return text;
}

/**
 * Splits the listing markup into assignment blocks. Throws ParseError when
 * no listing container exists; an empty container yields an empty array.
 */
export function parseListing(page: RawListingPage, selectors: ListingSelectors): AssignmentBlock[] {
  const $ = cheerio.load(page);
  const root = $.root();

  const container = firstMatch(root, selectors.listing);
  if (!container) {
    throw new ParseError(
      `Assignment listing not found (tried ${selectors.listing.join(', ')}). The portal layout may have changed.`
    );
  }

  let items: Selection | null = null;
  for (const selector of selectors.item) {
    const found = container.find(selector);
    if (found.length > 0) {
      items = found;
      break;
    }
  }
  if (!items) return [];

  return items.toArray().map((element) => {
    const item = $(element);
    const href = firstMatch(item, selectors.link)?.attr('href');
    return {
      title: firstText(item, selectors.title) || UNTITLED,
      course: firstText(item, selectors.course) || UNKNOWN_COURSE,
      dateText: dateTextFor(item, selectors),
      ...(href ? { url: href } : {}),
    };
  });
}
