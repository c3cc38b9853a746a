import { extractDue, ExtractOptions } from './extractor/extract.js';
import { obtainListing, SessionOptions, withPortalSession } from './scraper/session.js';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';
import { CheckResult, Credentials, DatedAssignment } from './types/index.js';

export interface CheckOptions {
  now: Date;
  lookaheadMs: number;
  checkSubmissions?: boolean;
}

export interface CheckDependencies {
  session?: SessionOptions;
  extract?: Partial<ExtractOptions>;
}

function extractOptionsFor(deps: CheckDependencies): Partial<ExtractOptions> {
  const portal = deps.session?.settings ?? config.portal;
  return {
    zone: portal.timezone,
    numericDateOrder: portal.numericDateOrder,
    selectors: portal.selectors,
    ...deps.extract,
  };
}

/** One full check: log in, read the listing, filter to the due window. */
export async function runCheck(
  credentials: Credentials,
  options: CheckOptions,
  deps: CheckDependencies = {}
): Promise<CheckResult> {
  const extractOptions = extractOptionsFor(deps);

  if (!options.checkSubmissions) {
    const page = await obtainListing(credentials, deps.session);
    const result = extractDue(page, options.now, options.lookaheadMs, extractOptions);
    logger.info(`Listing has ${result.total} items, ${result.due.length} due, ${result.unparseableCount} unparseable`);
    return result;
  }

  return withPortalSession(
    credentials,
    async (session) => {
      const page = await session.fetchListing();
      const result = extractDue(page, options.now, options.lookaheadMs, extractOptions);

      const pending: DatedAssignment[] = [];
      for (const assignment of result.due) {
        if (assignment.url && (await session.isSubmitted(assignment.url))) {
          logger.info(`Already submitted: ${assignment.title}`);
          continue;
        }
        pending.push(assignment);
      }

      logger.info(
        `Listing has ${result.total} items, ${pending.length} due and unsubmitted, ${result.unparseableCount} unparseable`
      );
      return { ...result, due: pending, submittedCount: result.due.length - pending.length };
    },
    deps.session
  );
}
