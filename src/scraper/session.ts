import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { TransportError, describeError } from '../errors.js';
import { Credentials, PortalSettings, RawListingPage } from '../types/index.js';
import { BrowserLauncher, chromiumLauncher } from './browser.js';
import { PortalSession } from './portal.js';

export interface SessionOptions {
  settings?: PortalSettings;
  launch?: BrowserLauncher;
}

/**
 * Launches a browser, logs in, runs `work` and closes the browser on every
 * exit path. Credentials are only handed to the login step.
 */
export async function withPortalSession<T>(
  credentials: Credentials,
  work: (session: PortalSession) => Promise<T>,
  options: SessionOptions = {}
): Promise<T> {
  const settings = options.settings ?? config.portal;
  const launch = options.launch ?? chromiumLauncher(settings.headless);

  const browser = await launch().catch((error: unknown) => {
    throw new TransportError(`Could not start browser: ${describeError(error)}`, { cause: error });
  });

  try {
    const page = await browser.newPage().catch((error: unknown) => {
      throw new TransportError(`Could not open a tab: ${describeError(error)}`, { cause: error });
    });
    const session = new PortalSession(page, settings);
    await session.login(credentials);
    return await work(session);
  } finally {
    await browser.close().catch((error: unknown) => {
      logger.warn(`Failed to close browser: ${describeError(error)}`);
    });
  }
}

export async function obtainListing(
  credentials: Credentials,
  options: SessionOptions = {}
): Promise<RawListingPage> {
  return withPortalSession(credentials, (session) => session.fetchListing(), options);
}
