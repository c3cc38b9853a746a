import { AuthenticationError, CheckerError, TransportError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import { Credentials, PortalSettings, RawListingPage } from '../types/index.js';
import { PortalPage } from './browser.js';

function containsMarker(html: string, markers: string[]): boolean {
  return markers.some((marker) => html.includes(marker));
}

export function isSubmittedPage(html: string, markers: string[]): boolean {
  return containsMarker(html, markers);
}

/**
 * One logged-in tab on the portal. Created and torn down by
 * withPortalSession; never outlives it.
 */
export class PortalSession {
  constructor(
    private readonly page: PortalPage,
    private readonly settings: PortalSettings
  ) {}

  get dashboardUrl(): string {
    return new URL(this.settings.dashboardPath, this.settings.baseUrl).toString();
  }

  private get listingSelector(): string {
    return this.settings.selectors.listing.join(', ');
  }

  // Playwright failures become TransportError; our own errors pass through
  private async step<T>(what: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      if (error instanceof CheckerError) throw error;
      throw new TransportError(`${what} failed: ${describeError(error)}`, { cause: error });
    }
  }

  private async open(url: string, waitUntil: 'domcontentloaded' | 'networkidle' = 'domcontentloaded') {
    await this.step(`Loading ${url}`, () =>
      this.page.goto(url, { waitUntil, timeout: this.settings.navigationTimeout })
    );
  }

  async login(credentials: Credentials): Promise<void> {
    await this.open(this.dashboardUrl);

    const listed = await this.step('Checking session', () => this.page.locator(this.listingSelector).count());
    if (listed > 0) {
      logger.info('Portal session already authenticated');
      return;
    }

    const { loginLink, username, password } = this.settings.login;
    const timeout = this.settings.navigationTimeout;

    const link = this.page.locator(loginLink).first();
    if ((await this.step('Looking for login link', () => link.count())) > 0) {
      await this.step('Opening login form', async () => {
        await link.click({ timeout });
        await this.page.waitForLoadState('networkidle', { timeout });
      });
    }

    await this.step('Submitting login form', async () => {
      await this.page.fill(username, credentials.username, { timeout });
      await this.page.fill(password, credentials.password, { timeout });
      await this.page.press(password, 'Enter', { timeout });
      await this.page.waitForLoadState('networkidle', { timeout });
    });

    const html = await this.step('Reading login result', () => this.page.content());
    if (containsMarker(html, this.settings.loginErrorMarkers)) {
      throw new AuthenticationError('Portal rejected the login. Check the stored credentials.');
    }
    if (await this.stillOnLoginForm()) {
      throw new AuthenticationError(
        `Login did not complete (still at ${this.page.url()}). Check the stored credentials.`
      );
    }
    logger.info('Logged in to portal');
  }

  // Identity providers word their errors freely; staying on the form is the reliable signal
  private async stillOnLoginForm(): Promise<boolean> {
    const url = this.page.url();
    if (this.settings.loginUrlMarkers.some((marker) => url.includes(marker))) {
      return true;
    }
    const fields = await this.step('Checking login form', () =>
      this.page.locator(this.settings.login.password).count()
    );
    return fields > 0;
  }

  async fetchListing(): Promise<RawListingPage> {
    await this.open(this.dashboardUrl, 'networkidle');

    try {
      await this.page
        .locator(this.listingSelector)
        .first()
        .waitFor({ timeout: this.settings.navigationTimeout });
    } catch (error) {
      // The extractor decides whether the layout is broken
      logger.warn(`Listing container did not appear: ${describeError(error)}`);
    }

    return this.step('Reading listing page', () => this.page.content());
  }

  async isSubmitted(url: string): Promise<boolean> {
    const target = new URL(url, this.settings.baseUrl).toString();
    await this.open(target);
    const html = await this.step(`Reading ${target}`, () => this.page.content());
    return isSubmittedPage(html, this.settings.submittedMarkers);
  }
}
