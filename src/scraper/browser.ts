import { chromium } from 'playwright';

type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

// The slice of Playwright's Locator/Page/Browser the portal session drives.
// Playwright's own objects satisfy these; tests supply in-process fakes.
export interface PortalLocator {
  first(): PortalLocator;
  count(): Promise<number>;
  click(options?: { timeout?: number }): Promise<void>;
  waitFor(options?: { timeout?: number }): Promise<void>;
}

export interface PortalPage {
  goto(url: string, options?: { timeout?: number; waitUntil?: LoadState }): Promise<unknown>;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  locator(selector: string): PortalLocator;
  fill(selector: string, value: string, options?: { timeout?: number }): Promise<void>;
  press(selector: string, key: string, options?: { timeout?: number }): Promise<void>;
  content(): Promise<string>;
  url(): string;
}

export interface PortalBrowser {
  newPage(): Promise<PortalPage>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<PortalBrowser>;

export function chromiumLauncher(headless: boolean): BrowserLauncher {
  return () => chromium.launch({ headless });
}
