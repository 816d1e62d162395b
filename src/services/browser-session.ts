import { chromium, errors, type Browser, type BrowserContext, type Locator, type Page } from "playwright";
import type { BrowserDriver, DriverElement, ElementState } from "../platforms/driver";
import type { ScrapeConfig } from "../domain/models";
import { EnvironmentError } from "../core/errors";
import { logger } from "../core/logger";

const NAVIGATION_TIMEOUT_MS = 60000;
const ACTION_TIMEOUT_MS = 15000;

function isTimeout(error: unknown): boolean {
  return error instanceof errors.TimeoutError;
}

class PlaywrightElement implements DriverElement {
  constructor(private readonly locator: Locator) {}

  html(): Promise<string> {
    return this.locator.evaluate((node) => node.outerHTML);
  }

  async findAll(selector: string): Promise<DriverElement[]> {
    const matches = await this.locator.locator(selector).all();
    return matches.map((match) => new PlaywrightElement(match));
  }

  async click(): Promise<void> {
    // A dispatched click still lands when an overlay covers the control.
    await this.locator.dispatchEvent("click");
  }

  async scrollIntoView(): Promise<void> {
    await this.locator.scrollIntoViewIfNeeded();
  }
}

export class PlaywrightDriver implements BrowserDriver {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT_MS });
  }

  currentUrl(): string {
    return this.page.url();
  }

  async findAll(selector: string): Promise<DriverElement[]> {
    const matches = await this.page.locator(selector).all();
    return matches.map((match) => new PlaywrightElement(match));
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.page.locator(selector).first().fill(value);
  }

  async press(selector: string, key: string): Promise<void> {
    await this.page.locator(selector).first().press(key);
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => window.scrollTo(0, document.body.scrollHeight));
  }

  async pause(ms: number): Promise<void> {
    if (ms > 0) await this.page.waitForTimeout(ms);
  }

  async waitForSelector(selector: string, timeoutMs: number, state: ElementState = "attached"): Promise<boolean> {
    try {
      const target = this.page.locator(selector);
      // Empty placeholders stay attached all along; only one with content counts.
      const locator = state === "visible" ? target.filter({ hasText: /\S/ }) : target;
      await locator.first().waitFor({ state, timeout: timeoutMs });
      return true;
    } catch (error) {
      if (isTimeout(error)) return false;
      throw error;
    }
  }

  async waitForUrl(predicate: (url: URL) => boolean, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForURL(predicate, { timeout: timeoutMs, waitUntil: "domcontentloaded" });
      return true;
    } catch (error) {
      if (isTimeout(error)) return false;
      throw error;
    }
  }
}

export interface BrowserSession {
  readonly driver: BrowserDriver;
  close(): Promise<void>;
}

export type SessionOpener = (config: ScrapeConfig) => Promise<BrowserSession>;

class PlaywrightSession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    readonly driver: BrowserDriver,
  ) {}

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await closeBrowserSafely(this.browser, this.context);
    logger.debug("Browser session closed");
  }
}

async function closeBrowserSafely(browser: Browser | null, context: BrowserContext | null): Promise<void> {
  if (context) {
    await context.close().catch((error: unknown) => {
      logger.debug({ error }, "Error closing browser context (non-fatal)");
    });
  }
  if (browser) {
    await browser.close().catch((error: unknown) => {
      logger.debug({ error }, "Error closing browser (non-fatal)");
    });
  }
}

export const openSession: SessionOpener = async (config) => {
  const { width, height } = config.windowSize;
  let browser: Browser | null = null;
  let context: BrowserContext | null = null;

  try {
    browser = await chromium.launch({
      headless: config.headless,
      slowMo: config.slowMo,
      args: [`--window-size=${width},${height}`],
    });
    context = await browser.newContext({ viewport: { width, height }, locale: "en-US" });
    const page = await context.newPage();
    page.setDefaultTimeout(ACTION_TIMEOUT_MS);
    page.setDefaultNavigationTimeout(NAVIGATION_TIMEOUT_MS);

    logger.info({ headless: config.headless, width, height }, "Launched browser");
    return new PlaywrightSession(browser, context, new PlaywrightDriver(page));
  } catch (error) {
    await closeBrowserSafely(browser, context);
    const message = error instanceof Error ? error.message : String(error);
    throw new EnvironmentError(`Could not start the browser: ${message}`, "BROWSER_LAUNCH_FAILED", { cause: error });
  }
};
