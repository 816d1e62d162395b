/**
 * The narrow slice of a browser-automation library the scraper relies on.
 * Playwright backs it at run time (see services/browser-session.ts).
 */
export type ElementState = "attached" | "visible";

export interface BrowserDriver {
  goto(url: string): Promise<void>;

  currentUrl(): string;

  findAll(selector: string): Promise<DriverElement[]>;

  fill(selector: string, value: string): Promise<void>;

  press(selector: string, key: string): Promise<void>;

  scrollToBottom(): Promise<void>;

  pause(ms: number): Promise<void>;

  /**
   * Resolves false when nothing matching the selector shows up in time.
   * "visible" ignores elements that are in the DOM but empty or hidden.
   */
  waitForSelector(selector: string, timeoutMs: number, state?: ElementState): Promise<boolean>;

  /** Resolves false when the predicate never holds within the timeout. */
  waitForUrl(predicate: (url: URL) => boolean, timeoutMs: number): Promise<boolean>;
}

export interface DriverElement {
  html(): Promise<string>;

  findAll(selector: string): Promise<DriverElement[]>;

  click(): Promise<void>;

  scrollIntoView(): Promise<void>;
}
