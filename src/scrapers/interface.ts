import type { ExtractedItem, ScrapeRecord } from "../types.js";
import type { Logger, LogLevel } from "../log.js";

export interface ScraperConfig {
  headless: boolean;
  slowMo: number;
  locale: string;
  navigationTimeoutMs: number;
  popupWaitMs: number;
  maxRetries: number;
  retryDelayMs: number;
  maxItems: number;
  dataDir: string;
  logLevel: LogLevel;
  logRetentionDays: number;
  urlOverride?: string;
}

export interface Scraper {
  readonly name: string;
  readonly displayName: string;
  readonly itemLabel: string;
  scrape(config: ScraperConfig): Promise<ScrapeRecord>;
}

// The slice of Playwright's Locator/Page API the scrapers touch. A real
// playwright Page satisfies ScrapePage structurally.

export interface ScrapeLocator {
  count(): Promise<number>;
  first(): ScrapeLocator;
  nth(index: number): ScrapeLocator;
  filter(options: { hasText: string }): ScrapeLocator;
  click(options?: { timeout?: number }): Promise<void>;
  getAttribute(name: string): Promise<string | null>;
  innerText(): Promise<string>;
}

export type LoadState = "load" | "domcontentloaded" | "networkidle";

export interface ScrapePage {
  goto(
    url: string,
    options: { waitUntil: LoadState; timeout: number }
  ): Promise<unknown>;
  waitForLoadState(state: LoadState): Promise<void>;
  waitForTimeout(timeout: number): Promise<void>;
  title(): Promise<string>;
  content(): Promise<string>;
  screenshot(options: { path: string; fullPage: boolean }): Promise<unknown>;
  locator(selector: string): ScrapeLocator;
  getByRole(role: "button", options: { name: RegExp }): ScrapeLocator;
}

export interface PageEventHandlers {
  onPageError(message: string): void;
  onRequestFailed(url: string, errorText: string): void;
}

export interface BrowserHandle {
  page: ScrapePage;
  close(): Promise<void>;
}

export type BrowserLauncher = (
  config: ScraperConfig,
  handlers: PageEventHandlers
) => Promise<BrowserHandle>;

export interface ExtractContext {
  page: ScrapePage;
  /** HTML captured by the save step; null when that step failed */
  html: string | null;
  config: ScraperConfig;
  log: Logger;
}

/** Everything that distinguishes one site's scrape from another's. */
export interface ScrapeTarget {
  name: string;
  displayName: string;
  /** Candidate URLs, tried in order; the first is the default */
  urls: readonly string[];
  /** Directory under the data dir, e.g. "demo_scrapes" */
  outputSubdir: string;
  /** Output filename stem, e.g. "demo_page" */
  filePrefix: string;
  /** Plural noun for what extract() returns, e.g. "headings" */
  itemLabel: string;
  /** Cookie-banner selectors to scan after navigation; omit to skip */
  cookieSelectors?: readonly string[];
  /** Lower-case substring the page title must contain */
  titleKeyword?: string;
  extract(context: ExtractContext): Promise<ExtractedItem[]>;
}
