import * as fs from "node:fs";
import type {
  BrowserLauncher,
  LoadState,
  PageEventHandlers,
  ScrapeLocator,
  ScrapePage,
  ScraperConfig,
} from "../../src/scrapers/interface.js";

export interface FakeElement {
  text: string;
  href?: string | null;
  failOn?: "getAttribute" | "innerText" | "click";
}

export interface FakePageOptions {
  title?: string;
  html?: string;
  /** Elements matched by an exact selector string; an Error makes count() throw */
  elements?: Record<string, FakeElement[] | Error>;
  /** Accessible names of the buttons on the page */
  buttons?: string[];
  /** Called on every goto(); throw to fail the navigation */
  onGoto?: (url: string, attempt: number) => void;
  /** Reported through onPageError during goto() */
  pageErrors?: string[];
  failContent?: boolean;
  failScreenshot?: boolean;
  /** waitForTimeout() rejects as it does once the page is closed */
  failWait?: boolean;
}

export class FakeLocator implements ScrapeLocator {
  constructor(
    private readonly page: FakePage,
    readonly selector: string,
    private readonly elements: FakeElement[] | Error
  ) {}

  async count(): Promise<number> {
    return this.all().length;
  }

  first(): ScrapeLocator {
    return this.nth(0);
  }

  nth(index: number): ScrapeLocator {
    const matched =
      this.elements instanceof Error ? this.elements : this.elements.slice(index, index + 1);
    return new FakeLocator(this.page, `${this.selector} >> nth=${index}`, matched);
  }

  filter(options: { hasText: string }): ScrapeLocator {
    const needle = options.hasText.toLowerCase();
    const matched =
      this.elements instanceof Error
        ? this.elements
        : this.elements.filter((el) => el.text.toLowerCase().includes(needle));
    return new FakeLocator(this.page, `${this.selector} >> hasText=${options.hasText}`, matched);
  }

  async click(): Promise<void> {
    const el = this.single();
    if (el.failOn === "click") throw new Error(`Element is not visible: ${this.selector}`);
    this.page.clicks.push(this.selector);
  }

  async getAttribute(name: string): Promise<string | null> {
    const el = this.single();
    if (el.failOn === "getAttribute") throw new Error("Element is detached from the DOM");
    return name === "href" ? el.href ?? null : null;
  }

  async innerText(): Promise<string> {
    const el = this.single();
    if (el.failOn === "innerText") throw new Error("Element is detached from the DOM");
    return el.text;
  }

  private all(): FakeElement[] {
    if (this.elements instanceof Error) throw this.elements;
    return this.elements;
  }

  private single(): FakeElement {
    const el = this.all()[0];
    if (!el) throw new Error(`No element matches ${this.selector}`);
    return el;
  }
}

export class FakePage implements ScrapePage {
  readonly visited: string[] = [];
  readonly waits: number[] = [];
  readonly loadStates: LoadState[] = [];
  readonly clicks: string[] = [];
  handlers: PageEventHandlers | undefined;

  constructor(private readonly options: FakePageOptions = {}) {}

  async goto(url: string): Promise<null> {
    this.visited.push(url);
    for (const message of this.options.pageErrors ?? []) {
      this.handlers?.onPageError(message);
    }
    this.options.onGoto?.(url, this.visited.length);
    return null;
  }

  async waitForLoadState(state: LoadState): Promise<void> {
    this.loadStates.push(state);
  }

  async waitForTimeout(timeout: number): Promise<void> {
    this.waits.push(timeout);
    if (this.options.failWait) throw new Error("Target page, context or browser has been closed");
  }

  async title(): Promise<string> {
    return this.options.title ?? "";
  }

  async content(): Promise<string> {
    if (this.options.failContent) throw new Error("Target page, context or browser has been closed");
    return this.options.html ?? "<html><head></head><body></body></html>";
  }

  async screenshot(options: { path: string; fullPage: boolean }): Promise<Buffer> {
    if (this.options.failScreenshot) throw new Error("Timeout 30000ms exceeded.");
    const png = Buffer.from("fake-png");
    fs.writeFileSync(options.path, png);
    return png;
  }

  locator(selector: string): ScrapeLocator {
    return new FakeLocator(this, selector, this.options.elements?.[selector] ?? []);
  }

  getByRole(role: "button", options: { name: RegExp }): ScrapeLocator {
    const matched = (this.options.buttons ?? [])
      .filter((name) => options.name.test(name))
      .map((text) => ({ text }));
    return new FakeLocator(this, `role=${role}`, matched);
  }
}

export class FakeBrowser {
  launches = 0;
  closes = 0;

  constructor(
    readonly page: FakePage,
    private readonly failures: { launch?: Error; close?: Error } = {}
  ) {}

  readonly launch: BrowserLauncher = async (_config, handlers) => {
    this.launches++;
    if (this.failures.launch) throw this.failures.launch;
    this.page.handlers = handlers;
    return {
      page: this.page,
      close: async () => {
        this.closes++;
        if (this.failures.close) throw this.failures.close;
      },
    };
  };
}

export function testConfig(
  dataDir: string,
  overrides: Partial<ScraperConfig> = {}
): ScraperConfig {
  return {
    headless: true,
    slowMo: 0,
    locale: "en-US",
    navigationTimeoutMs: 30_000,
    popupWaitMs: 0,
    maxRetries: 1,
    retryDelayMs: 0,
    maxItems: 20,
    dataDir,
    logLevel: "error",
    logRetentionDays: 7,
    ...overrides,
  };
}
