import * as fs from "node:fs";
import * as path from "node:path";
import { createLogger, pruneLogs, type Logger } from "../log.js";
import type { ExtractedItem, ScrapeRecord } from "../types.js";
import { launchBrowser } from "./browser.js";
import type {
  BrowserHandle,
  BrowserLauncher,
  ScrapePage,
  Scraper,
  ScraperConfig,
  ScrapeTarget,
} from "./interface.js";
import { dismissCookieBanner } from "./popup-guard.js";
import { errorMessage, formatTimestamp } from "./utils.js";

export interface OutputDirs {
  base: string;
  html: string;
  screenshots: string;
  logs: string;
  json: string;
}

export interface HomepageScraperOptions {
  launch?: BrowserLauncher;
  now?: () => Date;
}

interface Run {
  page: ScrapePage;
  record: ScrapeRecord;
  config: ScraperConfig;
  dirs: OutputDirs;
  log: Logger;
}

type NavigationOutcome = "loaded" | "unexpected-title" | "failed";

export function resolveOutputDirs(dataDir: string, subdir: string): OutputDirs {
  const base = path.join(dataDir, subdir);
  return {
    base,
    html: path.join(base, "html"),
    screenshots: path.join(base, "screenshots"),
    logs: path.join(base, "logs"),
    json: path.join(base, "json"),
  };
}

export function ensureOutputDirs(dirs: OutputDirs): void {
  for (const dir of Object.values(dirs)) {
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
}

export function createRecord(
  target: ScrapeTarget,
  config: ScraperConfig,
  now: Date
): ScrapeRecord {
  return {
    scraper: target.name,
    timestamp: formatTimestamp(now),
    url: config.urlOverride ?? target.urls[0] ?? "",
    locale: config.locale,
    success: false,
    title: null,
    htmlFile: null,
    screenshotFile: null,
    resultFile: null,
    cookieBanner: null,
    itemsFound: 0,
    items: [],
    errors: [],
  };
}

/**
 * Straight-line homepage scrape shared by every target:
 * launch -> navigate (+ cookie banner) -> save HTML -> screenshot -> extract.
 *
 * Each step records its own failure in `record.errors` and the run carries
 * on; only a failed launch or navigation ends it early with success=false.
 */
export class HomepageScraper implements Scraper {
  readonly name: string;
  readonly displayName: string;
  readonly itemLabel: string;

  private readonly launch: BrowserLauncher;
  private readonly now: () => Date;

  constructor(
    protected readonly target: ScrapeTarget,
    options: HomepageScraperOptions = {}
  ) {
    this.name = target.name;
    this.displayName = target.displayName;
    this.itemLabel = target.itemLabel;
    this.launch = options.launch ?? launchBrowser;
    this.now = options.now ?? (() => new Date());
  }

  async scrape(config: ScraperConfig): Promise<ScrapeRecord> {
    const record = createRecord(this.target, config, this.now());
    const dirs = resolveOutputDirs(config.dataDir, this.target.outputSubdir);
    ensureOutputDirs(dirs);
    const pruned = pruneLogs(dirs.logs, config.logRetentionDays, this.now());

    const log = createLogger(this.name, {
      level: config.logLevel,
      file: path.join(dirs.logs, `${this.name}_scraper_${record.timestamp}.log`),
      now: this.now,
    });
    log.info(`Starting ${this.displayName} scrape (timestamp: ${record.timestamp})`);
    if (pruned.length > 0) log.debug(`Removed ${pruned.length} expired log file(s)`);

    let browser: BrowserHandle;
    try {
      log.info("Starting chromium browser");
      browser = await this.launch(config, {
        onPageError: (message) => {
          const msg = `Page error: ${message}`;
          log.error(msg);
          record.errors.push(msg);
        },
        onRequestFailed: (url, errorText) => {
          log.warn(`Request failed: ${url} - ${errorText}`);
        },
      });
      log.info("Browser started successfully");
    } catch (err) {
      this.fail(record, log, "Failed to start browser", err);
      this.saveRecord(record, dirs, log);
      return record;
    }

    const run: Run = { page: browser.page, record, config, dirs, log };
    try {
      await this.execute(run);
    } finally {
      try {
        await browser.close();
        log.info("Browser closed");
      } catch (err) {
        log.error(`Error during cleanup: ${errorMessage(err)}`);
      }
    }

    this.saveRecord(record, dirs, log);
    return record;
  }

  private async execute(run: Run): Promise<void> {
    if (!(await this.navigate(run))) {
      run.record.success = false;
      return;
    }

    const html = await this.saveHtml(run);
    await this.saveScreenshot(run);
    const items = await this.extract(run, html);

    run.record.items = items;
    run.record.itemsFound = items.length;
    run.record.success = true;
    run.log.info("Scraping completed successfully");
  }

  private candidateUrls(config: ScraperConfig): readonly string[] {
    return config.urlOverride ? [config.urlOverride] : this.target.urls;
  }

  private async navigate(run: Run): Promise<boolean> {
    const { config, log, page } = run;

    for (const url of this.candidateUrls(config)) {
      for (let attempt = 1; attempt <= config.maxRetries; attempt++) {
        const outcome = await this.tryNavigate(run, url);
        if (outcome === "loaded") return true;
        // A wrong page won't turn into the right one by reloading it
        if (outcome === "unexpected-title") break;

        if (attempt < config.maxRetries) {
          log.info(
            `Retrying ${url} in ${config.retryDelayMs}ms (attempt ${attempt + 1}/${config.maxRetries})`
          );
          try {
            await page.waitForTimeout(config.retryDelayMs);
          } catch (err) {
            // The page is gone; no further attempt can succeed
            this.fail(run.record, log, "Retry wait failed", err);
            return false;
          }
        }
      }
    }

    return false;
  }

  private async tryNavigate(run: Run, url: string): Promise<NavigationOutcome> {
    const { page, record, config, log } = run;
    record.url = url;

    try {
      log.info(`Navigating to ${url}`);
      await page.goto(url, {
        waitUntil: "networkidle",
        timeout: config.navigationTimeoutMs,
      });
      await page.waitForLoadState("domcontentloaded");

      if (this.target.cookieSelectors) {
        record.cookieBanner = await dismissCookieBanner(page, {
          selectors: this.target.cookieSelectors,
          settleMs: config.popupWaitMs,
          log: log.child("popup-guard"),
        });
        if (record.cookieBanner.error) {
          record.errors.push(`Error handling cookie popup: ${record.cookieBanner.error}`);
        }
      }

      const title = await page.title();
      record.title = title;

      const keyword = this.target.titleKeyword;
      if (keyword && !title.toLowerCase().includes(keyword.toLowerCase())) {
        log.warn(`Unexpected page title: ${title}`);
        return "unexpected-title";
      }

      log.info(`Successfully loaded page: ${title}`);
      return "loaded";
    } catch (err) {
      this.fail(record, log, `Failed to navigate to ${url}`, err);
      return "failed";
    }
  }

  private outputFile(run: Run, dir: string, extension: string): string {
    return path.join(dir, `${this.target.filePrefix}_${run.record.timestamp}.${extension}`);
  }

  private async saveHtml(run: Run): Promise<string | null> {
    const { page, record, dirs, log } = run;
    try {
      log.info("Saving HTML content");
      const html = await page.content();
      const file = this.outputFile(run, dirs.html, "html");
      fs.writeFileSync(file, html, "utf-8");
      record.htmlFile = file;
      log.info(`HTML saved: ${file}`);
      return html;
    } catch (err) {
      this.fail(record, log, "Failed to save HTML", err);
      return null;
    }
  }

  private async saveScreenshot(run: Run): Promise<void> {
    const { page, record, dirs, log } = run;
    try {
      log.info("Taking screenshot");
      const file = this.outputFile(run, dirs.screenshots, "png");
      await page.screenshot({ path: file, fullPage: true });
      record.screenshotFile = file;
      log.info(`Screenshot saved: ${file}`);
    } catch (err) {
      this.fail(record, log, "Failed to save screenshot", err);
    }
  }

  private async extract(run: Run, html: string | null): Promise<ExtractedItem[]> {
    const { page, record, config, log } = run;
    try {
      log.info(`Extracting ${this.itemLabel}`);
      const items = await this.target.extract({ page, html, config, log });
      log.info(`Extracted ${items.length} ${this.itemLabel}`);
      return items;
    } catch (err) {
      this.fail(record, log, `Failed to extract ${this.itemLabel}`, err);
      return [];
    }
  }

  private saveRecord(record: ScrapeRecord, dirs: OutputDirs, log: Logger): void {
    const file = path.join(dirs.json, `${this.target.filePrefix}_${record.timestamp}.json`);
    try {
      record.resultFile = file;
      fs.writeFileSync(file, JSON.stringify(record, null, 2), "utf-8");
      log.info(`Result saved: ${file}`);
    } catch (err) {
      record.resultFile = null;
      this.fail(record, log, "Failed to save result", err);
    }
  }

  private fail(record: ScrapeRecord, log: Logger, what: string, err: unknown): void {
    const msg = `${what}: ${errorMessage(err)}`;
    log.error(msg);
    record.errors.push(msg);
  }
}
