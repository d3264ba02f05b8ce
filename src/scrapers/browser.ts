import { chromium, type Browser, type BrowserContext, type Page } from "playwright";
import type { BrowserHandle, PageEventHandlers, ScraperConfig } from "./interface.js";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--disable-web-security",
  "--disable-features=VizDisplayCompositor",
  "--disable-blink-features=AutomationControlled",
];

export interface BrowserSession extends BrowserHandle {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

export async function launchBrowser(
  config: ScraperConfig,
  handlers: PageEventHandlers
): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: config.headless,
    slowMo: config.slowMo,
    args: LAUNCH_ARGS,
  });

  let context: BrowserContext;
  let page: Page;
  try {
    context = await browser.newContext({
      locale: config.locale,
      userAgent: USER_AGENT,
      viewport: { width: 1920, height: 1080 },
    });
    page = await context.newPage();
  } catch (err) {
    await browser.close();
    throw err;
  }

  page.on("pageerror", (error) => handlers.onPageError(error.message));
  page.on("requestfailed", (request) =>
    handlers.onRequestFailed(
      request.url(),
      request.failure()?.errorText ?? "Unknown error"
    )
  );

  return {
    browser,
    context,
    page,
    async close() {
      await context.close();
      await browser.close();
    },
  };
}
