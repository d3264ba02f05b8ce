import type { Logger } from "../log.js";
import type { CookieBannerResult } from "../types.js";
import type { ScrapePage } from "./interface.js";
import { errorMessage } from "./utils.js";

export interface DismissCookieOptions {
  /** Selectors scanned in order; the first one present on the page is clicked */
  selectors?: readonly string[];
  /** Fixed wait for the banner to render before scanning. Default: 2000 */
  settleMs?: number;
  log?: Logger;
}

export const DEFAULT_COOKIE_SELECTORS: readonly string[] = [
  "button[data-testid='cookie-accept']",
  "button:has-text('Accept')",
  "button:has-text('Accept All')",
  "button:has-text('I Accept')",
  "button:has-text('OK')",
  "[data-testid='cookie-banner'] button",
  ".cookie-accept",
  "#cookie-accept",
  "button[aria-label*='Accept']",
  "button[aria-label*='Cookie']",
];

const ACCEPT_BUTTON_NAME = /accept|ok|agree|continue/i;

async function clickFirstMatch(
  page: ScrapePage,
  selectors: readonly string[],
  log: Logger | undefined
): Promise<string | null> {
  for (const selector of selectors) {
    try {
      const element = page.locator(selector);
      if ((await element.count()) > 0) {
        await element.first().click();
        return selector;
      }
    } catch (err) {
      log?.debug(`Selector ${selector} failed: ${errorMessage(err)}`);
    }
  }
  return null;
}

async function clickAcceptButtonByRole(
  page: ScrapePage,
  log: Logger | undefined
): Promise<boolean> {
  try {
    const button = page.getByRole("button", { name: ACCEPT_BUTTON_NAME });
    if ((await button.count()) > 0) {
      await button.first().click();
      return true;
    }
  } catch (err) {
    log?.debug(`Role-based approach failed: ${errorMessage(err)}`);
  }
  return false;
}

/**
 * Dismiss a cookie consent banner if one is showing.
 *
 * Waits once, then clicks the first selector that exists on the page. If none
 * match, falls back to any button whose accessible name reads like
 * "Accept"/"OK"/"Agree"/"Continue". Never throws: unexpected failures come
 * back in `error`.
 */
export async function dismissCookieBanner(
  page: ScrapePage,
  options: DismissCookieOptions = {}
): Promise<CookieBannerResult> {
  const { selectors = DEFAULT_COOKIE_SELECTORS, settleMs = 2000, log } = options;

  try {
    log?.info("Checking for cookie popup");
    await page.waitForTimeout(settleMs);

    const selector = await clickFirstMatch(page, selectors, log);
    if (selector) {
      log?.info(`Cookie popup handled with selector: ${selector}`);
      return { dismissed: true, method: "selector", selector };
    }

    if (await clickAcceptButtonByRole(page, log)) {
      log?.info("Cookie popup handled via role");
      return { dismissed: true, method: "role" };
    }

    log?.info("No cookie popup found or already handled");
    return { dismissed: false, method: "none" };
  } catch (err) {
    const message = errorMessage(err);
    log?.error(`Error handling cookie popup: ${message}`);
    return { dismissed: false, method: "none", error: message };
  }
}
