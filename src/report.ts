import { isHeading, type CookieBannerResult, type ExtractedItem, type ScrapeRecord } from "./types.js";
import { truncate } from "./scrapers/utils.js";

const RULE = "=".repeat(50);
const PREVIEW_COUNT = 5;

export interface SummaryLabels {
  displayName: string;
  itemLabel: string;
}

function describeCookieBanner(result: CookieBannerResult | null): string {
  if (!result || !result.dismissed) return "not found";
  if (result.method === "selector" && result.selector) {
    return `dismissed via ${result.selector}`;
  }
  return `dismissed via ${result.method}`;
}

function describeItem(item: ExtractedItem): string {
  if (isHeading(item)) {
    return `  [${item.index}] ${item.type}: ${truncate(item.text)}`;
  }
  return `  [${item.index}] ${truncate(item.text)} -> ${truncate(item.href)}`;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/** Plain-text run summary, one entry per line. */
export function renderSummary(record: ScrapeRecord, labels: SummaryLabels): string[] {
  const lines = [
    RULE,
    `${labels.displayName.toUpperCase()} SCRAPING SUMMARY`,
    RULE,
    `Success: ${record.success ? "Yes" : "No"}`,
    `Timestamp: ${record.timestamp}`,
    `URL: ${record.url}`,
    `Page Title: ${record.title ?? "N/A"}`,
    `HTML File: ${record.htmlFile ?? "Not saved"}`,
    `Screenshot: ${record.screenshotFile ?? "Not saved"}`,
    `Result File: ${record.resultFile ?? "Not saved"}`,
    `Cookie Banner: ${describeCookieBanner(record.cookieBanner)}`,
    `${capitalize(labels.itemLabel)} Found: ${record.itemsFound}`,
    `Errors: ${record.errors.length}`,
  ];

  if (record.items.length > 0) {
    lines.push("", `${capitalize(labels.itemLabel)}:`);
    for (const item of record.items.slice(0, PREVIEW_COUNT)) {
      lines.push(describeItem(item));
    }
    if (record.items.length > PREVIEW_COUNT) {
      lines.push(`  ... and ${record.items.length - PREVIEW_COUNT} more`);
    }
  }

  if (record.errors.length > 0) {
    lines.push("", "ERRORS:");
    for (const error of record.errors) {
      lines.push(`  • ${error}`);
    }
  }

  return lines;
}
