import { load } from "cheerio";
import type { Logger } from "../log.js";
import { HEADING_TAGS, type ExtractedHeading, type HeadingTag, type HeroBanner } from "../types.js";
import type { ScrapePage } from "./interface.js";
import { errorMessage, normalizeText } from "./utils.js";

const HEADING_SELECTOR = "h1, h2, h3, h4, h5, h6";

export const BANNER_LINK_SELECTOR = "a:visible";
export const BANNER_LINK_TEXT = "SHOP";

function toHeadingTag(tagName: string): HeadingTag | undefined {
  const lower = tagName.toLowerCase();
  return HEADING_TAGS.find((tag) => tag === lower);
}

/**
 * Headings (h1-h6) in document order. `index` counts every heading, so
 * skipped empty ones leave gaps.
 */
export function extractHeadings(html: string): ExtractedHeading[] {
  const $ = load(html);
  const headings: ExtractedHeading[] = [];

  $(HEADING_SELECTOR).each((index, element) => {
    const node = $(element);
    // <br> renders as a line break; textContent would glue the words together
    node.find("br").replaceWith(" ");
    const type = toHeadingTag(node.prop("tagName") ?? "");
    const text = normalizeText(node.text());
    if (type && text) {
      headings.push({ type, text, index });
    }
  });

  return headings;
}

/**
 * Promotional links on a rendered homepage: visible anchors whose text
 * contains "SHOP". Only the first `maxItems` candidates are inspected.
 */
export async function extractHeroBanners(
  page: ScrapePage,
  maxItems: number,
  log?: Logger
): Promise<HeroBanner[]> {
  await page.waitForLoadState("networkidle");

  const locator = page
    .locator(BANNER_LINK_SELECTOR)
    .filter({ hasText: BANNER_LINK_TEXT });
  const count = await locator.count();
  log?.info(`Found ${count} potential banner elements`);

  const banners: HeroBanner[] = [];
  for (let i = 0; i < Math.min(count, maxItems); i++) {
    try {
      const element = locator.nth(i);
      const href = await element.getAttribute("href");
      const text = (await element.innerText()).trim();
      if (href && text) {
        banners.push({ text, href, index: i });
      }
    } catch (err) {
      log?.debug(`Error extracting banner ${i}: ${errorMessage(err)}`);
    }
  }

  return banners;
}
