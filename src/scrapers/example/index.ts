import { extractHeadings } from "../extract.js";
import type { ScrapeTarget } from "../interface.js";
import { HomepageScraper, type HomepageScraperOptions } from "../pipeline.js";

export const exampleTarget: ScrapeTarget = {
  name: "example",
  displayName: "Example.com",
  urls: ["https://example.com"],
  outputSubdir: "test_scrapes",
  filePrefix: "test_page",
  itemLabel: "headings",
  async extract({ page, html }) {
    await page.waitForLoadState("networkidle");
    return extractHeadings(html ?? (await page.content()));
  },
};

export class ExampleScraper extends HomepageScraper {
  constructor(options?: HomepageScraperOptions) {
    super(exampleTarget, options);
  }
}
