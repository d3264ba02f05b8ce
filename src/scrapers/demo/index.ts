import { extractHeadings } from "../extract.js";
import type { ScrapeTarget } from "../interface.js";
import { HomepageScraper, type HomepageScraperOptions } from "../pipeline.js";

// httpbin's static HTML page: always up, never blocks automation
export const demoTarget: ScrapeTarget = {
  name: "demo",
  displayName: "Demo",
  urls: ["https://httpbin.org/html"],
  outputSubdir: "demo_scrapes",
  filePrefix: "demo_page",
  itemLabel: "headings",
  async extract({ page, html }) {
    await page.waitForLoadState("networkidle");
    return extractHeadings(html ?? (await page.content()));
  },
};

export class DemoScraper extends HomepageScraper {
  constructor(options?: HomepageScraperOptions) {
    super(demoTarget, options);
  }
}
