import type { Scraper } from "./interface.js";
import { DemoScraper } from "./demo/index.js";
import { ExampleScraper } from "./example/index.js";
import { ZaraScraper } from "./zara/index.js";

export type ScraperRegistry = Record<string, () => Scraper>;

export const scraperRegistry: ScraperRegistry = {
  demo: () => new DemoScraper(),
  example: () => new ExampleScraper(),
  zara: () => new ZaraScraper(),
};
