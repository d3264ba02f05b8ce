import { extractHeroBanners } from "../extract.js";
import type { ScrapeTarget } from "../interface.js";
import { HomepageScraper, type HomepageScraperOptions } from "../pipeline.js";
import { DEFAULT_COOKIE_SELECTORS } from "../popup-guard.js";

export const ZARA_URLS = [
  "https://www.zara.com/us/en/",
  "https://www.zara.com/",
  "https://www.zara.com/us/",
  "https://www.zara.com/en/",
];

export const zaraTarget: ScrapeTarget = {
  name: "zara",
  displayName: "Zara",
  urls: ZARA_URLS,
  outputSubdir: "scrapes",
  filePrefix: "zara_homepage",
  itemLabel: "banners",
  cookieSelectors: DEFAULT_COOKIE_SELECTORS,
  // Bot walls and geo-redirect pages load fine but carry a different title
  titleKeyword: "zara",
  extract({ page, config, log }) {
    return extractHeroBanners(page, config.maxItems, log);
  },
};

export class ZaraScraper extends HomepageScraper {
  constructor(options?: HomepageScraperOptions) {
    super(zaraTarget, options);
  }
}
