import { loadGlobalConfig, loadScraperConfig, type Env } from "./config.js";
import { renderSummary } from "./report.js";
import { scraperRegistry, type ScraperRegistry } from "./scrapers/registry.js";
import { errorMessage } from "./scrapers/utils.js";

/**
 * Run one scraper picked from `argv[0]`, then `SCRAPER`, then "demo".
 * Resolves to the process exit code: 0 only when the page loaded.
 */
export async function run(
  argv: readonly string[],
  env: Env,
  registry: ScraperRegistry = scraperRegistry
): Promise<number> {
  const name = (argv[0] || env.SCRAPER || "demo").trim().toLowerCase();
  const factory = registry[name];
  if (!factory) {
    console.error(`Unknown scraper: "${name}"`);
    console.error(`Available: ${Object.keys(registry).join(", ")}`);
    return 1;
  }

  const scraper = factory();
  console.log(`=== ${scraper.displayName} Homepage Scraper ===\n`);

  try {
    const record = await scraper.scrape(loadScraperConfig(name, loadGlobalConfig(env), env));
    console.log("");
    for (const line of renderSummary(record, scraper)) {
      console.log(line);
    }
    return record.success ? 0 : 1;
  } catch (err) {
    console.error(`Scraper failed: ${errorMessage(err)}`);
    return 1;
  }
}
