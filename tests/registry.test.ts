import { describe, it, expect } from "vitest";
import { scraperRegistry } from "../src/scrapers/registry.js";

describe("scraperRegistry", () => {
  it("registers the three homepage scrapers", () => {
    expect(Object.keys(scraperRegistry).sort()).toEqual(["demo", "example", "zara"]);
  });

  it("builds scrapers whose name matches their key", () => {
    for (const [key, factory] of Object.entries(scraperRegistry)) {
      expect(factory().name).toBe(key);
    }
  });

  it("labels what each scraper extracts", () => {
    expect(scraperRegistry.demo().itemLabel).toBe("headings");
    expect(scraperRegistry.example().itemLabel).toBe("headings");
    expect(scraperRegistry.zara().itemLabel).toBe("banners");
  });
});
