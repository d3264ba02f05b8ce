export const HEADING_TAGS = ["h1", "h2", "h3", "h4", "h5", "h6"] as const;
export type HeadingTag = (typeof HEADING_TAGS)[number];

export interface ExtractedHeading {
  type: HeadingTag;
  text: string;
  index: number; // position among all headings on the page, empty ones included
}

export interface HeroBanner {
  text: string;
  href: string;
  index: number; // position among the matched link candidates
}

export type ExtractedItem = ExtractedHeading | HeroBanner;

export interface CookieBannerResult {
  dismissed: boolean;
  method: "selector" | "role" | "none";
  selector?: string;
  error?: string;
}

/** Mutable result of one scrape run; filled in step by step, then printed and saved. */
export interface ScrapeRecord {
  scraper: string;
  timestamp: string; // YYYYMMDD_HHMMSS
  url: string;
  locale: string;
  success: boolean;
  title: string | null;
  htmlFile: string | null;
  screenshotFile: string | null;
  resultFile: string | null;
  cookieBanner: CookieBannerResult | null;
  itemsFound: number;
  items: ExtractedItem[];
  errors: string[];
}

export function isHeading(item: ExtractedItem): item is ExtractedHeading {
  return "type" in item;
}
