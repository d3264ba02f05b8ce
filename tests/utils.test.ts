import { describe, it, expect } from "vitest";
import {
  errorMessage,
  formatLogTime,
  formatTimestamp,
  normalizeText,
  truncate,
} from "../src/scrapers/utils.js";

describe("formatTimestamp", () => {
  it("zero-pads every field", () => {
    expect(formatTimestamp(new Date(2025, 0, 5, 9, 3, 7))).toBe("20250105_090307");
  });

  it("uses local time", () => {
    expect(formatTimestamp(new Date(2025, 11, 31, 23, 59, 59))).toBe("20251231_235959");
  });
});

describe("formatLogTime", () => {
  it("formats as YYYY-MM-DD HH:mm:ss", () => {
    expect(formatLogTime(new Date(2025, 2, 14, 9, 5, 30))).toBe("2025-03-14 09:05:30");
  });
});

describe("truncate", () => {
  it("leaves text of exactly the limit alone", () => {
    const text = "x".repeat(50);
    expect(truncate(text)).toBe(text);
  });

  it("cuts longer text and appends an ellipsis", () => {
    expect(truncate("y".repeat(51))).toBe(`${"y".repeat(50)}...`);
  });

  it("honours a custom limit", () => {
    expect(truncate("abcdef", 3)).toBe("abc...");
  });
});

describe("errorMessage", () => {
  it("unwraps Error instances", () => {
    expect(errorMessage(new Error("net::ERR_TIMED_OUT"))).toBe("net::ERR_TIMED_OUT");
  });

  it("stringifies anything else", () => {
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("normalizeText", () => {
  it("collapses whitespace runs and trims", () => {
    expect(normalizeText("\n  New  In\t\tStore  \n")).toBe("New In Store");
  });
});
