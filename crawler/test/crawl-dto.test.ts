import { describe, expect, it } from "vitest";
import {
  crawlRequestSchema,
  toCrawlJob,
  toCrawlResponseDto,
} from "../src/dto/crawl.dto.js";

describe("crawlRequestSchema", () => {
  it("trims URLs and defaults the allow-list to empty", () => {
    const parsed = crawlRequestSchema.parse({ start_urls: ["  http://example.test/  "] });

    expect(parsed).toEqual({ start_urls: ["http://example.test/"], allowed_domains: [] });
  });

  it("requires at least one start URL", () => {
    const parsed = crawlRequestSchema.safeParse({ start_urls: [] });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(parsed.error.issues[0].message).toBe("start_urls must contain at least one URL");
    }
  });

  it("rejects values that are not URLs", () => {
    expect(crawlRequestSchema.safeParse({ start_urls: ["example.test"] }).success).toBe(false);
  });
});

describe("toCrawlJob", () => {
  it("drops duplicate entries", () => {
    expect(
      toCrawlJob({
        start_urls: ["http://example.test/", "http://example.test/"],
        allowed_domains: ["example.test", "example.test"],
      })
    ).toEqual({ startUrls: ["http://example.test/"], allowedDomains: ["example.test"] });
  });
});

describe("toCrawlResponseDto", () => {
  it("exposes page text under html and omits an absent message", () => {
    expect(
      toCrawlResponseDto({
        status: "finished",
        results: [{ url: "http://example.test/", text: "body text" }],
      })
    ).toEqual({
      status: "finished",
      results: [{ url: "http://example.test/", html: "body text" }],
    });
  });

  it("keeps the message of a failed crawl", () => {
    expect(
      toCrawlResponseDto({ status: "error", message: "boom", results: [] })
    ).toEqual({ status: "error", message: "boom", results: [] });
  });
});
