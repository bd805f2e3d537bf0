import { describe, expect, it } from "vitest";
import {
  isAllowedDomain,
  normalizeLink,
  selectLinksToFollow,
} from "../src/lib/crawl.js";

describe("normalizeLink", () => {
  it("resolves relative links and drops fragments", () => {
    expect(normalizeLink("../c?q=1#top", "https://example.com/a/b")).toBe(
      "https://example.com/c?q=1"
    );
  });

  it("rejects non-http(s) and invalid URLs", () => {
    expect(normalizeLink("ftp://example.com/file")).toBeNull();
    expect(normalizeLink("mailto:test@example.com")).toBeNull();
    expect(normalizeLink("not a url")).toBeNull();
  });
});

describe("isAllowedDomain", () => {
  it("matches the domain and its subdomains", () => {
    expect(isAllowedDomain("http://example.test/a", ["example.test"])).toBe(true);
    expect(isAllowedDomain("http://www.example.test/a", ["example.test"])).toBe(true);
    expect(isAllowedDomain("http://badexample.test/a", ["example.test"])).toBe(false);
    expect(isAllowedDomain("http://other.test/x", ["example.test"])).toBe(false);
  });

  it("ignores case and leading dots", () => {
    expect(isAllowedDomain("http://EXAMPLE.test/", [".Example.TEST"])).toBe(true);
  });

  it("allows every host when the list is empty", () => {
    expect(isAllowedDomain("https://anywhere.test/", [])).toBe(true);
  });
});

describe("selectLinksToFollow", () => {
  it("keeps only unseen in-scope pages", () => {
    const out = selectLinksToFollow({
      candidates: [
        "http://example.test/posts",
        "http://other.test/x",
        "mailto:test@example.test",
        "http://example.test/files/report.pdf",
        "http://example.test/posts#two",
        "http://example.test/seen",
      ],
      allowedDomains: ["example.test"],
      seen: new Set(["http://example.test/seen"]),
    });

    expect(out).toEqual(["http://example.test/posts"]);
  });
});
