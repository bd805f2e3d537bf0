import * as cheerio from "cheerio";
import { hasChildren, isText, type AnyNode } from "domhandler";
import { normalizeLink } from "./crawl.js";

/** Markup that never carries page content worth keeping. */
export const STRIPPED_TAGS = [
  "script",
  "style",
  "nav",
  "footer",
  "aside",
  "form",
  "s",
  "a",
] as const;

/** Lines of this many code points or fewer are treated as menu/boilerplate noise. */
export const MIN_LINE_LENGTH = 30;

function collectText(nodes: readonly AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) out.push(text);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

export function extractImportantText(html: string): string {
  const $ = cheerio.load(html);
  $(STRIPPED_TAGS.join(",")).remove();

  const fragments: string[] = [];
  collectText($.root().toArray(), fragments);

  return fragments
    .join("\n")
    .split(/\r\n|\r|\n/)
    .filter((line) => [...line].length > MIN_LINE_LENGTH)
    .join("\n");
}

/**
 * Absolute links of the anchors a crawler may follow, in document order.
 */
export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const anchor = $(element);
    const raw = (anchor.attr("href") ?? "").trim();
    if (!raw) return;
    if (/^(?:mailto|tel|javascript):/i.test(raw)) return;
    if (anchor.attr("download") !== undefined) return;

    const rel = (anchor.attr("rel") ?? "").toLowerCase();
    if (rel.split(/\s+/).includes("nofollow")) return;

    const normalized = normalizeLink(raw, baseUrl);
    if (!normalized || seen.has(normalized)) return;

    seen.add(normalized);
    links.push(normalized);
  });

  return links;
}
