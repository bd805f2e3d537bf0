export const NON_CONTENT_EXTENSION =
  /\.(?:pdf|docx?|xlsx?|pptx?|zip|rar|7z|tar|gz|bz2|mp[34]|m4a|wav|ogg|mov|avi|webm|png|jpe?g|gif|webp|svg|ico|css|js|map|json|xml|rss|atom|woff2?|ttf|otf|eot)$/i;

/**
 * Resolve `raw` against `baseUrl` and normalize it for dedupe.
 *
 * Returns null for anything that is not an http(s) URL. Fragments are dropped.
 */
export function normalizeLink(raw: string, baseUrl?: string): string | null {
  let parsed: URL;
  try {
    parsed = baseUrl === undefined ? new URL(raw) : new URL(raw, baseUrl);
  } catch {
    return null;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;

  parsed.hash = "";
  return parsed.href;
}

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^\.+/, "").replace(/\.+$/, "");
}

/**
 * True when the URL's host is one of `allowedDomains` or a subdomain of one.
 * An empty allow-list puts every host in scope.
 */
export function isAllowedDomain(
  url: string,
  allowedDomains: readonly string[]
): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }

  const domains = allowedDomains.map(normalizeDomain).filter(Boolean);
  if (domains.length === 0) return true;

  return domains.some(
    (domain) => hostname === domain || hostname.endsWith(`.${domain}`)
  );
}

export interface SelectLinksArgs {
  candidates: Iterable<string>;
  allowedDomains: readonly string[];
  seen: ReadonlySet<string>;
}

/**
 * Select which links we should crawl next.
 *
 * - Only http(s)
 * - Only hosts in scope
 * - Skips files that are not pages (documents, media, assets, feeds)
 * - Drops fragment-only differences and anything already seen
 */
export function selectLinksToFollow({
  candidates,
  allowedDomains,
  seen,
}: SelectLinksArgs): string[] {
  const selected: string[] = [];
  const picked = new Set<string>();

  for (const candidate of candidates) {
    const normalized = normalizeLink(candidate);
    if (!normalized) continue;
    if (seen.has(normalized) || picked.has(normalized)) continue;
    if (!isAllowedDomain(normalized, allowedDomains)) continue;
    if (NON_CONTENT_EXTENSION.test(new URL(normalized).pathname)) continue;

    picked.add(normalized);
    selected.push(normalized);
  }

  return selected;
}
