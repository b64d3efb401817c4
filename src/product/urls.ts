/**
 * Resolve `href` against the page it was found on.
 * Protocol-relative URLs get https. Returns "" when the result is not http(s).
 */
export function makeAbsolute(href: string, baseUrl: string): string {
  const trimmed = href.trim();
  if (!trimmed) return "";
  try {
    const url = new URL(trimmed.startsWith("//") ? `https:${trimmed}` : trimmed, baseUrl);
    if (url.protocol !== "http:" && url.protocol !== "https:") return "";
    return url.href;
  } catch {
    return "";
  }
}

/** Drop query string and fragment */
export function stripQuery(url: string): string {
  return url.split(/[?#]/)[0];
}

/**
 * Canonical form used for identity: no query or fragment, lowercase host,
 * no trailing slash. Unparsable input is returned trimmed.
 */
export function canonicalUrl(raw: string): string {
  try {
    const url = new URL(raw.trim());
    const canonical = `${url.protocol}//${url.host}${url.pathname}`;
    return canonical.endsWith("/") ? canonical.slice(0, -1) : canonical;
  } catch {
    return raw.trim();
  }
}

/** Absolute, query-free, de-duplicated URLs in their original order */
export function normalizeUrlList(urls: string[], baseUrl: string): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const href of urls) {
    const absolute = stripQuery(makeAbsolute(href, baseUrl));
    if (absolute && !seen.has(absolute)) {
      seen.add(absolute);
      out.push(absolute);
    }
  }
  return out;
}
