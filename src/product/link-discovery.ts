import * as cheerio from "cheerio";
import { canonicalUrl, makeAbsolute, stripQuery } from "./urls";

/**
 * Collect product-detail links from a category listing, in page order.
 * Links are made absolute, stripped of query/fragment and de-duplicated
 * within the page by canonical URL, so a trailing slash or host case does not
 * queue the same page twice; the listing itself is never returned.
 */
export function discoverProductLinks(
  $: cheerio.CheerioAPI,
  pageUrl: string,
  productPattern: RegExp
): string[] {
  const self = canonicalUrl(pageUrl);
  const seen = new Set<string>();
  const links: string[] = [];

  $("a[href]").each((_, el) => {
    const href = $(el).attr("href") ?? "";
    if (!href || href.startsWith("#") || href.startsWith("mailto:") || href.startsWith("tel:")) {
      return;
    }
    const absolute = stripQuery(makeAbsolute(href, pageUrl));
    if (!absolute || !productPattern.test(absolute)) return;
    const key = canonicalUrl(absolute);
    if (key === self || seen.has(key)) return;
    seen.add(key);
    links.push(absolute);
  });

  return links;
}

/**
 * Human name of a category page: its heading, otherwise the last URL path
 * segment that reads like a word ("thanksgiving-desserts" rather than "257").
 * Returns "" when neither is available.
 */
export function categoryName($: cheerio.CheerioAPI, pageUrl: string): string {
  const heading = ($("h1").first().text() || $(".page-title").first().text())
    .replace(/\s+/g, " ")
    .trim();
  if (heading) return heading;

  let segments: string[];
  try {
    segments = new URL(pageUrl).pathname.split("/").filter(Boolean);
  } catch {
    return "";
  }
  const named = segments.filter((s) => /[a-z]/i.test(s) && s.length > 1);
  const last = named[named.length - 1] ?? segments[segments.length - 1] ?? "";
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}
