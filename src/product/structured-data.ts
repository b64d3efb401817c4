import * as cheerio from "cheerio";
import { ParseError } from "../core/errors";

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value == null) return [];
  return Array.isArray(value) ? value : [value];
}

/** Result of reading every JSON-LD block of a page */
export interface StructuredData {
  /** First node typed Product / ProductGroup, if any */
  product: JsonObject | null;
  /** One entry per block that failed to parse */
  issues: ParseError[];
}

/**
 * Parse every `application/ld+json` block on the page. Malformed blocks are
 * reported as issues and skipped; the remaining blocks are still used.
 */
export function readStructuredData($: cheerio.CheerioAPI): StructuredData {
  const nodes: JsonObject[] = [];
  const issues: ParseError[] = [];

  $('script[type="application/ld+json"]').each((index, el) => {
    const raw = ($(el).html() ?? "").trim();
    if (!raw) return;
    try {
      flatten(JSON.parse(raw), nodes);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      issues.push(
        new ParseError(`json-ld#${index + 1}`, `Malformed JSON-LD block: ${reason}`)
      );
    }
  });

  return { product: findProductNode(nodes), issues };
}

function flatten(node: unknown, out: JsonObject[]): void {
  if (Array.isArray(node)) {
    for (const child of node) flatten(child, out);
    return;
  }
  if (!isJsonObject(node)) return;
  out.push(node);
  if (node["@graph"]) flatten(node["@graph"], out);
}

function findProductNode(nodes: JsonObject[]): JsonObject | null {
  for (const node of nodes) {
    const types = asArray(node["@type"]);
    if (types.some((t) => t === "Product" || t === "ProductGroup")) {
      return node;
    }
  }
  return null;
}

/** Read a scalar (string or number) as a trimmed string */
export function scalar(value: unknown): string | null {
  if (typeof value === "string") return value.trim() || null;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/** The product's first offer; `offers` may be an object or an array */
export function firstOffer(product: JsonObject): JsonObject | null {
  const offer = asArray(product.offers).find(isJsonObject);
  return offer ?? null;
}

/** Text of a `brand`-like property: plain string or `{ name }` */
export function namedValue(value: unknown): string | null {
  const direct = scalar(value);
  if (direct) return direct;
  if (isJsonObject(value)) return scalar(value.name);
  return null;
}

/** URLs from an `image` property: string, `ImageObject`, or array of either */
export function imageList(value: unknown): string[] {
  const urls: string[] = [];
  for (const item of asArray(value)) {
    if (typeof item === "string") {
      if (item.trim()) urls.push(item.trim());
    } else if (isJsonObject(item)) {
      const url = scalar(item.url) ?? scalar(item.contentUrl);
      if (url) urls.push(url);
    }
  }
  return urls;
}
