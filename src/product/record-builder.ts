import * as crypto from "crypto";
import * as cheerio from "cheerio";
import { ValidationError } from "../core/errors";
import { ProductRecord } from "../types";
import { FieldName, FieldResolution, FieldValues } from "./field-resolver";
import { CrawlSession } from "./session";
import { canonicalUrl, stripQuery } from "./urls";

export const UNCATEGORIZED = "Uncategorized";

/** Field values handed to the builder; null means unresolved */
export type RawFields = { [K in FieldName]: FieldValues[K] | null };

/** Category attribution of a product, taken from the seed it was found under */
export interface Placement {
  category: string;
  subcategory: string;
}

export type RecordOutcome =
  | { status: "recorded"; product: ProductRecord }
  | { status: "duplicate"; product: ProductRecord }
  | { status: "rejected"; error: ValidationError };

/** Currency symbol or ISO code; a cent sign is a unit, not a currency */
const CURRENCY = String.raw`(?:[$€£¥₹₩₽]|[A-Z]{3})`;

/**
 * A number with at most a currency token before or after it, e.g. "$19.99",
 * "770 €" or "EUR 12,50". Anything carrying a unit ("/lb", "per oz") fails.
 */
const DECIMAL_LIKE = new RegExp(String.raw`^(?:${CURRENCY}\s?)?\d[\d\s.,]*(?:\s?${CURRENCY})?$`, "u");

export function fieldValues(resolution: FieldResolution): RawFields {
  return {
    title: resolution.title.value,
    price: resolution.price.value,
    unitPrice: resolution.unitPrice.value,
    description: resolution.description.value,
    brand: resolution.brand.value,
    sku: resolution.sku.value,
    url: resolution.url.value,
    imageUrls: resolution.imageUrls.value,
  };
}

/**
 * Remove tags and decode entities left in text (JSON-LD descriptions often
 * carry HTML), then collapse whitespace.
 */
export function cleanText(raw: string | null): string | null {
  if (raw == null) return null;
  const text = raw.includes("<") || raw.includes("&")
    ? cheerio.load(raw, null, false).root().text()
    : raw;
  const cleaned = text.replace(/\s+/g, " ").trim();
  return cleaned || null;
}

interface DecimalParts {
  integer: string;
  fraction: string;
}

/**
 * Split the digits of a price into integer and fraction. A separator
 * followed by three digits is only a decimal point after a zero integer
 * ("0.125"); otherwise it must be part of a consistent thousands grouping.
 * Returns null when the reading is ambiguous ("1.299", "1,250").
 */
function decimalParts(raw: string): DecimalParts | null {
  const s = raw.replace(/[^\d.,]/g, "");
  if (!/^\d/.test(s) || !/\d$/.test(s)) return null;

  const last = s.search(/[.,]\d*$/);
  if (last === -1) return { integer: s, fraction: "" };

  const sep = s[last];
  const head = s.slice(0, last);
  const tail = s.slice(last + 1);
  const groupSeps = new Set(head.replace(/\d/g, ""));

  if (groupSeps.size === 0) {
    if (tail.length <= 2 || /^0+$/.test(head)) return { integer: head, fraction: tail };
    return null;
  }
  if (groupSeps.size > 1) return null;

  const [groupSep] = [...groupSeps];
  const grouped = new RegExp(`^\\d{1,3}(?:\\${groupSep}\\d{3})+$`);
  if (groupSep === sep) {
    // every separator is a thousands separator: "1,250,000"
    return grouped.test(s) ? { integer: s.replace(/[.,]/g, ""), fraction: "" } : null;
  }
  if (!grouped.test(head) || tail.length > 2) return null;
  return { integer: head.replace(/[.,]/g, ""), fraction: tail };
}

function formatDecimal({ integer, fraction }: DecimalParts): string {
  return `${integer.replace(/^0+(?=\d)/, "")}.${fraction.padEnd(2, "0")}`;
}

/**
 * Parse a price string like "$1,250.00", "770 €" or "1 250,00 €" into a
 * number; null when it holds no number or the separators are ambiguous.
 */
export function parsePrice(raw: string): number | null {
  const parts = decimalParts(raw);
  return parts ? Number(formatDecimal(parts)) : null;
}

/**
 * Decimal-like prices become a string with at least two decimals; anything
 * else (e.g. "$0.25 per oz", "$2.49/lb", "$1.299") is kept as cleaned raw
 * text rather than dropped.
 */
export function normalizePrice(raw: string | null): string | null {
  const cleaned = cleanText(raw);
  if (cleaned == null) return null;
  if (DECIMAL_LIKE.test(cleaned)) {
    const parts = decimalParts(cleaned);
    if (parts) return formatDecimal(parts);
  }
  return cleaned;
}

/**
 * Turn a subcategory name into a single safe directory name. Empty input
 * falls back to "Uncategorized".
 */
export function sanitizeSegment(name: string | null | undefined): string {
  const safe = (name ?? "")
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{N} _-]/gu, "_")
    .trim()
    .slice(0, 120)
    .trim();
  return safe || UNCATEGORIZED;
}

/**
 * Stable dedup key: SHA-1 over the lowercased, whitespace-collapsed title and
 * the canonical URL, truncated to 16 hex characters.
 */
export function deriveIdentity(title: string, url: string): string {
  const normalizedTitle = title.replace(/\s+/g, " ").trim().toLowerCase();
  return crypto
    .createHash("sha1")
    .update(`${normalizedTitle}\n${canonicalUrl(url)}`)
    .digest("hex")
    .slice(0, 16);
}

/** Validate and normalize resolved fields into a product record */
export function buildProduct(
  fields: RawFields,
  placement: Placement,
  pageUrl: string
): { ok: true; product: ProductRecord } | { ok: false; error: ValidationError } {
  const title = cleanText(fields.title);
  const url = fields.url ? canonicalUrl(fields.url) : "";

  const missing: string[] = [];
  if (!title) missing.push("title");
  if (!url) missing.push("url");
  if (!title || !url) {
    return { ok: false, error: new ValidationError(pageUrl, missing) };
  }

  const imageUrls: string[] = [];
  for (const imageUrl of fields.imageUrls ?? []) {
    const clean = stripQuery(imageUrl.trim());
    if (clean && !imageUrls.includes(clean)) imageUrls.push(clean);
  }

  return {
    ok: true,
    product: {
      identity: deriveIdentity(title, url),
      title,
      price: normalizePrice(fields.price),
      unitPrice: normalizePrice(fields.unitPrice),
      description: cleanText(fields.description),
      brand: cleanText(fields.brand),
      sku: cleanText(fields.sku),
      category: cleanText(placement.category) ?? UNCATEGORIZED,
      subcategory: sanitizeSegment(placement.subcategory),
      url,
      imageUrls,
    },
  };
}

/**
 * Build a record and add it to the session. A product whose identity was
 * already recorded is reported as a duplicate and not stored.
 */
export function recordProduct(
  session: CrawlSession,
  fields: RawFields,
  placement: Placement,
  pageUrl: string
): RecordOutcome {
  const built = buildProduct(fields, placement, pageUrl);
  if (!built.ok) return { status: "rejected", error: built.error };

  if (!session.add(built.product)) {
    session.recordDuplicate();
    return { status: "duplicate", product: built.product };
  }
  return { status: "recorded", product: built.product };
}
