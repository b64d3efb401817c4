import * as cheerio from "cheerio";
import { ParseError } from "../core/errors";
import { Logger } from "../types";
import {
  JsonObject,
  firstOffer,
  imageList,
  isJsonObject,
  namedValue,
  readStructuredData,
  scalar,
} from "./structured-data";
import { makeAbsolute, normalizeUrlList } from "./urls";

/** Which tier produced a field value */
export type Provenance = "structured" | "fallback";

/** Field values as they come off the page, before normalization */
export interface FieldValues {
  title: string;
  price: string;
  unitPrice: string;
  description: string;
  brand: string;
  sku: string;
  url: string;
  imageUrls: string[];
}

export type FieldName = keyof FieldValues;

export interface ExtractionContext {
  $: cheerio.CheerioAPI;
  /** Product node from JSON-LD, null when absent or unparsable */
  product: JsonObject | null;
  pageUrl: string;
}

/** One way of reading one field. Returning null or an empty value defers to the next strategy. */
export interface FieldStrategy<T> {
  name: string;
  source: Provenance;
  extract(ctx: ExtractionContext): T | null;
}

/** Ranked strategies per field, tried first to last */
export type StrategyTable = { [K in FieldName]: FieldStrategy<FieldValues[K]>[] };

export interface ResolvedField<T> {
  value: T | null;
  provenance: Provenance | null;
  strategy: string | null;
}

export type FieldResolution = { [K in FieldName]: ResolvedField<FieldValues[K]> };

export interface PageResolution {
  fields: FieldResolution;
  issues: ParseError[];
}

const IMAGE_LINK_PATTERN = /\.(jpe?g|png|webp|gif)(\?|#|$)/i;

function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// ── Strategy builders ───────────────────────────────────────────────

function structured<T>(
  name: string,
  read: (product: JsonObject, ctx: ExtractionContext) => T | null
): FieldStrategy<T> {
  return {
    name,
    source: "structured",
    extract: (ctx) => (ctx.product ? read(ctx.product, ctx) : null),
  };
}

function markup<T>(
  name: string,
  extract: (ctx: ExtractionContext) => T | null
): FieldStrategy<T> {
  return { name, source: "fallback", extract };
}

/** Text of the first element matching `selector` */
function textOf(selector: string): FieldStrategy<string> {
  return markup(selector, ({ $ }) => cleanText($(selector).first().text()) || null);
}

/** Attribute of the first element matching `selector` */
function attrOf(selector: string, attr: string): FieldStrategy<string> {
  return markup(`${selector}@${attr}`, ({ $ }) => {
    const value = $(selector).first().attr(attr);
    return value ? cleanText(value) || null : null;
  });
}

/** Lazy-loading pages keep the real address in a data attribute */
function imageSource(attr: (name: string) => string | undefined): string {
  return (
    attr("src") ||
    attr("data-src") ||
    attr("data-lazy-src") ||
    attr("content") ||
    ""
  ).trim();
}

function imagesFrom(selector: string): FieldStrategy<string[]> {
  return markup(selector, ({ $, pageUrl }) => {
    const found: string[] = [];
    $(selector).each((_, el) => {
      const src = imageSource((name) => $(el).attr(name));
      if (src) found.push(src);
    });
    return normalizeUrlList(found, pageUrl);
  });
}

// ── Structured readers ──────────────────────────────────────────────

function offerPrice(product: JsonObject): string | null {
  const offer = firstOffer(product);
  if (!offer) return null;
  return scalar(offer.price) ?? scalar(offer.lowPrice);
}

function offerUnitPrice(product: JsonObject): string | null {
  const offer = firstOffer(product);
  if (!offer) return null;
  const specs: unknown[] = Array.isArray(offer.priceSpecification)
    ? offer.priceSpecification
    : [offer.priceSpecification];
  for (const spec of specs) {
    if (!isJsonObject(spec)) continue;
    const isUnit =
      spec["@type"] === "UnitPriceSpecification" || isJsonObject(spec.referenceQuantity);
    const price = scalar(spec.price);
    if (!isUnit || !price) continue;
    const unit = isJsonObject(spec.referenceQuantity)
      ? scalar(spec.referenceQuantity.unitText) ?? scalar(spec.referenceQuantity.unitCode)
      : null;
    return unit ? `${price} per ${unit}` : price;
  }
  return null;
}

// ── Default table ───────────────────────────────────────────────────

export const DEFAULT_STRATEGIES: StrategyTable = {
  title: [
    structured("json-ld:name", (p) => scalar(p.name)),
    textOf("h1"),
    textOf(".product-title"),
    textOf(".page-title"),
    attrOf('meta[property="og:title"]', "content"),
  ],
  price: [
    structured("json-ld:offers.price", offerPrice),
    attrOf('[itemprop="price"]', "content"),
    textOf('[itemprop="price"]'),
    textOf(".product-price"),
    textOf(".price"),
  ],
  unitPrice: [
    structured("json-ld:offers.priceSpecification", offerUnitPrice),
    textOf(".unit-price"),
    textOf(".price-per-unit"),
  ],
  description: [
    structured("json-ld:description", (p) => scalar(p.description)),
    textOf(".product-description"),
    textOf(".short-description"),
    attrOf('meta[name="description"]', "content"),
  ],
  brand: [
    structured("json-ld:brand", (p) => namedValue(p.brand)),
    attrOf('[itemprop="brand"]', "content"),
    textOf('[itemprop="brand"]'),
    textOf(".brand"),
  ],
  sku: [
    structured("json-ld:sku", (p) => scalar(p.sku) ?? scalar(p.productID) ?? scalar(p.mpn)),
    attrOf("[data-sku]", "data-sku"),
    textOf("[data-sku]"),
    attrOf('[itemprop="sku"]', "content"),
    textOf('[itemprop="sku"]'),
  ],
  url: [
    structured("json-ld:url", (p, ctx) => {
      const url = scalar(p.url);
      return url ? makeAbsolute(url, ctx.pageUrl) || null : null;
    }),
    markup('link[rel="canonical"]', ({ $, pageUrl }) =>
      makeAbsolute($('link[rel="canonical"]').attr("href") ?? "", pageUrl) || null
    ),
    markup('meta[property="og:url"]', ({ $, pageUrl }) =>
      makeAbsolute($('meta[property="og:url"]').attr("content") ?? "", pageUrl) || null
    ),
    markup("request-url", ({ pageUrl }) => makeAbsolute(pageUrl, pageUrl) || null),
  ],
  imageUrls: [
    structured("json-ld:image", (p, ctx) =>
      normalizeUrlList(imageList(p.image ?? p.images), ctx.pageUrl)
    ),
    imagesFrom(".product-gallery img, .product-image img, img[itemprop='image']"),
    imagesFrom('meta[property="og:image"]'),
    markup("page-images", ({ $, pageUrl }) => {
      const found: string[] = [];
      $("img").each((_, el) => {
        const src = imageSource((name) => $(el).attr(name));
        if (src) found.push(src);
      });
      $("a[href]").each((_, el) => {
        const href = $(el).attr("href") ?? "";
        if (IMAGE_LINK_PATTERN.test(href)) found.push(href);
      });
      return normalizeUrlList(found, pageUrl);
    }),
  ],
};

/** Run strategies in rank order; the first non-empty value wins */
export function resolveField<T extends string | string[]>(
  strategies: FieldStrategy<T>[],
  ctx: ExtractionContext
): ResolvedField<T> {
  for (const strategy of strategies) {
    const value = strategy.extract(ctx);
    if (value !== null && value.length > 0) {
      return { value, provenance: strategy.source, strategy: strategy.name };
    }
  }
  return { value: null, provenance: null, strategy: null };
}

/**
 * Resolve every product field of a product page. Each field falls back from
 * structured metadata to markup on its own; malformed JSON-LD is logged and
 * never aborts the page.
 */
export function resolveProductPage(
  html: string,
  pageUrl: string,
  strategies: StrategyTable = DEFAULT_STRATEGIES,
  logger: Logger = console
): PageResolution {
  const $ = cheerio.load(html);
  const { product, issues } = readStructuredData($);
  for (const issue of issues) {
    logger.warn(`   ! ${pageUrl}: ${issue.message} (falling back to markup)`);
  }

  const ctx: ExtractionContext = { $, product, pageUrl };
  const fields: FieldResolution = {
    title: resolveField(strategies.title, ctx),
    price: resolveField(strategies.price, ctx),
    unitPrice: resolveField(strategies.unitPrice, ctx),
    description: resolveField(strategies.description, ctx),
    brand: resolveField(strategies.brand, ctx),
    sku: resolveField(strategies.sku, ctx),
    url: resolveField(strategies.url, ctx),
    imageUrls: resolveField(strategies.imageUrls, ctx),
  };

  return { fields, issues };
}
