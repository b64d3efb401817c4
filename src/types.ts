/** Relational sink behaviour on rerun */
export type DbMode = "replace" | "append";

/** Run configuration assembled from defaults, environment and CLI flags */
export interface CrawlConfig {
  seedUrls: string[];
  delayMs: number;
  outputDir: string;
  timeout: number;
  userAgent: string;
  category: string;
  productLinkPattern: RegExp;
  maxImagesPerProduct: number;
  downloadImages: boolean;
  dbMode: DbMode;
}

/** Minimal logging surface; `console` satisfies it */
export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * A validated product. Optional attributes are `null` when unknown so that
 * every sink sees the same fixed set of columns.
 */
export interface ProductRecord {
  identity: string;
  title: string;
  price: string | null;
  unitPrice: string | null;
  description: string | null;
  brand: string | null;
  sku: string | null;
  category: string;
  subcategory: string;
  url: string;
  imageUrls: string[];
}

/** Where a failure happened */
export type FailureStage = "seed" | "product" | "image";

/** Record for a seed, product page or image that could not be processed */
export interface CrawlFailure {
  url: string;
  stage: FailureStage;
  status_code: number | null;
  error_message: string;
}

/** Statistics written to summary_<timestamp>.json after a run completes */
export interface CrawlSummary {
  seed_urls: string[];
  seeds_failed: number;
  product_links_found: number;
  total_products: number;
  duplicates_skipped: number;
  products_failed: number;
  images_saved: number;
  images_skipped: number;
  images_failed: number;
  images_removed: number;
  sinks: Array<{ name: string; ok: boolean; path: string | null; error: string | null }>;
  elapsed_time: string;
  output_files: string[];
  crawled_at: string;
}
