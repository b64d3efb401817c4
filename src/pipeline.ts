import * as fs from "fs";
import * as path from "path";
import { FatalRunError } from "./core/errors";
import { PolitenessPolicy } from "./core/politeness";
import { BinaryTransport, PageTransport } from "./core/transport";
import { formatDuration, getErrorMessage, sleep } from "./core/utils";
import { exportFailures } from "./exporters/csv";
import { exportSummary } from "./exporters/json";
import { ProductSink, SinkResult, createDefaultSinks, runSinks } from "./exporters/sinks";
import { ImageFetchCoordinator, ImageReport } from "./images/coordinator";
import { FsImageStore, ImageStore } from "./images/store";
import { CategoryCrawler } from "./product/category-crawler";
import { CrawlReport } from "./product/session";
import { CrawlConfig, CrawlFailure, CrawlSummary, Logger } from "./types";

export interface PipelineDeps {
  transport: PageTransport & BinaryTransport;
  imageStore?: ImageStore;
  sinks?: ProductSink[];
  logger?: Logger;
  /** Replaces the politeness sleep */
  wait?: (ms: number) => Promise<void>;
}

export interface SnapshotResult {
  report: CrawlReport;
  images: ImageReport;
  sinks: SinkResult[];
  summary: CrawlSummary;
  outputFiles: string[];
}

function prepareOutputDir(outputDir: string): void {
  try {
    fs.mkdirSync(path.join(outputDir, "images"), { recursive: true });
  } catch (err) {
    throw new FatalRunError(`Cannot create output directory ${outputDir}: ${getErrorMessage(err)}`);
  }
}

/**
 * Full run: crawl every seed, download images, then hand the products to
 * every sink. Only an unusable output directory, an empty seed list or the
 * failure of every seed is fatal.
 */
export async function runSnapshot(config: CrawlConfig, deps: PipelineDeps): Promise<SnapshotResult> {
  const logger = deps.logger ?? console;
  const startTime = Date.now();
  const politeness = new PolitenessPolicy(config.delayMs, deps.wait ?? sleep);

  prepareOutputDir(config.outputDir);
  if (config.seedUrls.length === 0) {
    throw new FatalRunError("No seed URLs configured.");
  }

  // ── Step 1: Crawl ─────────────────────────────────────────────────
  logger.log(`Step 1: Crawling ${config.seedUrls.length} seed page(s) (delay: ${config.delayMs}ms)...`);
  const crawler = new CategoryCrawler(config, {
    transport: deps.transport,
    politeness,
    logger,
  });
  const report = await crawler.crawl();
  logger.log(
    `   ${report.products.length} products, ${report.duplicates} duplicates skipped, ` +
      `${report.failures.length} failures`
  );

  if (report.failedSeeds.length === config.seedUrls.length) {
    exportFailures(report.failures, config.outputDir);
    throw new FatalRunError(`All ${config.seedUrls.length} seed page(s) failed; nothing to export.`);
  }

  // ── Step 2: Images ────────────────────────────────────────────────
  let images: ImageReport = { saved: [], skipped: [], failed: [], removed: [] };
  if (config.downloadImages) {
    logger.log("\nStep 2: Downloading images...");
    const coordinator = new ImageFetchCoordinator({
      transport: deps.transport,
      store: deps.imageStore ?? new FsImageStore(),
      politeness,
      imagesDir: path.join(config.outputDir, "images"),
      maxImagesPerProduct: config.maxImagesPerProduct,
      logger,
    });
    images = await coordinator.downloadAll(report.products);
  } else {
    logger.log("\nStep 2: Image download disabled, skipping.");
  }

  // ── Step 3: Export ────────────────────────────────────────────────
  logger.log("\nStep 3: Exporting...");
  const outputFiles: string[] = [];
  const sinks = await runSinks(
    report.products,
    deps.sinks ?? createDefaultSinks(config.outputDir, config.dbMode),
    logger
  );
  for (const result of sinks) {
    if (result.ok) outputFiles.push(result.path);
  }

  const failures: CrawlFailure[] = [
    ...report.failures,
    ...images.failed.map((f) => ({
      url: f.url,
      stage: "image" as const,
      status_code: null,
      error_message: f.message,
    })),
  ];
  if (failures.length > 0) {
    const errPath = exportFailures(failures, config.outputDir);
    outputFiles.push(errPath);
    logger.log(`   ${errPath} (${failures.length} rows)`);
  }

  const summary: CrawlSummary = {
    seed_urls: report.seedUrls,
    seeds_failed: report.failedSeeds.length,
    product_links_found: report.productLinksFound,
    total_products: report.products.length,
    duplicates_skipped: report.duplicates,
    products_failed: report.failures.filter((f) => f.stage === "product").length,
    images_saved: images.saved.length,
    images_skipped: images.skipped.length,
    images_failed: images.failed.length,
    images_removed: images.removed.length,
    sinks: sinks.map((s) =>
      s.ok
        ? { name: s.name, ok: true, path: s.path, error: null }
        : { name: s.name, ok: false, path: null, error: s.error.message }
    ),
    elapsed_time: formatDuration(Date.now() - startTime),
    output_files: [...outputFiles],
    crawled_at: new Date().toISOString(),
  };
  const summaryPath = exportSummary(summary, config.outputDir);
  outputFiles.push(summaryPath);
  logger.log(`   ${summaryPath}`);

  return { report, images, sinks, summary, outputFiles };
}
