import * as cheerio from "cheerio";
import { PolitenessPolicy } from "../core/politeness";
import { FetchedPage, PageTransport } from "../core/transport";
import { getErrorMessage, getErrorStatus, withRetry } from "../core/utils";
import { CrawlConfig, Logger } from "../types";
import { DEFAULT_STRATEGIES, StrategyTable, resolveProductPage } from "./field-resolver";
import { categoryName, discoverProductLinks } from "./link-discovery";
import { Placement, fieldValues, recordProduct, sanitizeSegment } from "./record-builder";
import { CrawlReport, CrawlSession } from "./session";

export type CrawlState =
  | "Idle"
  | "FetchingCategoryPage"
  | "DiscoveringLinks"
  | "FetchingProduct"
  | "Resolving"
  | "Recording"
  | "Done";

/** The part of the run configuration the crawler acts on */
export type CrawlerSettings = Pick<CrawlConfig, "seedUrls" | "category" | "productLinkPattern">;

export interface CategoryCrawlerOptions {
  transport: PageTransport;
  politeness: PolitenessPolicy;
  logger?: Logger;
  strategies?: StrategyTable;
  /** Extra attempts for a category page, made immediately. Product pages are never retried. */
  categoryRetries?: number;
  onStateChange?: (state: CrawlState) => void;
}

/**
 * Walks the seed category pages in order, fetches every product page they
 * link to and records the resulting products in a CrawlSession.
 * Everything is sequential; a failed page is recorded and skipped.
 */
export class CategoryCrawler {
  private state: CrawlState = "Idle";
  private readonly transport: PageTransport;
  private readonly politeness: PolitenessPolicy;
  private readonly logger: Logger;
  private readonly strategies: StrategyTable;
  private readonly categoryRetries: number;
  private readonly onStateChange?: (state: CrawlState) => void;

  constructor(private readonly settings: CrawlerSettings, options: CategoryCrawlerOptions) {
    this.transport = options.transport;
    this.politeness = options.politeness;
    this.logger = options.logger ?? console;
    this.strategies = options.strategies ?? DEFAULT_STRATEGIES;
    this.categoryRetries = options.categoryRetries ?? 1;
    this.onStateChange = options.onStateChange;
  }

  get currentState(): CrawlState {
    return this.state;
  }

  async crawl(): Promise<CrawlReport> {
    const session = new CrawlSession(this.settings.seedUrls);
    const total = this.settings.seedUrls.length;

    for (const [index, seedUrl] of this.settings.seedUrls.entries()) {
      this.logger.log(`   Seed ${index + 1}/${total}: ${seedUrl}`);
      await this.crawlSeed(seedUrl, session);
    }

    this.transition("Done");
    return session.export();
  }

  private transition(next: CrawlState): void {
    this.state = next;
    this.onStateChange?.(next);
  }

  private async crawlSeed(seedUrl: string, session: CrawlSession): Promise<void> {
    this.transition("FetchingCategoryPage");
    let page: FetchedPage;
    try {
      await this.politeness.beforeFetch();
      page = await withRetry(() => this.transport.fetchPage(seedUrl), this.categoryRetries);
    } catch (err) {
      const message = getErrorMessage(err);
      session.recordFailure({
        url: seedUrl,
        stage: "seed",
        status_code: getErrorStatus(err),
        error_message: message,
      });
      this.logger.warn(`   x Skipping seed ${seedUrl}: ${message}`);
      return;
    }

    this.transition("DiscoveringLinks");
    const $ = cheerio.load(page.content);
    const placement: Placement = {
      category: this.settings.category,
      subcategory: sanitizeSegment(categoryName($, seedUrl)),
    };
    const links = discoverProductLinks($, seedUrl, this.settings.productLinkPattern);
    session.recordLinks(links.length);
    this.logger.log(
      `   Found ${links.length} product links (subcategory '${placement.subcategory}')`
    );

    for (const [index, link] of links.entries()) {
      const progress = `[${index + 1}/${links.length}]`;
      await this.crawlProduct(link, placement, session, progress);
    }
  }

  private async crawlProduct(
    url: string,
    placement: Placement,
    session: CrawlSession,
    progress: string
  ): Promise<void> {
    this.transition("FetchingProduct");
    let page: FetchedPage;
    try {
      await this.politeness.beforeFetch();
      page = await this.transport.fetchPage(url);
    } catch (err) {
      const message = getErrorMessage(err);
      session.recordFailure({
        url,
        stage: "product",
        status_code: getErrorStatus(err),
        error_message: message,
      });
      this.logger.warn(`   ${progress}  x ${url}: ${message}`);
      return;
    }

    this.transition("Resolving");
    const { fields } = resolveProductPage(page.content, url, this.strategies, this.logger);

    this.transition("Recording");
    const outcome = recordProduct(session, fieldValues(fields), placement, url);
    switch (outcome.status) {
      case "recorded":
        this.logger.log(`   ${progress}  + ${outcome.product.title}`);
        break;
      case "duplicate":
        this.logger.log(`   ${progress}  = ${url} (duplicate of ${outcome.product.identity})`);
        break;
      case "rejected":
        session.recordFailure({
          url,
          stage: "product",
          status_code: null,
          error_message: outcome.error.message,
        });
        this.logger.warn(`   ${progress}  x ${url}: ${outcome.error.message}`);
        break;
    }
  }
}
