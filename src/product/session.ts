import { CrawlFailure, ProductRecord } from "../types";

/** Snapshot of a finished crawl */
export interface CrawlReport {
  seedUrls: string[];
  products: ProductRecord[];
  failures: CrawlFailure[];
  failedSeeds: string[];
  duplicates: number;
  productLinksFound: number;
}

/**
 * Mutable state of one crawl run. Only the category crawler writes to it,
 * strictly in page order, so product order is deterministic.
 */
export class CrawlSession {
  private readonly seen = new Set<string>();
  private readonly products: ProductRecord[] = [];
  private readonly failures: CrawlFailure[] = [];
  private readonly failedSeeds: string[] = [];
  private duplicates = 0;
  private productLinksFound = 0;

  constructor(readonly seedUrls: readonly string[]) {}

  /** Append a product; returns false when its identity was already recorded */
  add(product: ProductRecord): boolean {
    if (this.seen.has(product.identity)) return false;
    this.seen.add(product.identity);
    this.products.push(product);
    return true;
  }

  recordDuplicate(): void {
    this.duplicates++;
  }

  recordLinks(count: number): void {
    this.productLinksFound += count;
  }

  recordFailure(failure: CrawlFailure): void {
    this.failures.push(failure);
    if (failure.stage === "seed") this.failedSeeds.push(failure.url);
  }

  get productCount(): number {
    return this.products.length;
  }

  export(): CrawlReport {
    return {
      seedUrls: [...this.seedUrls],
      products: [...this.products],
      failures: [...this.failures],
      failedSeeds: [...this.failedSeeds],
      duplicates: this.duplicates,
      productLinksFound: this.productLinksFound,
    };
  }
}
