import { sleep } from "./utils";

/**
 * Fixed delay awaited before every outbound request. There is no queue:
 * callers are sequential, so each wait simply blocks the crawl loop.
 */
export class PolitenessPolicy {
  private waits = 0;

  constructor(
    readonly delayMs: number,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async beforeFetch(): Promise<void> {
    this.waits++;
    if (this.delayMs > 0) await this.wait(this.delayMs);
  }

  /** Number of fetches this policy has gated so far */
  get count(): number {
    return this.waits;
  }
}
