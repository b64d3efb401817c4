import { describe, expect, it, vi } from "vitest";
import { TransportError } from "../src/core/errors";
import { PolitenessPolicy } from "../src/core/politeness";
import { CategoryCrawler, CrawlState, CrawlerSettings } from "../src/product/category-crawler";
import { FakeTransport, MemoryLogger, PageResponse, html, jsonLd } from "./helpers";

const SIDES = "https://shop.test/products/sides/k/12";
const DESSERTS = "https://shop.test/products/desserts/k/13";
const A = "https://shop.test/product/a";
const B = "https://shop.test/product/b";
const C = "https://shop.test/product/c";

const PRODUCT_A = html(
  jsonLd({
    "@type": "Product",
    name: "Turkey Roast",
    url: A,
    offers: { "@type": "Offer", price: "$19.99" },
  }),
  "<h1>Turkey Roast</h1>"
);

const PRODUCT_B = html(
  '<script type="application/ld+json">{ "@type": "Product", "name": </script>',
  "<h1>Stuffing Mix</h1><p class='product-description'>Herb stuffing</p>"
);

const PRODUCT_C = html("", '<h1>Pumpkin Pie</h1><span class="price">$4.99</span>');

function listing(title: string, links: string[]): string {
  return html("", `<h1>${title}</h1>` + links.map((l) => `<a href="${l}">item</a>`).join("\n"));
}

function settings(seedUrls: string[]): CrawlerSettings {
  return { seedUrls, category: "Thanksgiving", productLinkPattern: /\/product\//i };
}

function crawlerFor(
  pages: Record<string, PageResponse | PageResponse[]>,
  seedUrls: string[],
  onStateChange?: (state: CrawlState) => void
) {
  const transport = new FakeTransport(pages);
  const wait = vi.fn(async (_ms: number) => undefined);
  const politeness = new PolitenessPolicy(250, wait);
  const logger = new MemoryLogger();
  const crawler = new CategoryCrawler(settings(seedUrls), {
    transport,
    politeness,
    logger,
    onStateChange,
  });
  return { crawler, transport, wait, logger };
}

describe("CategoryCrawler", () => {
  it("records two products from a listing with a repeated link and malformed metadata", async () => {
    const { crawler, transport, wait } = crawlerFor(
      {
        [SIDES]: listing("Sides", ["/product/a", "/product/b?ref=list", A, "/about"]),
        [A]: PRODUCT_A,
        [B]: PRODUCT_B,
      },
      [SIDES]
    );

    const report = await crawler.crawl();

    expect(transport.requests).toEqual([SIDES, A, B]);
    expect(wait).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledWith(250);
    expect(report.productLinksFound).toBe(2);
    expect(report.products.map((p) => p.title)).toEqual(["Turkey Roast", "Stuffing Mix"]);
    expect(report.products[0]).toMatchObject({ price: "19.99", url: A, subcategory: "Sides", category: "Thanksgiving" });
    expect(report.products[1]).toMatchObject({ price: null, description: "Herb stuffing", url: B });
    expect(report.duplicates).toBe(0);
    expect(report.failures).toEqual([]);
    expect(crawler.currentState).toBe("Done");
  });

  it("counts a product reached from a second category as a duplicate and keeps the first attribution", async () => {
    const { crawler } = crawlerFor(
      {
        [SIDES]: listing("Sides", [A]),
        [DESSERTS]: listing("Desserts", [A, C]),
        [A]: PRODUCT_A,
        [C]: PRODUCT_C,
      },
      [SIDES, DESSERTS]
    );

    const report = await crawler.crawl();

    expect(report.products.map((p) => [p.title, p.subcategory])).toEqual([
      ["Turkey Roast", "Sides"],
      ["Pumpkin Pie", "Desserts"],
    ]);
    expect(report.duplicates).toBe(1);
  });

  it("skips a product page that fails to fetch without retrying it", async () => {
    const { crawler, transport, logger } = crawlerFor(
      {
        [SIDES]: listing("Sides", [A, B, C]),
        [A]: PRODUCT_A,
        [B]: new TransportError(B, 500, "HTTP 500: Internal Server Error"),
        [C]: PRODUCT_C,
      },
      [SIDES]
    );

    const report = await crawler.crawl();

    expect(transport.requests.filter((u) => u === B)).toHaveLength(1);
    expect(report.products.map((p) => p.url)).toEqual([A, C]);
    expect(report.failures).toEqual([
      { url: B, stage: "product", status_code: 500, error_message: "HTTP 500: Internal Server Error" },
    ]);
    expect(logger.warnings).toEqual([`   [2/3]  x ${B}: HTTP 500: Internal Server Error`]);
  });

  it("retries a category page once, immediately", async () => {
    const { crawler, transport, wait } = crawlerFor(
      {
        [SIDES]: [new TransportError(SIDES, 503, "HTTP 503: Service Unavailable"), listing("Sides", [C])],
        [C]: PRODUCT_C,
      },
      [SIDES]
    );

    const report = await crawler.crawl();

    expect(transport.requests).toEqual([SIDES, SIDES, C]);
    expect(wait).toHaveBeenCalledTimes(2);
    expect(report.products).toHaveLength(1);
    expect(report.failedSeeds).toEqual([]);
  });

  it("skips a seed that still fails after the retry and moves on", async () => {
    const { crawler, transport } = crawlerFor(
      {
        [SIDES]: new TransportError(SIDES, null, "Connection refused"),
        [DESSERTS]: listing("Desserts", [C]),
        [C]: PRODUCT_C,
      },
      [SIDES, DESSERTS]
    );

    const report = await crawler.crawl();

    expect(transport.requests).toEqual([SIDES, SIDES, DESSERTS, C]);
    expect(report.failedSeeds).toEqual([SIDES]);
    expect(report.failures[0]).toEqual({
      url: SIDES,
      stage: "seed",
      status_code: null,
      error_message: "Connection refused",
    });
    expect(report.products.map((p) => p.subcategory)).toEqual(["Desserts"]);
  });

  it("records a page without a title as a failure", async () => {
    const { crawler } = crawlerFor(
      {
        [SIDES]: listing("Sides", [A]),
        [A]: html("", "<p>Temporarily unavailable</p>"),
      },
      [SIDES]
    );

    const report = await crawler.crawl();

    expect(report.products).toEqual([]);
    expect(report.failures).toEqual([
      { url: A, stage: "product", status_code: null, error_message: "Missing required field(s): title" },
    ]);
  });

  it("names the subcategory after the URL when the listing has no heading", async () => {
    const seed = "https://shop.test/products/thanksgiving-desserts/k/257";
    const { crawler } = crawlerFor(
      {
        [seed]: html("", `<a href="${C}">Pie</a>`),
        [C]: PRODUCT_C,
      },
      [seed]
    );

    const report = await crawler.crawl();

    expect(report.products[0].subcategory).toBe("thanksgiving-desserts");
  });

  it("moves through the crawl states in order", async () => {
    const states: CrawlState[] = [];
    const { crawler } = crawlerFor(
      { [SIDES]: listing("Sides", [C]), [C]: PRODUCT_C },
      [SIDES],
      (state) => states.push(state)
    );

    await crawler.crawl();

    expect(states).toEqual([
      "FetchingCategoryPage",
      "DiscoveringLinks",
      "FetchingProduct",
      "Resolving",
      "Recording",
      "Done",
    ]);
  });
});
