import { describe, expect, it } from "vitest";
import {
  DEFAULT_STRATEGIES,
  StrategyTable,
  resolveProductPage,
} from "../src/product/field-resolver";
import { MemoryLogger, html, jsonLd } from "./helpers";

const PAGE_URL = "https://shop.test/product/a";

const MARKUP_BODY = `
  <h1>Markup Title</h1>
  <span class="product-price">$25.00</span>
  <span class="unit-price">$1.56 per lb</span>
  <div class="product-description">Markup description</div>
  <span class="brand">Markup Brand</span>
  <span data-sku="MK-9">MK-9</span>
  <div class="product-gallery"><img src="/img/markup.jpg"></div>
`;

describe("resolveProductPage", () => {
  it("takes every field from well-formed structured metadata over markup", () => {
    const page = html(
      jsonLd({
        "@context": "https://schema.org",
        "@type": "Product",
        name: "Turkey Roast",
        description: "Slow roasted turkey",
        sku: "TR-1",
        brand: { "@type": "Brand", name: "Kirkwood" },
        url: "https://shop.test/product/a",
        image: ["https://cdn.shop.test/a-1.jpg", { "@type": "ImageObject", url: "https://cdn.shop.test/a-2.jpg" }],
        offers: {
          "@type": "Offer",
          price: "$19.99",
          priceSpecification: {
            "@type": "UnitPriceSpecification",
            price: 1.25,
            referenceQuantity: { unitText: "lb" },
          },
        },
      }) + '<link rel="canonical" href="https://shop.test/product/other">',
      MARKUP_BODY
    );

    const { fields, issues } = resolveProductPage(page, PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(issues).toEqual([]);
    expect(fields.title.value).toBe("Turkey Roast");
    expect(fields.price.value).toBe("$19.99");
    expect(fields.unitPrice.value).toBe("1.25 per lb");
    expect(fields.description.value).toBe("Slow roasted turkey");
    expect(fields.brand.value).toBe("Kirkwood");
    expect(fields.sku.value).toBe("TR-1");
    expect(fields.url.value).toBe("https://shop.test/product/a");
    expect(fields.imageUrls.value).toEqual([
      "https://cdn.shop.test/a-1.jpg",
      "https://cdn.shop.test/a-2.jpg",
    ]);
    for (const field of Object.values(fields)) {
      expect(field.provenance).toBe("structured");
    }
  });

  it("falls back to markup for every field when the metadata is malformed", () => {
    const page = html(
      '<script type="application/ld+json">{ "@type": "Product", "name": "Broken", </script>' +
        '<link rel="canonical" href="/product/a">',
      MARKUP_BODY
    );
    const logger = new MemoryLogger();

    const { fields, issues } = resolveProductPage(page, PAGE_URL, DEFAULT_STRATEGIES, logger);

    expect(issues).toHaveLength(1);
    expect(issues[0].source).toBe("json-ld#1");
    expect(logger.warnings).toHaveLength(1);
    expect(fields.title).toEqual({ value: "Markup Title", provenance: "fallback", strategy: "h1" });
    expect(fields.price.value).toBe("$25.00");
    expect(fields.unitPrice.value).toBe("$1.56 per lb");
    expect(fields.description.value).toBe("Markup description");
    expect(fields.brand.value).toBe("Markup Brand");
    expect(fields.sku.value).toBe("MK-9");
    expect(fields.url.value).toBe("https://shop.test/product/a");
    expect(fields.imageUrls.value).toEqual(["https://shop.test/img/markup.jpg"]);
  });

  it("resolves each field independently of the others", () => {
    const page = html(
      jsonLd({ "@type": "Product", name: "Stuffing Mix" }),
      '<h1>Ignored heading</h1><span class="price">$3.49</span>'
    );

    const { fields } = resolveProductPage(page, PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(fields.title).toMatchObject({ value: "Stuffing Mix", provenance: "structured" });
    expect(fields.price).toMatchObject({ value: "$3.49", provenance: "fallback" });
    expect(fields.brand).toEqual({ value: null, provenance: null, strategy: null });
  });

  it("finds the product node inside an @graph container", () => {
    const page = html(
      jsonLd({
        "@context": "https://schema.org",
        "@graph": [
          { "@type": "BreadcrumbList", name: "Crumbs" },
          { "@type": ["Product"], name: "Cranberry Sauce", offers: [{ price: 2.29 }] },
        ],
      }),
      ""
    );

    const { fields } = resolveProductPage(page, PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(fields.title.value).toBe("Cranberry Sauce");
    expect(fields.price.value).toBe("2.29");
  });

  it("keeps using valid blocks when another block is malformed", () => {
    const page = html(
      '<script type="application/ld+json">not json</script>' +
        jsonLd({ "@type": "Product", name: "Gravy" }),
      "<h1>Other</h1>"
    );

    const { fields, issues } = resolveProductPage(page, PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(issues).toHaveLength(1);
    expect(fields.title.value).toBe("Gravy");
  });

  it("collects page images in order, absolute, without query strings or repeats", () => {
    const page = html(
      "",
      `<h1>Pie</h1>
       <img data-src="/img/b.png?w=200">
       <img src="//cdn.shop.test/b2.jpg">
       <img src="/img/b.png">
       <a href="/zoom/b.jpg">Zoom</a>
       <a href="/product/c">Other product</a>`
    );

    const { fields } = resolveProductPage(page, PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(fields.imageUrls).toEqual({
      value: [
        "https://shop.test/img/b.png",
        "https://cdn.shop.test/b2.jpg",
        "https://shop.test/zoom/b.jpg",
      ],
      provenance: "fallback",
      strategy: "page-images",
    });
  });

  it("prefers the og:image over loose page images", () => {
    const page = html(
      '<meta property="og:image" content="https://cdn.shop.test/og.jpg">',
      '<h1>Pie</h1><img src="/logo.png">'
    );

    const { fields } = resolveProductPage(page, PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(fields.imageUrls.value).toEqual(["https://cdn.shop.test/og.jpg"]);
  });

  it("uses the requested URL when the page names no canonical address", () => {
    const { fields } = resolveProductPage(html("", "<h1>Pie</h1>"), PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(fields.url).toEqual({ value: PAGE_URL, provenance: "fallback", strategy: "request-url" });
  });

  it("leaves the title unresolved when no tier has one", () => {
    const { fields } = resolveProductPage(html("", "<p>Nothing here</p>"), PAGE_URL, DEFAULT_STRATEGIES, new MemoryLogger());

    expect(fields.title.value).toBeNull();
    expect(fields.title.provenance).toBeNull();
  });

  it("accepts a reordered strategy table", () => {
    const strategies: StrategyTable = {
      ...DEFAULT_STRATEGIES,
      title: [
        { name: "data-title", source: "fallback", extract: ({ $ }) => $("[data-title]").attr("data-title") ?? null },
        ...DEFAULT_STRATEGIES.title,
      ],
    };
    const page = html(jsonLd({ "@type": "Product", name: "From metadata" }), '<div data-title="From attribute"></div>');

    const { fields } = resolveProductPage(page, PAGE_URL, strategies, new MemoryLogger());

    expect(fields.title).toEqual({ value: "From attribute", provenance: "fallback", strategy: "data-title" });
  });
});
