import { TransportError } from "../src/core/errors";
import { BinaryTransport, FetchedBinary, FetchedPage, PageTransport } from "../src/core/transport";
import { ImageManifest, ImageStore } from "../src/images/store";
import { Logger, ProductRecord } from "../src/types";

export type PageResponse = string | TransportError;

/**
 * In-process transport. A list of responses is consumed one per request,
 * the last one repeating. Unknown URLs answer 404.
 */
export class FakeTransport implements PageTransport, BinaryTransport {
  readonly requests: string[] = [];
  readonly imageRequests: string[] = [];

  constructor(
    private readonly pages: Record<string, PageResponse | PageResponse[]>,
    private readonly images: Record<string, FetchedBinary | TransportError> = {}
  ) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    this.requests.push(url);
    const entry = this.pages[url];
    const response = Array.isArray(entry) ? (entry.length > 1 ? entry.shift() : entry[0]) : entry;
    if (response === undefined) throw new TransportError(url, 404, "HTTP 404: Not Found");
    if (response instanceof TransportError) throw response;
    return { url, status: 200, content: response };
  }

  async fetchBinary(url: string): Promise<FetchedBinary> {
    this.imageRequests.push(url);
    const entry = this.images[url];
    if (entry === undefined) throw new TransportError(url, 404, "HTTP 404: Not Found");
    if (entry instanceof TransportError) throw entry;
    return entry;
  }
}

export class MemoryImageStore implements ImageStore {
  readonly dirs: string[] = [];
  readonly files = new Map<string, Uint8Array>();
  readonly manifests = new Map<string, ImageManifest>();

  async ensureDir(dir: string): Promise<void> {
    this.dirs.push(dir);
  }

  async exists(filePath: string): Promise<boolean> {
    return this.files.has(filePath);
  }

  async save(data: Uint8Array, filePath: string): Promise<void> {
    this.files.set(filePath, data);
  }

  async remove(filePath: string): Promise<void> {
    this.files.delete(filePath);
  }

  async readManifest(dir: string): Promise<ImageManifest> {
    return { ...this.manifests.get(dir) };
  }

  async writeManifest(dir: string, manifest: ImageManifest): Promise<void> {
    this.manifests.set(dir, { ...manifest });
  }
}

export class MemoryLogger implements Logger {
  readonly lines: string[] = [];
  readonly warnings: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }
}

export function image(url: string, contentType: string | null = "image/jpeg"): FetchedBinary {
  return { url, data: new Uint8Array([0xff, 0xd8, 0xff]), contentType };
}

export function jsonLd(value: unknown): string {
  return `<script type="application/ld+json">${JSON.stringify(value)}</script>`;
}

export function html(head: string, body: string): string {
  return `<!doctype html><html><head>${head}</head><body>${body}</body></html>`;
}

export function product(overrides: Partial<ProductRecord> = {}): ProductRecord {
  return {
    identity: "0123456789abcdef",
    title: "Turkey Roast",
    price: "19.99",
    unitPrice: null,
    description: null,
    brand: null,
    sku: null,
    category: "Thanksgiving",
    subcategory: "Sides",
    url: "https://shop.test/product/a",
    imageUrls: [],
    ...overrides,
  };
}
