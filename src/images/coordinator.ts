import * as path from "path";
import { ImageFetchError } from "../core/errors";
import { PolitenessPolicy } from "../core/politeness";
import { BinaryTransport } from "../core/transport";
import { getErrorMessage } from "../core/utils";
import { Logger, ProductRecord } from "../types";
import { ImageManifest, ImageStore } from "./store";

const KNOWN_EXTENSIONS = new Set([".jpg", ".jpeg", ".png", ".webp", ".gif"]);

const CONTENT_TYPE_EXT: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/png": ".png",
  "image/webp": ".webp",
  "image/gif": ".gif",
};

/** One image to fetch, with everything needed to name it */
export interface ImageTask {
  identity: string;
  subcategory: string;
  /** 1-based order of the product within its subcategory */
  position: number;
  /** 1-based index of the image within the product */
  index: number;
  url: string;
  dir: string;
}

export interface SavedImage {
  identity: string;
  url: string;
  path: string;
}

export interface ImageReport {
  saved: SavedImage[];
  /** Already on disk from a previous run */
  skipped: SavedImage[];
  failed: ImageFetchError[];
  /** Files left by an earlier run that no current product owns */
  removed: string[];
}

interface DirState {
  manifest: ImageManifest;
  /** File names owned by this run's products */
  kept: Set<string>;
}

export interface ImageFetchCoordinatorOptions {
  transport: BinaryTransport;
  store: ImageStore;
  politeness: PolitenessPolicy;
  imagesDir: string;
  maxImagesPerProduct?: number;
  logger?: Logger;
}

function extensionFromUrl(url: string): string | null {
  try {
    const ext = path.extname(new URL(url).pathname).toLowerCase();
    return KNOWN_EXTENSIONS.has(ext) ? ext : null;
  } catch {
    return null;
  }
}

function extensionFromContentType(contentType: string | null): string {
  const mime = (contentType ?? "").split(";")[0].trim().toLowerCase();
  return CONTENT_TYPE_EXT[mime] ?? ".jpg";
}

/** `product_<position>` for the first image, `product_<position>_<n>` for the rest */
export function imageFileName(position: number, index: number, ext: string): string {
  const suffix = index > 1 ? `_${index}` : "";
  return `product_${position}${suffix}${ext}`;
}

/**
 * Name of the file an earlier run saved for this task, if the manifest shows
 * it holds the same product's image at the same position.
 */
function ownedFile(manifest: ImageManifest, task: ImageTask): string | null {
  const prefix = `${imageFileName(task.position, task.index, "")}.`;
  for (const [name, entry] of Object.entries(manifest)) {
    if (name.startsWith(prefix) && entry.identity === task.identity && entry.url === task.url) {
      return name;
    }
  }
  return null;
}

/**
 * Group products by subcategory (first-seen order) and number them 1..n
 * within each group. Products without images still take a position, so
 * names stay tied to listing order.
 */
export function planImageTasks(
  products: ProductRecord[],
  imagesDir: string,
  maxImagesPerProduct = 1
): ImageTask[] {
  const groups = new Map<string, ProductRecord[]>();
  for (const product of products) {
    const group = groups.get(product.subcategory);
    if (group) group.push(product);
    else groups.set(product.subcategory, [product]);
  }

  const tasks: ImageTask[] = [];
  for (const [subcategory, group] of groups) {
    const dir = path.join(imagesDir, subcategory);
    group.forEach((product, i) => {
      product.imageUrls.slice(0, maxImagesPerProduct).forEach((url, j) => {
        tasks.push({
          identity: product.identity,
          subcategory,
          position: i + 1,
          index: j + 1,
          url,
          dir,
        });
      });
    });
  }
  return tasks;
}

/**
 * Downloads product images once the crawl is complete. A failed image is
 * logged and recorded; the remaining images are still fetched. Each
 * subcategory directory keeps a manifest of which product every file holds,
 * so a rerun reuses a file only when it still belongs to the same product.
 */
export class ImageFetchCoordinator {
  private readonly transport: BinaryTransport;
  private readonly store: ImageStore;
  private readonly politeness: PolitenessPolicy;
  private readonly imagesDir: string;
  private readonly maxImagesPerProduct: number;
  private readonly logger: Logger;

  constructor(options: ImageFetchCoordinatorOptions) {
    this.transport = options.transport;
    this.store = options.store;
    this.politeness = options.politeness;
    this.imagesDir = options.imagesDir;
    this.maxImagesPerProduct = options.maxImagesPerProduct ?? 1;
    this.logger = options.logger ?? console;
  }

  async downloadAll(products: ProductRecord[]): Promise<ImageReport> {
    const report: ImageReport = { saved: [], skipped: [], failed: [], removed: [] };
    const tasks = planImageTasks(products, this.imagesDir, this.maxImagesPerProduct);
    const dirs = new Map<string, DirState>();

    for (const [i, task] of tasks.entries()) {
      const progress = `[${i + 1}/${tasks.length}]`;
      const knownExt = extensionFromUrl(task.url);
      let destination = knownExt
        ? path.join(task.dir, imageFileName(task.position, task.index, knownExt))
        : null;
      try {
        const state = await this.openDir(task.dir, dirs);

        const owned = ownedFile(state.manifest, task);
        if (owned && (await this.store.exists(path.join(task.dir, owned)))) {
          const existing = path.join(task.dir, owned);
          state.kept.add(owned);
          report.skipped.push({ identity: task.identity, url: task.url, path: existing });
          this.logger.log(`   ${progress}  = ${existing} (exists)`);
          continue;
        }

        await this.politeness.beforeFetch();
        const image = await this.transport.fetchBinary(task.url);
        const name = imageFileName(
          task.position,
          task.index,
          knownExt ?? extensionFromContentType(image.contentType)
        );
        destination = path.join(task.dir, name);
        await this.store.save(image.data, destination);
        state.manifest[name] = { identity: task.identity, url: task.url };
        state.kept.add(name);

        report.saved.push({ identity: task.identity, url: task.url, path: destination });
        this.logger.log(`   ${progress}  + ${destination}`);
      } catch (err) {
        const failure = new ImageFetchError(task.url, destination, getErrorMessage(err));
        report.failed.push(failure);
        this.logger.warn(`   ${progress}  x ${task.url}: ${failure.message}`);
      }
    }

    for (const [dir, state] of dirs) {
      await this.closeDir(dir, state, report);
    }
    return report;
  }

  /** Create the directory and load its manifest, once per run */
  private async openDir(dir: string, dirs: Map<string, DirState>): Promise<DirState> {
    const open = dirs.get(dir);
    if (open) return open;

    await this.store.ensureDir(dir);
    let manifest: ImageManifest;
    try {
      manifest = await this.store.readManifest(dir);
    } catch (err) {
      this.logger.warn(`   ! ${dir}: unreadable image manifest, re-downloading (${getErrorMessage(err)})`);
      manifest = {};
    }
    const state: DirState = { manifest, kept: new Set() };
    dirs.set(dir, state);
    return state;
  }

  /**
   * Delete files this coordinator wrote on an earlier run that no product of
   * this run claims, then persist the manifest.
   */
  private async closeDir(dir: string, state: DirState, report: ImageReport): Promise<void> {
    try {
      for (const name of Object.keys(state.manifest)) {
        if (state.kept.has(name)) continue;
        const stale = path.join(dir, name);
        await this.store.remove(stale);
        delete state.manifest[name];
        report.removed.push(stale);
        this.logger.log(`   - ${stale} (stale)`);
      }
      await this.store.writeManifest(dir, state.manifest);
    } catch (err) {
      this.logger.warn(`   x ${dir}: could not update image manifest: ${getErrorMessage(err)}`);
    }
  }
}
