import * as fs from "fs/promises";
import * as path from "path";

/** Which product image a saved file holds */
export interface ManifestEntry {
  identity: string;
  url: string;
}

/** File name → owner, one per subcategory directory */
export type ImageManifest = Record<string, ManifestEntry>;

export const MANIFEST_FILE = "manifest.json";

/** Persists downloaded image bytes */
export interface ImageStore {
  /** Create a directory; an existing one is not an error */
  ensureDir(dir: string): Promise<void>;
  exists(filePath: string): Promise<boolean>;
  save(data: Uint8Array, filePath: string): Promise<void>;
  remove(filePath: string): Promise<void>;
  /** Manifest of a directory; empty when none was written yet */
  readManifest(dir: string): Promise<ImageManifest>;
  writeManifest(dir: string, manifest: ImageManifest): Promise<void>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Keep only well-formed entries of a parsed manifest */
export function parseManifest(value: unknown): ImageManifest {
  const manifest: ImageManifest = {};
  if (typeof value !== "object" || value === null || Array.isArray(value)) return manifest;
  const entries: [string, unknown][] = Object.entries(value);
  for (const [name, entry] of entries) {
    if (typeof entry !== "object" || entry === null) continue;
    if (!("identity" in entry) || !("url" in entry)) continue;
    const { identity, url } = entry;
    if (typeof identity === "string" && typeof url === "string") {
      manifest[name] = { identity, url };
    }
  }
  return manifest;
}

export class FsImageStore implements ImageStore {
  async ensureDir(dir: string): Promise<void> {
    await fs.mkdir(dir, { recursive: true });
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async save(data: Uint8Array, filePath: string): Promise<void> {
    await fs.writeFile(filePath, data);
  }

  async remove(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }

  async readManifest(dir: string): Promise<ImageManifest> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(dir, MANIFEST_FILE), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw err;
    }
    return parseManifest(JSON.parse(raw));
  }

  async writeManifest(dir: string, manifest: ImageManifest): Promise<void> {
    await fs.writeFile(
      path.join(dir, MANIFEST_FILE),
      JSON.stringify(manifest, null, 2) + "\n",
      "utf-8"
    );
  }
}
