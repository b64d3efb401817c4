import * as path from "path";
import { CrawlConfig, DbMode } from "../types";
import { readSeedUrls } from "./file-reader";
import { DEFAULT_USER_AGENT, deduplicateUrls } from "./utils";

export const DEFAULT_SEED_URLS = [
  "https://www.aldi.us/products/thanksgiving/thanksgiving-desserts/k/257",
];

export function defaultConfig(): CrawlConfig {
  return {
    seedUrls: [...DEFAULT_SEED_URLS],
    delayMs: 800,
    outputDir: path.resolve("output"),
    timeout: 20_000,
    userAgent: DEFAULT_USER_AGENT,
    category: "Thanksgiving",
    productLinkPattern: /\/product\//i,
    maxImagesPerProduct: 1,
    downloadImages: true,
    dbMode: "replace",
  };
}

/** Environment variable for each `--key=value` flag */
const ENV_KEYS: Record<string, string> = {
  seeds: "SCRAPER_SEED_URLS",
  input: "SCRAPER_SEED_FILE",
  column: "SCRAPER_SEED_COLUMN",
  delay: "SCRAPER_DELAY_MS",
  output: "SCRAPER_OUTPUT_DIR",
  timeout: "SCRAPER_TIMEOUT_MS",
  category: "SCRAPER_CATEGORY",
  "user-agent": "SCRAPER_USER_AGENT",
  "product-pattern": "SCRAPER_PRODUCT_LINK_PATTERN",
  "max-images": "SCRAPER_MAX_IMAGES",
  "db-mode": "SCRAPER_DB_MODE",
};

/**
 * Parse `--key=value` flags. `--no-images` is the only bare flag.
 */
export function parseArgs(argv: string[]): { opts: Record<string, string>; noImages: boolean } {
  const opts: Record<string, string> = {};
  let noImages = false;

  for (const arg of argv) {
    if (arg === "--no-images") {
      noImages = true;
      continue;
    }
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    }
  }
  return { opts, noImages };
}

function parseCount(value: string, name: string): number {
  const num = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(num)) {
    throw new Error(`Invalid value for ${name}: "${value}" (expected a non-negative integer)`);
  }
  return num;
}

function parseDbMode(value: string): DbMode {
  if (value === "replace" || value === "append") return value;
  throw new Error(`Invalid value for db-mode: "${value}" (expected "replace" or "append")`);
}

function splitList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Build the run configuration: defaults, then environment variables, then
 * command-line flags.
 * @throws Error on an invalid number, pattern or db mode
 */
export function buildConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): CrawlConfig {
  const config = defaultConfig();
  const { opts, noImages } = parseArgs(argv);

  const setting = (key: string): string | undefined => {
    if (opts[key] !== undefined) return opts[key];
    const envKey = ENV_KEYS[key];
    const fromEnv = envKey ? env[envKey] : undefined;
    return fromEnv !== undefined && fromEnv !== "" ? fromEnv : undefined;
  };

  const seedFile = setting("input");
  const seeds = setting("seeds");
  if (seedFile) {
    config.seedUrls = readSeedUrls(seedFile, setting("column"));
  } else if (seeds) {
    config.seedUrls = splitList(seeds);
  }
  config.seedUrls = deduplicateUrls(config.seedUrls);

  const delay = setting("delay");
  if (delay !== undefined) config.delayMs = parseCount(delay, "delay");

  const output = setting("output");
  if (output) config.outputDir = path.resolve(output);

  const timeout = setting("timeout");
  if (timeout !== undefined) config.timeout = parseCount(timeout, "timeout");

  const category = setting("category");
  if (category) config.category = category.trim();

  const userAgent = setting("user-agent");
  if (userAgent) config.userAgent = userAgent;

  const pattern = setting("product-pattern");
  if (pattern) {
    try {
      config.productLinkPattern = new RegExp(pattern, "i");
    } catch (err) {
      throw new Error(`Invalid product-pattern "${pattern}": ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  const maxImages = setting("max-images");
  if (maxImages !== undefined) config.maxImagesPerProduct = parseCount(maxImages, "max-images");

  const dbMode = setting("db-mode");
  if (dbMode) config.dbMode = parseDbMode(dbMode);

  if (noImages || env.SCRAPER_DOWNLOAD_IMAGES === "false") config.downloadImages = false;

  return config;
}
