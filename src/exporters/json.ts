import * as fs from "fs";
import * as path from "path";
import { CrawlSummary, ProductRecord } from "../types";
import { timestampedPath } from "./paths";
import { productRow } from "./schema";

export const PRODUCTS_JSON = "products.json";

/**
 * Export products to products.json as an array of rows keyed by the shared
 * column schema, the same shape the CSV and database carry.
 */
export function exportProductsJson(products: ProductRecord[], outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, PRODUCTS_JSON);
  fs.writeFileSync(filePath, JSON.stringify(products.map(productRow), null, 2) + "\n", "utf-8");
  return filePath;
}

/**
 * Write run statistics to summary_<timestamp>.json.
 * @returns Path to the written file
 */
export function exportSummary(summary: CrawlSummary, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "summary", ".json");
  fs.writeFileSync(filePath, JSON.stringify(summary, null, 2) + "\n", "utf-8");
  return filePath;
}
