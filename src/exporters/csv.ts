import * as fs from "fs";
import * as path from "path";
import { CrawlFailure, ProductRecord } from "../types";
import { PRODUCT_COLUMNS, productRow } from "./schema";
import { timestampedPath } from "./paths";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

export const PRODUCTS_CSV = "products.csv";

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 * @param value - The raw cell value
 */
export function escapeCsv(value: string | number | null): string {
  const str = value == null ? "" : String(value);
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Convert rows to a CSV string with a header row.
 * @param rows - Data rows
 * @param columns - Ordered column keys
 */
export function toCsv<C extends string>(
  rows: Record<C, string | number | null>[],
  columns: readonly C[]
): string {
  const header = columns.map((c) => escapeCsv(c)).join(",");
  const lines = rows.map((row) => columns.map((col) => escapeCsv(row[col])).join(","));
  return BOM + [header, ...lines].join("\n") + "\n";
}

/**
 * Export products to products.csv. The file holds no timestamps, so the
 * same products always produce the same bytes.
 * @returns Path to the written file
 */
export function exportProductsCsv(products: ProductRecord[], outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, PRODUCTS_CSV);
  fs.writeFileSync(filePath, toCsv(products.map(productRow), PRODUCT_COLUMNS), "utf-8");
  return filePath;
}

const FAILURE_COLUMNS = ["url", "stage", "status_code", "error_message"] as const;

/**
 * Export seed, product and image failures to errors_<timestamp>.csv.
 * @returns Path to the written file
 */
export function exportFailures(failures: CrawlFailure[], outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = timestampedPath(outputDir, "errors", ".csv");
  fs.writeFileSync(filePath, toCsv(failures, FAILURE_COLUMNS), "utf-8");
  return filePath;
}
