import { StorageError } from "../core/errors";
import { getErrorMessage } from "../core/utils";
import { DbMode, Logger, ProductRecord } from "../types";
import { exportProductsCsv } from "./csv";
import { exportProductsJson } from "./json";
import { exportSqlDump } from "./sql-dump";
import { exportProductsSqlite } from "./sqlite";

/** Consumes the final product list and writes one output file */
export interface ProductSink {
  name: string;
  write(products: ProductRecord[]): Promise<string>;
}

export type SinkResult =
  | { name: string; ok: true; path: string }
  | { name: string; ok: false; error: StorageError };

export function createDefaultSinks(outputDir: string, dbMode: DbMode): ProductSink[] {
  return [
    { name: "csv", write: async (products) => exportProductsCsv(products, outputDir) },
    { name: "sqlite", write: (products) => exportProductsSqlite(products, outputDir, dbMode) },
    { name: "sql-dump", write: (products) => exportSqlDump(products, outputDir, dbMode) },
    { name: "json", write: async (products) => exportProductsJson(products, outputDir) },
  ];
}

/**
 * Run every sink in order. A failing sink is reported as a StorageError and
 * the remaining sinks still write.
 */
export async function runSinks(
  products: ProductRecord[],
  sinks: ProductSink[],
  logger: Logger = console
): Promise<SinkResult[]> {
  const results: SinkResult[] = [];
  for (const sink of sinks) {
    try {
      const filePath = await sink.write(products);
      results.push({ name: sink.name, ok: true, path: filePath });
      logger.log(`   ${filePath} (${products.length} products)`);
    } catch (err) {
      const error = new StorageError(sink.name, getErrorMessage(err));
      results.push({ name: sink.name, ok: false, error });
      logger.warn(`   x ${sink.name} sink failed: ${error.message}`);
    }
  }
  return results;
}
