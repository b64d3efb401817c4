import * as fs from "fs";
import * as path from "path";
import { DbMode, ProductRecord } from "../types";
import { CREATE_PRODUCTS_TABLE, PRODUCT_COLUMNS, PRODUCTS_TABLE, ProductRow } from "./schema";
import { PRODUCTS_DB, ProductDb } from "./sqlite";

export const PRODUCTS_SQL = "products.sql";

/** SQL literal for a cell: NULL or a single-quoted string */
export function sqlLiteral(value: string | null): string {
  if (value === null) return "NULL";
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * Render rows as a self-contained script that recreates the products table.
 */
export function renderSqlDump(rows: ProductRow[]): string {
  const columns = PRODUCT_COLUMNS.join(", ");
  const lines = [
    "BEGIN TRANSACTION;",
    CREATE_PRODUCTS_TABLE,
    ...rows.map(
      (row) =>
        `INSERT OR REPLACE INTO ${PRODUCTS_TABLE} (${columns}) VALUES(${PRODUCT_COLUMNS.map((c) =>
          sqlLiteral(row[c])
        ).join(",")});`
    ),
    "COMMIT;",
  ];
  return lines.join("\n") + "\n";
}

/**
 * Write products.sql. The rows come from an in-memory copy of the relational
 * table, built the way the database sink builds it: in `append` mode the
 * existing products.db is loaded first and this run's products are upserted
 * on top. The database file itself is never written here.
 * @returns Path to the written file
 */
export async function exportSqlDump(
  products: ProductRecord[],
  outputDir: string,
  mode: DbMode = "replace"
): Promise<string> {
  const db = mode === "append"
    ? await ProductDb.copyOf(path.join(outputDir, PRODUCTS_DB))
    : await ProductDb.memory();
  let rows: ProductRow[];
  try {
    db.write(products, mode);
    rows = db.rows();
  } finally {
    db.close();
  }

  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, PRODUCTS_SQL);
  fs.writeFileSync(filePath, renderSqlDump(rows), "utf-8");
  return filePath;
}
