import * as fs from "fs/promises";
import * as path from "path";
import initSqlJs, { Database, SqlJsStatic, SqlValue } from "sql.js";
import { DbMode, ProductRecord } from "../types";
import {
  CREATE_PRODUCTS_TABLE,
  PRODUCT_COLUMNS,
  PRODUCTS_TABLE,
  ProductRow,
  productRow,
} from "./schema";

export const PRODUCTS_DB = "products.db";

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) sqlJs = initSqlJs();
  return sqlJs;
}

function asText(value: SqlValue | undefined): string | null {
  if (value == null) return null;
  return typeof value === "string" ? value : String(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readDatabase(dbPath: string): Promise<Database> {
  const SQL = await loadSqlJs();
  try {
    const file = await fs.readFile(dbPath);
    return new SQL.Database(new Uint8Array(file));
  } catch (err) {
    if (!isMissingFile(err)) throw err;
    return new SQL.Database();
  }
}

const UPSERT_SQL = `
  INSERT INTO ${PRODUCTS_TABLE} (${PRODUCT_COLUMNS.join(", ")})
  VALUES (${PRODUCT_COLUMNS.map(() => "?").join(", ")})
  ON CONFLICT(id) DO UPDATE SET
    ${PRODUCT_COLUMNS.filter((c) => c !== "id")
      .map((c) => `${c} = excluded.${c}`)
      .join(",\n    ")}
`;

/**
 * Products table in an embedded SQLite database (sql.js). The schema is
 * created when absent; rows are keyed by product identity so a rerun never
 * duplicates a product.
 */
export class ProductDb {
  private constructor(private readonly db: Database, private readonly dbPath: string | null) {
    this.db.exec(CREATE_PRODUCTS_TABLE);
  }

  /** Open the database file, or start an empty one when it does not exist yet */
  static async open(dbPath: string): Promise<ProductDb> {
    return new ProductDb(await readDatabase(dbPath), dbPath);
  }

  /** In-memory copy of the database file (empty when missing); saving it is a no-op */
  static async copyOf(dbPath: string): Promise<ProductDb> {
    return new ProductDb(await readDatabase(dbPath), null);
  }

  /** In-memory database, never written to disk */
  static async memory(): Promise<ProductDb> {
    const SQL = await loadSqlJs();
    return new ProductDb(new SQL.Database(), null);
  }

  /**
   * Write products in one transaction. `replace` empties the table first;
   * `append` keeps existing rows and updates those with the same identity.
   */
  write(products: ProductRecord[], mode: DbMode): void {
    this.db.exec("BEGIN TRANSACTION");
    try {
      if (mode === "replace") this.db.exec(`DELETE FROM ${PRODUCTS_TABLE}`);
      const stmt = this.db.prepare(UPSERT_SQL);
      try {
        for (const product of products) {
          const row = productRow(product);
          stmt.run(PRODUCT_COLUMNS.map((c) => row[c]));
        }
      } finally {
        stmt.free();
      }
      this.db.exec("COMMIT");
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
  }

  /** All rows in insertion order */
  rows(): ProductRow[] {
    const stmt = this.db.prepare(
      `SELECT ${PRODUCT_COLUMNS.join(", ")} FROM ${PRODUCTS_TABLE} ORDER BY rowid`
    );
    const rows: ProductRow[] = [];
    try {
      while (stmt.step()) {
        const record = stmt.getAsObject();
        rows.push({
          id: asText(record.id),
          title: asText(record.title),
          price: asText(record.price),
          unit_price: asText(record.unit_price),
          description: asText(record.description),
          brand: asText(record.brand),
          sku: asText(record.sku),
          category: asText(record.category),
          subcategory: asText(record.subcategory),
          url: asText(record.url),
          image_urls: asText(record.image_urls),
        });
      }
    } finally {
      stmt.free();
    }
    return rows;
  }

  async save(): Promise<void> {
    if (!this.dbPath) return;
    await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
    await fs.writeFile(this.dbPath, Buffer.from(this.db.export()));
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Write products to products.db inside the output directory.
 * @returns Path to the written file
 */
export async function exportProductsSqlite(
  products: ProductRecord[],
  outputDir: string,
  mode: DbMode
): Promise<string> {
  const dbPath = path.join(outputDir, PRODUCTS_DB);
  const db = await ProductDb.open(dbPath);
  try {
    db.write(products, mode);
    await db.save();
  } finally {
    db.close();
  }
  return dbPath;
}
