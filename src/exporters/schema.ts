import { ProductRecord } from "../types";

/** Fixed column order shared by every sink */
export const PRODUCT_COLUMNS = [
  "id",
  "title",
  "price",
  "unit_price",
  "description",
  "brand",
  "sku",
  "category",
  "subcategory",
  "url",
  "image_urls",
] as const;

export type ProductColumn = (typeof PRODUCT_COLUMNS)[number];

/** One product flattened to the column schema; null marks an unknown value */
export type ProductRow = Record<ProductColumn, string | null>;

export const PRODUCTS_TABLE = "products";

export const CREATE_PRODUCTS_TABLE = `CREATE TABLE IF NOT EXISTS ${PRODUCTS_TABLE} (
  id TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  price TEXT,
  unit_price TEXT,
  description TEXT,
  brand TEXT,
  sku TEXT,
  category TEXT NOT NULL,
  subcategory TEXT NOT NULL,
  url TEXT NOT NULL,
  image_urls TEXT NOT NULL
);`;

/** Separator for the image URL list inside a single cell */
export const IMAGE_URL_SEPARATOR = "|";

export function productRow(product: ProductRecord): ProductRow {
  return {
    id: product.identity,
    title: product.title,
    price: product.price,
    unit_price: product.unitPrice,
    description: product.description,
    brand: product.brand,
    sku: product.sku,
    category: product.category,
    subcategory: product.subcategory,
    url: product.url,
    image_urls: product.imageUrls.join(IMAGE_URL_SEPARATOR),
  };
}
