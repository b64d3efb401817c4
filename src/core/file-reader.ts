import * as fs from "fs";
import * as path from "path";
import * as XLSX from "xlsx";

const URL_COLUMN_NAMES = ["url", "seed", "seed_url", "category_url"];

/**
 * Read seed URLs from a .txt (one per line), .csv or .xlsx/.xls file.
 * @param filePath  Absolute or relative path to the file.
 * @param columnName  Optional header name of the URL column (csv/xlsx only).
 */
export function readSeedUrls(filePath: string, columnName?: string): string[] {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".txt") {
    return readText(filePath);
  } else if (ext === ".csv") {
    return readCsv(filePath, columnName);
  } else if (ext === ".xlsx" || ext === ".xls") {
    return readXlsx(filePath, columnName);
  }
  throw new Error(
    `Unsupported seed file type "${ext}". Only .txt, .csv and .xlsx/.xls are supported.`
  );
}

// ── Internals ────────────────────────────────────────────────────────────────

function findUrlColumn(headers: string[], preferred?: string): number {
  if (preferred) {
    const idx = headers.findIndex(
      (h) => h.trim().toLowerCase() === preferred.trim().toLowerCase()
    );
    if (idx === -1) {
      throw new Error(
        `Column "${preferred}" not found.\n` +
          `   Available headers: ${headers.map((h) => `"${h}"`).join(", ")}`
      );
    }
    return idx;
  }

  for (const name of URL_COLUMN_NAMES) {
    const idx = headers.findIndex((h) => h.trim().toLowerCase() === name);
    if (idx !== -1) return idx;
  }

  throw new Error(
    `No URL column found automatically.\n` +
      `   Headers present: ${headers.map((h) => `"${h}"`).join(", ")}\n` +
      `   Re-run with --column=<name> to specify the correct column.`
  );
}

export function isValidUrl(str: string): boolean {
  try {
    const u = new URL(str);
    return u.protocol === "http:" || u.protocol === "https:";
  } catch {
    return false;
  }
}

function readContent(filePath: string): string {
  const raw = fs.readFileSync(filePath, "utf-8");
  return raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
}

function readText(filePath: string): string[] {
  return readContent(filePath)
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l && !l.startsWith("#") && isValidUrl(l));
}

function readCsv(filePath: string, columnName?: string): string[] {
  return readSheet(XLSX.read(readContent(filePath), { type: "string" }), filePath, columnName);
}

function readXlsx(filePath: string, columnName?: string): string[] {
  return readSheet(XLSX.readFile(filePath), filePath, columnName);
}

function readSheet(wb: XLSX.WorkBook, filePath: string, columnName?: string): string[] {
  const ws = wb.Sheets[wb.SheetNames[0]];
  if (!ws) {
    throw new Error(`File "${filePath}" has no sheets.`);
  }

  // header:1 → array of arrays; first row is headers
  const rows = XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1, blankrows: false });
  if (rows.length === 0) {
    throw new Error(`File "${filePath}" is empty.`);
  }

  const headers = rows[0].map((h) => String(h ?? ""));
  const colIdx = findUrlColumn(headers, columnName);

  const urls: string[] = [];
  for (const row of rows.slice(1)) {
    const cell = String(row[colIdx] ?? "").trim();
    if (isValidUrl(cell)) urls.push(cell);
  }
  return urls;
}
