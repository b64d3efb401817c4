import * as path from "path";

/** Generate a filename with a timestamp suffix to avoid overwriting old runs. */
export function timestampedPath(
  outputDir: string,
  base: string,
  ext: string,
  now: Date = new Date()
): string {
  const ts = now
    .toISOString()
    .replace(/[-:]/g, "")
    .replace("T", "_")
    .slice(0, 15); // "20260224_143022"
  return path.join(outputDir, `${base}_${ts}${ext}`);
}
