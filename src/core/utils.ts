import axios, { AxiosError, AxiosInstance } from "axios";
import { TransportError } from "./errors";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (compatible; RetailSnapshot/1.0; +https://example.com/bot)";

/**
 * Create a configured axios instance with browser-like accept headers.
 * @param timeout - Request timeout in milliseconds
 * @param userAgent - Sent unchanged on every request
 */
export function createHttpClient(
  timeout: number,
  userAgent: string = DEFAULT_USER_AGENT
): AxiosInstance {
  return axios.create({
    timeout,
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
      "User-Agent": userAgent,
    },
    maxRedirects: 5,
  });
}

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async function, retrying immediately up to `retries` times.
 * The first error is rethrown once every attempt has failed.
 * @param fn - The async function to execute
 * @param retries - Extra attempts after the first one
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  retries = 1
): Promise<T> {
  let firstError: unknown;
  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt === 0) firstError = err;
    }
  }
  throw firstError;
}

/**
 * Deduplicate an array of URL strings, preserving order of first occurrence.
 * A trailing slash does not make a URL distinct.
 * @param urls - Array of URLs (may contain duplicates)
 * @returns Deduplicated array
 */
export function deduplicateUrls(urls: string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];
  for (const url of urls) {
    const normalized = url.replace(/\/$/, "");
    if (!seen.has(normalized)) {
      seen.add(normalized);
      unique.push(url);
    }
  }
  return unique;
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Extract the HTTP status code from an error, if available.
 * @param err - The caught error
 */
export function getErrorStatus(err: unknown): number | null {
  if (err instanceof TransportError) return err.status;
  if (err instanceof AxiosError && err.response) {
    return err.response.status;
  }
  return null;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
