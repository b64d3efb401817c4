import { AxiosInstance } from "axios";
import { TransportError } from "./errors";
import { getErrorMessage, getErrorStatus } from "./utils";

/** Raw content of a fetched page */
export interface FetchedPage {
  url: string;
  status: number;
  content: string;
}

export interface FetchedBinary {
  url: string;
  data: Uint8Array;
  contentType: string | null;
}

/** Fetches HTML pages. Throws TransportError when the page is unavailable. */
export interface PageTransport {
  fetchPage(url: string): Promise<FetchedPage>;
}

/** Fetches binary resources such as product images. Throws TransportError. */
export interface BinaryTransport {
  fetchBinary(url: string): Promise<FetchedBinary>;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * axios-backed transport. Any non-2xx status and any network failure are
 * reported uniformly as TransportError.
 */
export class HttpTransport implements PageTransport, BinaryTransport {
  constructor(private readonly http: AxiosInstance) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    try {
      const response = await this.http.get<string>(url, {
        responseType: "text",
        validateStatus: () => true,
      });
      if (!isSuccess(response.status)) {
        throw new TransportError(
          url,
          response.status,
          `HTTP ${response.status}: ${response.statusText}`
        );
      }
      return { url, status: response.status, content: String(response.data) };
    } catch (err) {
      throw toTransportError(url, err);
    }
  }

  async fetchBinary(url: string): Promise<FetchedBinary> {
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        responseType: "arraybuffer",
        validateStatus: () => true,
      });
      if (!isSuccess(response.status)) {
        throw new TransportError(
          url,
          response.status,
          `HTTP ${response.status}: ${response.statusText}`
        );
      }
      const contentType = response.headers["content-type"];
      return {
        url,
        data: new Uint8Array(response.data),
        contentType: typeof contentType === "string" ? contentType : null,
      };
    } catch (err) {
      throw toTransportError(url, err);
    }
  }
}

function toTransportError(url: string, err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  return new TransportError(url, getErrorStatus(err), getErrorMessage(err));
}
