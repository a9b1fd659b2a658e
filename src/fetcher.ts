import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { FetchError } from "./errors.js";
import { describeError } from "./utils.js";

export interface FetchOptions {
  timeoutMs: number;
  userAgent: string;
}

export type PageFetcher = (url: string) => Promise<string>;

export function createPageFetcher(options: FetchOptions, client: AxiosInstance = axios.create()): PageFetcher {
  const headers = {
    "User-Agent": options.userAgent,
    Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
    "Accept-Language": "en-US,en;q=0.9",
    "Cache-Control": "no-cache",
    Pragma: "no-cache",
  };

  return async (url) => {
    let res: AxiosResponse<unknown>;
    try {
      res = await client.get<unknown>(url, {
        headers,
        timeout: options.timeoutMs,
        responseType: "text",
        maxRedirects: 5,
        // Status is checked below so every non-2xx maps to FetchError
        validateStatus: () => true,
      });
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT")) {
        throw new FetchError(`Timed out after ${options.timeoutMs} ms fetching ${url}`, { cause: err });
      }
      throw new FetchError(`Request to ${url} failed: ${describeError(err)}`, { cause: err });
    }

    if (res.status < 200 || res.status >= 300) {
      throw new FetchError(`HTTP ${res.status} from ${url}`, { status: res.status });
    }
    if (typeof res.data !== "string") {
      throw new FetchError(`Unexpected response body from ${url}`, { status: res.status });
    }
    return res.data;
  };
}
