import axios from "axios";
import type { AxiosInstance } from "axios";
import { SourceUnavailableError } from "../../errors.ts";

export const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9",
};

export function createHttpClient(
  options: {
    baseURL?: string;
    timeoutMs?: number;
    headers?: Record<string, string>;
  } = {}
): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    headers: options.headers,
    timeout: options.timeoutMs ?? 15000,
  });
}

/**
 * Maps a transport error to SourceUnavailableError so the resolver can move on.
 */
export function toSourceError(source: string, error: unknown): Error {
  if (error instanceof SourceUnavailableError) return error;
  if (axios.isAxiosError(error)) {
    if (error.response?.status === 404) {
      return new SourceUnavailableError(source, "not found", { cause: error });
    }
    if (error.response?.status === 429) {
      return new SourceUnavailableError(source, "rate limited", { cause: error });
    }
    const status = error.response
      ? `${error.response.status} - ${error.response.statusText}`
      : error.message;
    return new SourceUnavailableError(source, `request failed: ${status}`, {
      cause: error,
    });
  }
  return error instanceof Error ? error : new Error(String(error));
}
