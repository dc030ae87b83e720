import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from "../config.js";
import { TransportError, err, ok, type Result } from "../errors.js";
import { fetchLogger } from "../logger.js";

import type { TextFetcher } from "../types/index.js";

export interface FetchOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
  userAgent?: string;
}

/**
 * Names of the CPI-U files under the time.series/cu/ directory
 */
export const CPI_FILES = {
  areas: "cu.area",
  items: "cu.item",
  periods: "cu.period",
  data: "cu.data.0.Current",
} as const;

async function timedFetch(
  url: string,
  options: Required<FetchOptions>
): Promise<Response> {
  fetchLogger.debug({ url }, "Sending request to BLS");

  const startTime = performance.now();
  const response = await fetch(url, {
    headers: {
      "User-Agent": options.userAgent,
      Accept: "text/plain,*/*",
    },
    signal: AbortSignal.timeout(options.timeoutMs),
  });
  const duration = Math.round(performance.now() - startTime);

  fetchLogger.debug(
    {
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response from BLS"
  );

  return response;
}

/**
 * Fetch a delimited text file. One attempt, no retry.
 *
 * Never rejects: network failures, timeouts, non-2xx statuses and bodies
 * that are not valid UTF-8 all come back as a TransportError.
 */
export async function fetchText(
  url: string,
  options: FetchOptions = {}
): Promise<Result<string, TransportError>> {
  const resolved: Required<FetchOptions> = {
    timeoutMs: options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
    userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
  };

  fetchLogger.info({ url }, "Fetching source file");

  let response: Response;
  try {
    response = await timedFetch(url, resolved);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    fetchLogger.error({ url, error: message }, "Request failed");
    return err(new TransportError(`Request to ${url} failed: ${message}`, url));
  }

  if (!response.ok) {
    fetchLogger.error(
      { url, status: response.status, statusText: response.statusText },
      "Failed to fetch source file"
    );
    return err(
      new TransportError(
        `Failed to fetch ${url}: ${String(response.status)} ${response.statusText}`,
        url,
        response.status
      )
    );
  }

  try {
    const buffer = await response.arrayBuffer();
    const text = new TextDecoder("utf-8", { fatal: true }).decode(buffer);
    fetchLogger.debug(
      { url, bytes: buffer.byteLength },
      "Successfully fetched source file"
    );
    return ok(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    fetchLogger.error({ url, error: message }, "Could not read response body");
    return err(
      new TransportError(`Could not decode body of ${url}: ${message}`, url)
    );
  }
}

/**
 * Bind fetch options once so the pipeline can treat fetching as a plain
 * url -> text function.
 */
export function createFetcher(options: FetchOptions = {}): TextFetcher {
  return (url) => fetchText(url, options);
}
