import { sourceLogger } from "../config/logger";

import {
  SourceMalformedError,
  SourceTimeoutError,
  SourceUnavailableError,
  type SourceName,
} from "./errors";

export type FetchFn = typeof fetch;

export interface SourceRequestOptions {
  timeoutMs: number;
  /** Aborts the request when a sibling request has already failed. */
  signal?: AbortSignal;
  fetchImpl?: FetchFn;
}

/**
 * GET a JSON document from an external source.
 *
 * Network errors, non-2xx responses and cancellation surface as
 * `SourceUnavailableError`, an exceeded timeout as `SourceTimeoutError`
 * and a body that is not JSON as `SourceMalformedError`.
 */
export async function fetchJson(
  source: SourceName,
  url: string,
  options: SourceRequestOptions
): Promise<unknown> {
  const { timeoutMs, signal, fetchImpl = fetch } = options;

  if (signal?.aborted === true) {
    throw new SourceUnavailableError(source, undefined, {
      cause: signal.reason,
    });
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onParentAbort = (): void => {
    controller.abort();
  };
  signal?.addEventListener("abort", onParentAbort, { once: true });

  sourceLogger.debug({ source, url }, "Sending request to external source");
  const startTime = performance.now();

  try {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: { accept: "application/json" },
        signal: controller.signal,
      });
    } catch (error) {
      if (timedOut) {
        throw new SourceTimeoutError(source, timeoutMs);
      }
      throw new SourceUnavailableError(source, undefined, { cause: error });
    }

    const duration = Math.round(performance.now() - startTime);
    sourceLogger.debug(
      { source, status: response.status, duration: `${String(duration)}ms` },
      "Received response from external source"
    );

    if (!response.ok) {
      throw new SourceUnavailableError(source, response.status);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (timedOut) {
        throw new SourceTimeoutError(source, timeoutMs);
      }
      throw new SourceUnavailableError(source, undefined, { cause: error });
    }

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      throw new SourceMalformedError(source, ["response body is not JSON"]);
    }
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onParentAbort);
  }
}
