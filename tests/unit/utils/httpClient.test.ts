import { describe, it, expect, vi } from "vitest";

import {
  SourceMalformedError,
  SourceTimeoutError,
  SourceUnavailableError,
} from "../../../utils/errors";
import { fetchJson, type FetchFn } from "../../../utils/httpClient";

const SOURCE_URL = "https://countries.test/v2/all";

/** A fetch that only settles when its signal aborts. */
function hangingFetch() {
  return vi.fn<FetchFn>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(new DOMException("The operation was aborted", "AbortError"));
        });
      })
  );
}

describe("utils/httpClient", () => {
  it("should return the parsed JSON body", async () => {
    const fetchImpl = vi.fn<FetchFn>(() =>
      Promise.resolve(new Response('[{"name":"Testland"}]', { status: 200 }))
    );

    await expect(
      fetchJson("REST Countries API", SOURCE_URL, { timeoutMs: 1000, fetchImpl })
    ).resolves.toEqual([{ name: "Testland" }]);
  });

  it("should map non-2xx responses to SourceUnavailableError", async () => {
    const fetchImpl = vi.fn<FetchFn>(() =>
      Promise.resolve(new Response("down", { status: 502 }))
    );

    const error = await fetchJson("REST Countries API", SOURCE_URL, {
      timeoutMs: 1000,
      fetchImpl,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      code: "SOURCE_UNAVAILABLE",
      status: 502,
      message: "Could not fetch data from REST Countries API (HTTP 502)",
    });
  });

  it("should map network errors to SourceUnavailableError", async () => {
    const fetchImpl = vi.fn<FetchFn>(() =>
      Promise.reject(new TypeError("fetch failed"))
    );

    await expect(
      fetchJson("Open Exchange Rate API", SOURCE_URL, { timeoutMs: 1000, fetchImpl })
    ).rejects.toThrow("Could not fetch data from Open Exchange Rate API");
  });

  it("should map a body that is not JSON to SourceMalformedError", async () => {
    const fetchImpl = vi.fn<FetchFn>(() =>
      Promise.resolve(new Response("<html>", { status: 200 }))
    );

    await expect(
      fetchJson("REST Countries API", SOURCE_URL, { timeoutMs: 1000, fetchImpl })
    ).rejects.toBeInstanceOf(SourceMalformedError);
  });

  it("should raise SourceTimeoutError when the timeout elapses", async () => {
    const fetchImpl = hangingFetch();

    const error = await fetchJson("REST Countries API", SOURCE_URL, {
      timeoutMs: 20,
      fetchImpl,
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceTimeoutError);
    expect(error).toMatchObject({
      code: "SOURCE_TIMEOUT",
      message: "REST Countries API did not respond within 20ms",
    });
  });

  it("should raise SourceUnavailableError when the caller aborts", async () => {
    const fetchImpl = hangingFetch();
    const controller = new AbortController();

    const pending = fetchJson("REST Countries API", SOURCE_URL, {
      timeoutMs: 5000,
      signal: controller.signal,
      fetchImpl,
    });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  it("should not send a request when already aborted", async () => {
    const fetchImpl = hangingFetch();
    const controller = new AbortController();
    controller.abort();

    await expect(
      fetchJson("REST Countries API", SOURCE_URL, {
        timeoutMs: 5000,
        signal: controller.signal,
        fetchImpl,
      })
    ).rejects.toBeInstanceOf(SourceUnavailableError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
