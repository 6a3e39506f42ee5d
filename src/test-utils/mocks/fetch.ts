/**
 * Fake HTTP clients for prober tests
 */

import type { FetchFn, ProbeRequestInit, ProbeResponse } from "../../checker/types";

export interface RecordedRequest {
  url: string;
  init: ProbeRequestInit;
}

export interface FakeFetch {
  fetch: FetchFn;
  requests: RecordedRequest[];
}

/**
 * Error shaped like the ones fetch raises for socket and DNS failures
 */
export function createNetworkError(code: string, message = `connect ${code}`): TypeError {
  const cause = Object.assign(new Error(message), { code });
  return new TypeError("fetch failed", { cause });
}

export function createAbortError(): Error {
  const error = new Error("This operation was aborted");
  error.name = "AbortError";
  return error;
}

/**
 * Fake fetch answering from a status table keyed by URL.
 * Unknown URLs answer 200; values that are errors are thrown instead.
 */
export function createFakeFetch(
  table: Record<string, number | Error> = {},
  delays: Record<string, number> = {},
): FakeFetch {
  const requests: RecordedRequest[] = [];

  const fetch: FetchFn = async (url, init) => {
    requests.push({ url, init });

    const delay = delays[url];
    if (delay !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delay));
    }

    const entry = table[url] ?? 200;
    if (entry instanceof Error) {
      throw entry;
    }
    const response: ProbeResponse = { status: entry, body: null };
    return response;
  };

  return { fetch, requests };
}

/**
 * Fake fetch that never answers and rejects once its signal aborts
 */
export function createHangingFetch(): FakeFetch {
  const requests: RecordedRequest[] = [];

  const fetch: FetchFn = (url, init) => {
    requests.push({ url, init });
    return new Promise<ProbeResponse>((_resolve, reject) => {
      init.signal.addEventListener("abort", () => reject(createAbortError()));
    });
  };

  return { fetch, requests };
}
