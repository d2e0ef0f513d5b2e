export interface FetchJsonResponseFixture {
  status?: number;
  body?: unknown;
  rawBody?: string;
  headers?: Record<string, string>;
  networkError?: boolean;
  hang?: boolean;
}

export interface FetchCall {
  method: string;
  url: string;
  init: RequestInit | undefined;
}

export interface FetchJsonFixture {
  fetch: typeof globalThis.fetch;
  calls: FetchCall[];
}

function normalizeInput(input: URL | RequestInfo) {
  if (typeof input === "string") {
    return input;
  }
  if (input instanceof URL) {
    return input.toString();
  }
  if (input instanceof Request) {
    return input.url;
  }
  throw new Error(`Unsupported fetch input type: ${typeof input}`);
}

function buildJsonResponse({
  status = 200,
  body = {},
  rawBody,
  headers = {}
}: FetchJsonResponseFixture) {
  return new Response(rawBody ?? JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json",
      ...headers
    }
  });
}

function abortError() {
  return new DOMException("This operation was aborted", "AbortError");
}

function waitForAbort(signal: AbortSignal | null | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(abortError());
      return;
    }
    signal.addEventListener("abort", () => reject(abortError()), { once: true });
  });
}

/**
 * Builds an in-process `fetch` stand-in. Fixtures are matched by
 * `"<METHOD> <pathname>"`, then the full URL, then the bare pathname.
 */
export function createFetchJsonFixture(
  fixtures: Record<string, FetchJsonResponseFixture>,
  fallbackFixture: FetchJsonResponseFixture = { status: 404, body: { code: "not_found" } }
): FetchJsonFixture {
  const calls: FetchCall[] = [];

  const fetchFixture: typeof globalThis.fetch = async (
    input: URL | RequestInfo,
    init?: RequestInit
  ) => {
    const url = normalizeInput(input);
    const method = (init?.method ?? "GET").toUpperCase();
    const pathname = new URL(url).pathname;
    calls.push({ method, url, init });

    const entry =
      fixtures[`${method} ${pathname}`] ?? fixtures[url] ?? fixtures[pathname] ?? fallbackFixture;

    if (entry.networkError) {
      throw new TypeError("fetch failed");
    }

    if (entry.hang) {
      return waitForAbort(init?.signal);
    }

    return buildJsonResponse(entry);
  };

  return {
    fetch: fetchFixture,
    calls
  };
}
