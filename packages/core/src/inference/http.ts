export interface JsonHttpResponse {
  status: number;
  text: string;
  json: unknown;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpTransportFailure = "timeout" | "aborted" | "network";

/** Thrown when no HTTP response arrived at all. */
export class HttpTransportError extends Error {
  constructor(
    public readonly reason: HttpTransportFailure,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HttpTransportError";
  }
}

function parseJson(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function createTimeoutAbortController(params: {
  timeoutMs: number;
  signal?: AbortSignal;
}): { controller: AbortController; timedOut: () => boolean; cleanup: () => void } {
  const controller = new AbortController();
  let expired = false;
  const timeout = setTimeout(() => {
    expired = true;
    controller.abort();
  }, params.timeoutMs);

  const onAbort = (): void => {
    controller.abort();
  };
  if (params.signal?.aborted) {
    controller.abort();
  } else {
    params.signal?.addEventListener("abort", onAbort);
  }

  return {
    controller,
    timedOut: () => expired,
    cleanup: () => {
      clearTimeout(timeout);
      params.signal?.removeEventListener("abort", onAbort);
    }
  };
}

export async function requestJsonWithTimeout(params: {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  body?: Record<string, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}): Promise<JsonHttpResponse> {
  const fetchImpl = params.fetchImpl ?? fetch;
  const timeout = createTimeoutAbortController({
    timeoutMs: params.timeoutMs,
    signal: params.signal
  });

  try {
    const response = await fetchImpl(params.url, {
      method: params.method,
      headers: {
        ...(params.body ? { "content-type": "application/json" } : {}),
        ...params.headers
      },
      body: params.body ? JSON.stringify(params.body) : undefined,
      signal: timeout.controller.signal
    });

    const text = await response.text();
    return {
      status: response.status,
      text,
      json: parseJson(text)
    };
  } catch (error) {
    if (timeout.timedOut()) {
      throw new HttpTransportError("timeout", `Request to ${params.url} timed out after ${params.timeoutMs}ms`, {
        cause: error
      });
    }
    if (params.signal?.aborted) {
      throw new HttpTransportError("aborted", `Request to ${params.url} was cancelled`, { cause: error });
    }
    const detail = error instanceof Error ? error.message : String(error);
    throw new HttpTransportError("network", `Request to ${params.url} failed: ${detail}`, { cause: error });
  } finally {
    timeout.cleanup();
  }
}

export async function postJsonWithTimeout(params: {
  url: string;
  headers?: Record<string, string>;
  body: Record<string, unknown>;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}): Promise<JsonHttpResponse> {
  return await requestJsonWithTimeout({ ...params, method: "POST" });
}

export async function getJsonWithTimeout(params: {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}): Promise<JsonHttpResponse> {
  return await requestJsonWithTimeout({ ...params, method: "GET" });
}
