export interface JsonHttpResponse {
  status: number;
  text: string;
  json: unknown;
}

export type HttpMethod = "GET" | "POST" | "DELETE";

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

function createTimeoutAbortController(timeoutMs: number): { controller: AbortController; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  return {
    controller,
    cleanup: () => {
      clearTimeout(timeout);
    }
  };
}

export async function requestJsonWithTimeout(params: {
  method: HttpMethod;
  url: string;
  body?: Record<string, unknown>;
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}): Promise<JsonHttpResponse> {
  const timeout = createTimeoutAbortController(params.timeoutMs);
  const fetchImpl = params.fetchImpl ?? fetch;

  try {
    const response = await fetchImpl(params.url, {
      method: params.method,
      headers: {
        accept: "application/json",
        ...(params.body !== undefined ? { "content-type": "application/json" } : {}),
        ...params.headers
      },
      body: params.body !== undefined ? JSON.stringify(params.body) : undefined,
      signal: timeout.controller.signal
    });

    const text = await response.text();
    return {
      status: response.status,
      text,
      json: parseJson(text)
    };
  } finally {
    timeout.cleanup();
  }
}
