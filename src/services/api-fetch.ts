import { RemoteDataError } from "./errors.js";

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface FetchJsonOptions {
  timeoutMs: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  fetch?: FetchFn;
}

export function buildUrl(base: string, path: string, params: Record<string, string | number>): string {
  const url = new URL(`${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`);
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function describeTransportError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}

export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
  const fetchFn = options.fetch ?? globalThis.fetch;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);
  const outer = options.signal;
  const forwardAbort = () => controller.abort();
  if (outer?.aborted) {
    controller.abort();
  } else {
    outer?.addEventListener("abort", forwardAbort, { once: true });
  }

  try {
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: { Accept: "application/json", ...options.headers },
        signal: controller.signal
      });
    } catch (error) {
      if (error instanceof DOMException && error.name === "AbortError") {
        const message = outer?.aborted
          ? "Request cancelled"
          : `Request timed out after ${options.timeoutMs}ms`;
        throw new RemoteDataError(message, { kind: "transport", url, cause: error });
      }
      throw new RemoteDataError(describeTransportError(error), { kind: "transport", url, cause: error });
    }

    if (!response.ok) {
      throw new RemoteDataError(`HTTP ${response.status}: ${response.statusText}`, {
        kind: "protocol",
        url
      });
    }

    try {
      return await response.json();
    } catch (error) {
      throw new RemoteDataError("Response was not valid JSON", { kind: "protocol", url, cause: error });
    }
  } finally {
    clearTimeout(timeoutId);
    outer?.removeEventListener("abort", forwardAbort);
  }
}
