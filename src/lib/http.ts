import { TIMEOUTS } from "@/lib/constants";
import { ApiError } from "@/lib/errors";
import { FetchError, ofetch, type FetchOptions } from "ofetch";

export interface HttpRequestOptions extends FetchOptions<"json"> {
  timeoutMs?: number;
}

/** ManageIQ reports failures as `{ error: { kind, message, klass } }`. */
function serverMessage(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null || !("error" in data)) return undefined;
  const inner = data.error;
  if (typeof inner !== "object" || inner === null || !("message" in inner)) return undefined;
  return typeof inner.message === "string" ? inner.message : undefined;
}

function describeFailure(error: FetchError): string {
  const message = serverMessage(error.data);
  if (error.status && message) {
    return `HTTP ${error.status}: ${message}`;
  }
  if (error.status) {
    return `HTTP ${error.status} ${error.statusText ?? ""}`.trim();
  }
  return error.cause instanceof Error ? error.cause.message : error.message;
}

/**
 * Sends one JSON request. Never retries: mutating calls must not be repeated,
 * and a failed required read aborts the reconciliation.
 */
export async function requestJson<T>(
  url: string,
  options: HttpRequestOptions = {},
): Promise<T> {
  const { timeoutMs = TIMEOUTS.REQUEST_MS, ...fetchOptions } = options;
  const method = (fetchOptions.method ?? "GET").toUpperCase();

  try {
    return await ofetch<T, "json">(url, {
      ...fetchOptions,
      responseType: "json",
      timeout: timeoutMs,
      retry: 0,
    });
  } catch (error) {
    if (error instanceof FetchError) {
      throw new ApiError(describeFailure(error), method, url, error.status, {
        cause: error,
      });
    }
    throw new ApiError(error instanceof Error ? error.message : String(error), method, url, undefined, {
      cause: error,
    });
  }
}
