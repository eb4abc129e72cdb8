import type { ZodType, ZodTypeDef } from "zod";
import { CancelledError, GatewayError, type GatewayOperation } from "../errors";
import { fail, ok, type GatewayResult } from "./retry";

const DEFAULT_TIMEOUT_MS = 60_000;

export interface OpenAIClientOptions {
  apiKey?: string;
  baseUrl: string;
  timeoutMs?: number;
  extraHeaders?: Record<string, string>;
}

export function trimTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

async function safeReadError(response: Response): Promise<string> {
  try {
    return (await response.text()).slice(0, 500);
  } catch {
    return "<no body>";
  }
}

/** HTTP statuses worth retrying: timeouts, conflicts, rate limits and server errors. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;
}

/**
 * Minimal JSON-over-HTTP client for OpenAI-compatible endpoints. Every call
 * resolves to a {@link GatewayResult}; only caller cancellation throws.
 */
export class OpenAIClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  public constructor(private readonly opts: OpenAIClientOptions) {
    this.baseUrl = trimTrailingSlash(opts.baseUrl);
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * POST `body` to `{baseUrl}{route}` and validate the JSON reply against `schema`.
   *
   * @throws {CancelledError} if `signal` aborts the request
   */
  public async post<T>(
    operation: GatewayOperation,
    route: string,
    body: unknown,
    schema: ZodType<T, ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<GatewayResult<T>> {
    const url = `${this.baseUrl}${route}`;
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    try {
      if (signal?.aborted) throw new CancelledError(`${operation} request`);
      const headers: Record<string, string> = {
        "Content-Type": "application/json",
        ...this.opts.extraHeaders,
      };
      if (this.opts.apiKey) headers["Authorization"] = `Bearer ${this.opts.apiKey}`;

      let response: Response;
      try {
        response = await fetch(url, {
          method: "POST",
          signal: controller.signal,
          headers,
          body: JSON.stringify(body),
        });
      } catch (e) {
        if (signal?.aborted) throw new CancelledError(`${operation} request`);
        const reason = timedOut ? `timed out after ${this.timeoutMs}ms` : `network error: ${String(e)}`;
        return fail(new GatewayError("transient", operation, `${url} ${reason}`, { cause: e }));
      }

      if (!response.ok) {
        const errorText = await safeReadError(response);
        const kind = isTransientStatus(response.status) ? "transient" : "permanent";
        return fail(
          new GatewayError(
            kind,
            operation,
            `${url} responded ${response.status} ${response.statusText} - ${errorText}`,
            { status: response.status },
          ),
        );
      }

      let json: unknown;
      try {
        json = await response.json();
      } catch (e) {
        if (signal?.aborted) throw new CancelledError(`${operation} request`);
        return fail(new GatewayError("permanent", operation, `${url} returned invalid JSON`, { cause: e }));
      }
      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        return fail(
          new GatewayError(
            "permanent",
            operation,
            `${url} returned an unexpected payload (${parsed.error.issues[0]?.message})`,
          ),
        );
      }
      return ok(parsed.data);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
