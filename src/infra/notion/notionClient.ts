import { PermanentFetchError, TransientFetchError } from "../../models/errorCodes.js";
import { queryResponseSchema, type QueryResponse } from "./properties.js";

export const NOTION_PAGE_SIZE = 100;

const TRANSIENT_STATUSES = new Set([408, 409, 429]);

export interface NotionClientOptions {
  apiKey?: string;
  apiUrl: string;
  apiVersion: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

export interface DatabaseQuery {
  filter?: Record<string, unknown>;
  startCursor?: string | null;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function upstreamMessage(body: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === "object" && parsed !== null && "message" in parsed && typeof parsed.message === "string") {
      return parsed.message;
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * Minimal Notion REST client: one database query per call. Failures are thrown as
 * TransientFetchError or PermanentFetchError so callers never inspect raw responses.
 */
export class NotionClient {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: NotionClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async queryDatabase(databaseId: string, query: DatabaseQuery = {}): Promise<QueryResponse> {
    if (!this.options.apiKey) {
      throw new PermanentFetchError("Upstream API key is not configured", { cause: "missing_credential" });
    }

    const body: Record<string, unknown> = { page_size: NOTION_PAGE_SIZE };
    if (query.filter) {
      body.filter = query.filter;
    }
    if (query.startCursor) {
      body.start_cursor = query.startCursor;
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(`${this.options.apiUrl}/databases/${encodeURIComponent(databaseId)}/query`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Notion-Version": this.options.apiVersion,
          "Content-Type": "application/json"
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs)
      });
      // The timeout signal also covers the body, which can fail after the headers.
      text = await response.text();
    } catch (error) {
      throw this.transportError(error);
    }

    if (!response.ok) {
      const status = response.status;
      const message = upstreamMessage(text) ?? `HTTP ${status}`;
      if (TRANSIENT_STATUSES.has(status) || status >= 500) {
        throw new TransientFetchError(`Upstream responded ${status}: ${message}`, {
          cause: status === 429 ? "rate_limited" : "upstream_unavailable",
          httpStatus: status,
          retryAfterSeconds: parseRetryAfter(response.headers.get("retry-after"))
        });
      }
      throw new PermanentFetchError(`Upstream rejected the request with ${status}: ${message}`, {
        cause: status === 401 || status === 403 ? "unauthorized" : status === 404 ? "not_found" : "bad_request",
        httpStatus: status
      });
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch {
      throw new TransientFetchError("Upstream returned a body that is not JSON", {
        cause: "invalid_json",
        httpStatus: response.status
      });
    }

    const parsed = queryResponseSchema.safeParse(decoded);
    if (!parsed.success) {
      throw new PermanentFetchError(`Upstream response has an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
        cause: "unexpected_shape",
        httpStatus: response.status
      });
    }
    return parsed.data;
  }

  private transportError(error: unknown): TransientFetchError {
    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return new TransientFetchError(`Upstream request timed out after ${this.options.timeoutMs}ms`, {
        cause: "timeout"
      });
    }
    return new TransientFetchError(`Upstream request failed: ${error instanceof Error ? error.message : String(error)}`, {
      cause: "network_error"
    });
  }
}
