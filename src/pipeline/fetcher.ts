import type { Logger } from "pino";
import { FeedFetchError } from "../errors";
import type { FetchOptions, FetchResult } from "./types";

export const FEED_ACCEPT =
  "application/rss+xml, application/atom+xml, application/rdf+xml, application/xml;q=0.9, text/xml;q=0.9, */*;q=0.8";

const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

const TLS_CODES = new Set([
  "CERT_HAS_EXPIRED",
  "CERT_NOT_YET_VALID",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "ERR_TLS_CERT_ALTNAME_INVALID",
]);

function errorCode(err: unknown): string | null {
  let current: unknown = err;
  // undici wraps the socket error one or two levels down in `cause`
  for (let depth = 0; depth < 4 && current; depth++) {
    if (
      typeof current === "object" &&
      current !== null &&
      "code" in current &&
      typeof current.code === "string"
    ) {
      return current.code;
    }
    current = current instanceof Error ? current.cause : null;
  }
  return null;
}

/**
 * Maps a rejected `fetch` onto the fetch error taxonomy.
 */
export function classifyFetchFailure(err: unknown, timeoutMs: number): FeedFetchError {
  if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
    return new FeedFetchError("timeout", `request timed out after ${timeoutMs}ms`);
  }

  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);
  const detail = code ? `${message} (${code})` : message;

  if (code === "ECONNREFUSED") {
    return new FeedFetchError("connection_refused", detail);
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return new FeedFetchError("timeout", detail);
  }
  if (
    code &&
    (TLS_CODES.has(code) || code.startsWith("ERR_TLS") || code.startsWith("ERR_SSL"))
  ) {
    return new FeedFetchError("tls_error", detail);
  }
  return new FeedFetchError("network", detail);
}

export function isRetryable(error: FeedFetchError): boolean {
  switch (error.code) {
    case "timeout":
    case "network":
      return true;
    case "http_status":
      return error.status !== null && error.status >= 500;
    case "connection_refused":
    case "tls_error":
      return false;
  }
}

function charsetFromContentType(contentType: string | null): string | null {
  const match = contentType?.match(/charset\s*=\s*["']?([\w.:-]+)/i);
  return match?.[1] ?? null;
}

function charsetFromXmlDeclaration(bytes: Uint8Array): string | null {
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 256));
  const match = head.match(/^\s*<\?xml[^>]*encoding\s*=\s*["']([\w.:-]+)["']/);
  return match?.[1] ?? null;
}

/**
 * Decodes a feed body using the header charset, then the XML declaration,
 * then UTF-8. TextDecoder drops a leading byte-order mark.
 */
export function decodeBody(bytes: Uint8Array, contentType: string | null): string {
  const label =
    charsetFromContentType(contentType) ?? charsetFromXmlDeclaration(bytes) ?? "utf-8";
  let decoder: InstanceType<typeof TextDecoder>;
  try {
    decoder = new TextDecoder(label);
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(bytes);
}

async function attemptFetch(url: string, options: FetchOptions): Promise<FetchResult> {
  let response: Response;
  try {
    response = await fetch(url, {
      signal: AbortSignal.timeout(options.timeoutMs),
      redirect: "follow",
      headers: {
        "User-Agent": options.userAgent,
        Accept: options.accept ?? FEED_ACCEPT,
      },
    });
  } catch (err) {
    return { success: false, url, error: classifyFetchFailure(err, options.timeoutMs) };
  }

  if (!response.ok) {
    const statusText = response.statusText ? ` ${response.statusText}` : "";
    return {
      success: false,
      url,
      error: new FeedFetchError(
        "http_status",
        `HTTP ${response.status}${statusText}`,
        response.status,
      ),
    };
  }

  try {
    const contentType = response.headers.get("content-type");
    const bytes = new Uint8Array(await response.arrayBuffer());
    return {
      success: true,
      url,
      status: response.status,
      contentType,
      body: decodeBody(bytes, contentType),
    };
  } catch (err) {
    return { success: false, url, error: classifyFetchFailure(err, options.timeoutMs) };
  }
}

/**
 * Fetches a document with a per-attempt timeout. Transient failures
 * (timeouts, dropped connections, HTTP 5xx) are retried up to
 * `options.retries` times after a fixed delay; HTTP 4xx, refused
 * connections and TLS failures are returned immediately.
 */
export async function fetchFeed(
  url: string,
  options: FetchOptions,
  logger: Logger,
): Promise<FetchResult> {
  let attempt = 0;

  for (;;) {
    const result = await attemptFetch(url, options);
    if (result.success) return result;

    if (attempt >= options.retries || !isRetryable(result.error)) {
      logger.warn(
        { url, code: result.error.code, error: result.error.message, attempts: attempt + 1 },
        "feed fetch failed",
      );
      return result;
    }

    attempt++;
    logger.debug(
      { url, code: result.error.code, attempt },
      "transient fetch failure, retrying",
    );
    if (options.retryDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, options.retryDelayMs));
    }
  }
}
