/**
 * HTTP Transport Layer
 *
 * The transport is the only component that touches the network. The storage
 * client hands it a fully built request and interprets whatever comes back.
 */

import { NetworkError } from "../error/index.js";
import type { AuthProvider } from "../credentials/index.js";

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: Buffer | string;
  timeout?: number;
}

/**
 * HTTP response.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   *
   * Rejects with a {@link NetworkError} of code `DnsResolutionFailed` when the
   * target host cannot be resolved.
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Get a header value (case-insensitive).
 */
export function getHeader(response: Pick<HttpResponse, "headers">, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

const DNS_ERROR_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);

/**
 * Walk an error's `cause` chain looking for a system error code.
 */
function systemErrorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

/**
 * Header values go out as the UTF-8 bytes of the string. Fetch only accepts
 * byte strings, so each byte is carried as one Latin-1 character.
 */
function toWireHeaders(headers: Record<string, string>): Record<string, string> {
  const wire: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    wire[name] = Buffer.from(value, "utf8").toString("latin1");
  }
  return wire;
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private defaultTimeout: number;

  constructor(defaultTimeout: number = 30000) {
    this.defaultTimeout = defaultTimeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: toWireHeaders(request.headers),
        body: request.body,
        signal: AbortSignal.timeout(timeout),
      });
    } catch (error) {
      throw FetchTransport.mapError(error, timeout);
    }

    // Convert headers to plain object
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    const body = Buffer.from(await response.arrayBuffer());

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body,
    };
  }

  private static mapError(error: unknown, timeout: number): NetworkError {
    if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) {
      return new NetworkError(`Request timeout after ${timeout}ms`, "Timeout", { cause: error });
    }

    const code = systemErrorCode(error);
    const message = error instanceof Error ? error.message : String(error);
    if (code !== undefined && DNS_ERROR_CODES.has(code)) {
      return new NetworkError(`DNS resolution failed: ${code}`, "DnsResolutionFailed", { cause: error });
    }
    return new NetworkError(code ? `${message} (${code})` : message, "ConnectionFailed", { cause: error });
  }
}

/**
 * Transport decorator that attaches an OAuth2 bearer token to every request.
 */
export class AuthorizedTransport implements HttpTransport {
  constructor(
    private readonly inner: HttpTransport,
    private readonly authProvider: AuthProvider
  ) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    const token = await this.authProvider.getAccessToken();
    return this.inner.send({
      ...request,
      headers: {
        ...request.headers,
        Authorization: `Bearer ${token}`,
      },
    });
  }
}
