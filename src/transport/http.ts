import { TransportError } from "../utils/errors.js";
import { transportLogger } from "../utils/logger.js";

/**
 * Cache validators a server supplied for a resource.
 * Only the ETag and Last-Modified headers are consulted.
 */
export interface RemoteValidators {
  etag: string | null;
  lastModified: string | null;
}

export interface HeadResponse {
  status: number;
  contentLength: number | null;
  validators: RemoteValidators;
}

export interface StreamResponse extends HeadResponse {
  body: AsyncIterable<Uint8Array>;
}

/**
 * Blocking-style HTTP calls made from inside workers.
 * Every call rejects with a TransportError on a non-success status or a
 * network failure.
 */
export interface HttpTransport {
  get(url: string): Promise<StreamResponse>;
  getText(url: string): Promise<string>;
  head(url: string): Promise<HeadResponse>;
}

export interface FetchTransportOptions {
  timeoutMs: number;
  userAgent: string;
}

interface HeaderSource {
  get(name: string): string | null;
}

export function readValidators(headers: HeaderSource): RemoteValidators {
  return {
    etag: headers.get("etag"),
    lastModified: headers.get("last-modified"),
  };
}

function readContentLength(headers: HeaderSource): number | null {
  const raw = headers.get("content-length");
  if (raw === null) return null;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

async function* readStream(url: string, body: ReadableStream<Uint8Array>): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  try {
    while (true) {
      let chunk: Awaited<ReturnType<typeof reader.read>>;
      try {
        chunk = await reader.read();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new TransportError("TRANSPORT.NETWORK", `Reading ${url} failed: ${message}`, null, { cause: error });
      }
      if (chunk.done) return;
      yield chunk.value;
    }
  } finally {
    reader.releaseLock();
  }
}

async function* emptyBody(): AsyncGenerator<Uint8Array> {}

export class FetchTransport implements HttpTransport {
  private timeoutMs: number;
  private userAgent: string;

  constructor(options: FetchTransportOptions) {
    this.timeoutMs = options.timeoutMs;
    this.userAgent = options.userAgent;
  }

  async get(url: string): Promise<StreamResponse> {
    const response = await this.request(url, "GET");
    // fetch inflates content-encoded bodies, so the header length no longer applies
    const encoded = response.headers.get("content-encoding") !== null;
    return {
      status: response.status,
      contentLength: encoded ? null : readContentLength(response.headers),
      validators: readValidators(response.headers),
      body: response.body ? readStream(url, response.body) : emptyBody(),
    };
  }

  async getText(url: string): Promise<string> {
    const response = await this.request(url, "GET");
    try {
      return await response.text();
    } catch (error) {
      throw this.wrap(url, error);
    }
  }

  async head(url: string): Promise<HeadResponse> {
    const response = await this.request(url, "HEAD");
    return {
      status: response.status,
      contentLength: readContentLength(response.headers),
      validators: readValidators(response.headers),
    };
  }

  private async request(url: string, method: "GET" | "HEAD"): Promise<Response> {
    transportLogger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: { "User-Agent": this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw this.wrap(url, error);
    }

    if (!response.ok) {
      transportLogger.warn("Request failed", { url, method, status: response.status });
      throw new TransportError(
        "TRANSPORT.STATUS",
        `${method} ${url} failed: ${response.status} ${response.statusText}`,
        response.status
      );
    }

    return response;
  }

  private wrap(url: string, error: unknown): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return new TransportError("TRANSPORT.TIMEOUT", `Request to ${url} timed out after ${this.timeoutMs}ms`, null, {
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError("TRANSPORT.NETWORK", `Request to ${url} failed: ${message}`, null, { cause: error });
  }
}
