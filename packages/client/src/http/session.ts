import {
  createLogger,
  MalformedResponseError,
  NetworkError,
  type CookieJar,
} from "@talkback/shared";
import { Agent, fetch, type Dispatcher } from "undici";

const log = createLogger({ component: "http" });

/** Anything that can GET a URL and hand back parsed JSON. */
export interface JsonSession {
  getJson(url: string): Promise<unknown>;
}

export interface HttpSessionOptions {
  cookies?: CookieJar | null;
  headers?: Record<string, string>;
  /** A dispatcher owned by the caller. The session uses it but never closes it. */
  dispatcher?: Dispatcher;
}

export function formatCookieHeader(cookies: CookieJar): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

/**
 * Credentialed HTTP session. Connections are pooled per session and
 * released on close().
 */
export class HttpSession implements JsonSession {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly headers: Record<string, string>;
  private closed = false;

  constructor(options: HttpSessionOptions = {}) {
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher = options.dispatcher ?? new Agent({ keepAliveTimeout: 10_000 });

    const headers: Record<string, string> = {
      "content-type": "application/json",
      ...options.headers,
    };
    if (options.cookies && Object.keys(options.cookies).length > 0) {
      headers.cookie = formatCookieHeader(options.cookies);
    }
    this.headers = headers;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async getJson(url: string): Promise<unknown> {
    if (this.closed) {
      throw new NetworkError(`GET ${url} attempted on a closed session`, url);
    }

    log.debug({ url }, "GET");
    let res: Awaited<ReturnType<typeof fetch>>;
    try {
      res = await fetch(url, {
        method: "GET",
        headers: this.headers,
        dispatcher: this.dispatcher,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`GET ${url} failed: ${message}`, url, null, { cause: err });
    }

    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new NetworkError(
        `GET ${url} failed (${res.status} ${res.statusText}): ${body.slice(0, 500)}`,
        url,
        res.status,
      );
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`Reading body of ${url} failed: ${message}`, url, res.status, {
        cause: err,
      });
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new MalformedResponseError(
        `Response from ${url} is not JSON: ${text.slice(0, 200)}`,
        url,
        [],
        { cause: err },
      );
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
