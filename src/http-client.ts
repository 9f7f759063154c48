import { Buffer } from "node:buffer";
import { promisify } from "node:util";
import zlib from "node:zlib";
import undici, { type Dispatcher } from "undici";
import {
  HttpStatusError,
  TooManyRedirectsError,
  UnsafeUrlError,
} from "./errors.ts";
import { isSafeUrl } from "./url/safety.ts";
import { cleanUrl, resolveUrl } from "./url/utils.ts";

const gunzip = promisify(zlib.gunzip);

const MAX_REDIRECTIONS = 10;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

type IncomingHttpHeaders = Dispatcher.ResponseData["headers"];

export interface HttpClientOptions {
  userAgent: string;
  /** Defaults to a fresh `undici.Agent`. */
  dispatcher?: Dispatcher;
}

export interface RequestOptions {
  referer?: string | null;
  signal?: AbortSignal;
  /** Size of the chunks the response body is read in. */
  highWaterMark?: number;
}

export interface FetchedResource {
  url: string;
  contentType: string | undefined;
  body: Buffer;
}

export function getHeader(
  headers: IncomingHttpHeaders,
  name: string,
): string | undefined {
  const value = headers[name.toLowerCase()];

  return Array.isArray(value) ? value[0] : value;
}

/**
 * Outbound GET requests. Every URL, redirect targets included, is checked
 * with {@link isSafeUrl} and restricted to http(s) before anything touches
 * the network.
 */
export class HttpClient {
  readonly userAgent: string;

  private readonly dispatcher: Dispatcher;

  constructor({ userAgent, dispatcher }: HttpClientOptions) {
    this.userAgent = userAgent;
    this.dispatcher = dispatcher ?? new undici.Agent();
  }

  prepareUrl(url: string): string {
    if (!isSafeUrl(url)) {
      throw new UnsafeUrlError(url);
    }

    const cleaned = cleanUrl(url);

    if (!/^https?:\/\//i.test(cleaned)) {
      throw new UnsafeUrlError(url);
    }

    return cleaned;
  }

  /**
   * Starts a GET and resolves once the headers of a 2xx response are in.
   * Redirects are followed up to {@link MAX_REDIRECTIONS} hops.
   */
  async open(
    url: string,
    { referer, signal, highWaterMark }: RequestOptions = {},
  ): Promise<Dispatcher.ResponseData> {
    const headers: Record<string, string> = {
      "user-agent": this.userAgent,
      "accept-encoding": "gzip",
    };

    if (referer) {
      headers.referer = referer;
    }

    let target = this.prepareUrl(url);

    for (let hop = 0; ; hop++) {
      const response = await undici.request(target, {
        method: "GET",
        headers,
        signal,
        highWaterMark,
        dispatcher: this.dispatcher,
      });

      if (response.statusCode >= 200 && response.statusCode < 300) {
        return response;
      }

      await response.body.dump();

      const location = getHeader(response.headers, "location");

      if (!REDIRECT_STATUSES.has(response.statusCode) || !location) {
        throw new HttpStatusError(target, response.statusCode);
      }

      if (hop >= MAX_REDIRECTIONS) {
        throw new TooManyRedirectsError(url, MAX_REDIRECTIONS);
      }

      const next = resolveUrl(location, target);

      if (next === null) {
        throw new UnsafeUrlError(location);
      }

      target = this.prepareUrl(next);
    }
  }

  async fetch(url: string, options?: RequestOptions): Promise<FetchedResource> {
    const response = await this.open(url, options);
    let body: Buffer = Buffer.from(await response.body.arrayBuffer());
    const encoding = getHeader(response.headers, "content-encoding");

    if (encoding && ["gzip", "x-gzip"].includes(encoding.toLowerCase())) {
      body = await gunzip(body);
    }

    return {
      url,
      contentType: getHeader(response.headers, "content-type"),
      body,
    };
  }

  close(): Promise<void> {
    return this.dispatcher.close();
  }
}
