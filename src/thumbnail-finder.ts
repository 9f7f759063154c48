import type { Buffer } from "node:buffer";
import type { Dispatcher } from "undici";
import { loadConfig, type Config } from "./config.ts";
import { DeadlineExceededError } from "./errors.ts";
import { HttpClient } from "./http-client.ts";
import { createLogger, type Logger } from "./logger.ts";
import scrape, { resolveScraper } from "./scraper.ts";
import type { ScrapeResult } from "./scraper/types.ts";
import { isSafeUrl } from "./url/safety.ts";
import { withDeadline } from "./utils/deadline.ts";
import { MemoCache, type MemoCacheOptions } from "./utils/memo-cache.ts";
import probeImageSize, {
  type ImageDimensions,
} from "./utils/probe-image-size.ts";

export interface ThumbnailFinderCaches {
  thumbnails: MemoCache<[pageUrl: string], ScrapeResult>;
  sizes: MemoCache<
    [imageUrl: string, referer: string | null],
    ImageDimensions | null
  >;
  bytes: MemoCache<[url: string], Buffer>;
}

export interface ThumbnailFinderOptions {
  config?: Config;
  logger?: Logger;
  dispatcher?: Dispatcher;
  caches?: Partial<ThumbnailFinderCaches>;
}

export function createCaches(options: MemoCacheOptions): ThumbnailFinderCaches {
  return {
    thumbnails: new MemoCache<[string], ScrapeResult>(options),
    sizes: new MemoCache<[string, string | null], ImageDimensions | null>(
      options,
    ),
    bytes: new MemoCache<[string], Buffer>(options),
  };
}

/**
 * Finds a representative image for a web page.
 *
 * Results are memoized per page, every scrape runs under its own deadline,
 * and no method ever rejects: failures are logged and come back as `null`.
 */
export class ThumbnailFinder {
  readonly config: Config;
  readonly caches: ThumbnailFinderCaches;

  private readonly logger: Logger;
  private readonly http: HttpClient;

  constructor({
    config = loadConfig(),
    logger = createLogger(config.logLevel),
    dispatcher,
    caches = {},
  }: ThumbnailFinderOptions = {}) {
    this.config = config;
    this.logger = logger;
    this.caches = { ...createCaches(config.cache), ...caches };
    this.http = new HttpClient({ userAgent: config.userAgent, dispatcher });
  }

  async getThumbnailUrl(
    pageUrl: string | null | undefined,
  ): Promise<ScrapeResult> {
    if (!pageUrl) {
      return null;
    }

    if (!isSafeUrl(pageUrl)) {
      this.logger.warn(`Refusing unsafe URL ${JSON.stringify(pageUrl)}`);
      return null;
    }

    try {
      return await this.caches.thumbnails.get([pageUrl], () =>
        withDeadline(this.config.deadlineMs, (signal) =>
          this.scrape(pageUrl, signal),
        ),
      );
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        this.logger.error(`Timed out on ${pageUrl}`);
      } else {
        this.logger.error(`Error fetching ${pageUrl}`, error);
      }

      return null;
    }
  }

  /** Raw body of `url`, for proxying the image itself. */
  async fetchBytes(url: string | null | undefined): Promise<Buffer | null> {
    if (!url) {
      return null;
    }

    try {
      return await this.caches.bytes.get([url], () =>
        withDeadline(this.config.deadlineMs, async (signal) => {
          const resource = await this.http.fetch(url, { signal });
          return resource.body;
        }),
      );
    } catch (error) {
      this.logger.info(`Failed to fetch ${url}`, error);
      return null;
    }
  }

  probeSize(
    url: string,
    referer: string | null,
    signal?: AbortSignal,
  ): Promise<ImageDimensions | null> {
    return this.caches.sizes.get([url, referer], () =>
      probeImageSize(url, referer, {
        http: this.http,
        signal,
        logger: this.logger,
      }),
    );
  }

  close(): Promise<void> {
    return this.http.close();
  }

  private scrape(pageUrl: string, signal: AbortSignal): Promise<ScrapeResult> {
    const scraper = resolveScraper(pageUrl, this.config);

    this.logger.debug(`Scraping ${pageUrl} with the ${scraper.kind} scraper`);

    return scrape(scraper, {
      http: this.http,
      logger: this.logger,
      signal,
      largestImage: this.config.largestImage,
      probeSize: (url, referer) => this.probeSize(url, referer, signal),
    });
  }
}
