import type { Buffer } from "node:buffer";
import { ThumbnailFinder } from "./thumbnail-finder.ts";

export { defaultConfig, loadConfig, type Config } from "./config.ts";
export {
  DeadlineExceededError,
  HttpStatusError,
  TooManyRedirectsError,
  UnsafeUrlError,
} from "./errors.ts";
export { createLogger, type Logger, type LogLevel } from "./logger.ts";
export { resolveScraper } from "./scraper.ts";
export type { ScrapeResult, ScraperVariant } from "./scraper/types.ts";
export {
  ThumbnailFinder,
  createCaches,
  type ThumbnailFinderCaches,
  type ThumbnailFinderOptions,
} from "./thumbnail-finder.ts";
export { ParsedUrl, parseUrl } from "./url/parsed-url.ts";
export { isSafeUrl, isWebSafeUrl } from "./url/safety.ts";
export {
  baseUrl,
  cleanUrl,
  coerceUrlToProtocol,
  stripWww,
} from "./url/utils.ts";
export { withDeadline } from "./utils/deadline.ts";
export { MemoCache, type MemoCacheOptions } from "./utils/memo-cache.ts";
export { sniffImageType, type ImageType } from "./utils/probe-image.ts";
export type { ImageDimensions } from "./utils/probe-image-size.ts";

let defaultFinder: ThumbnailFinder | undefined;

function getDefaultFinder(): ThumbnailFinder {
  defaultFinder ??= new ThumbnailFinder();

  return defaultFinder;
}

export function getThumbnailUrl(
  pageUrl: string | null | undefined,
): Promise<string | null> {
  return getDefaultFinder().getThumbnailUrl(pageUrl);
}

export function fetchBytes(
  url: string | null | undefined,
): Promise<Buffer | null> {
  return getDefaultFinder().fetchBytes(url);
}
