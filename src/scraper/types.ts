import type { HttpClient } from "../http-client.ts";
import type { Logger } from "../logger.ts";
import type { ImageDimensions } from "../utils/probe-image-size.ts";

/** An absolute image URL, or `null` when nothing suitable was found. */
export type ScrapeResult = string | null;

export interface ProviderScraper {
  kind: "provider";
  provider: "youtube";
  url: string;
  maxWidth: number;
}

export interface GenericScraper {
  kind: "generic";
  url: string;
  /** Scheme of the page, given to protocol-relative image URLs. */
  protocol: string;
}

export type ScraperVariant = ProviderScraper | GenericScraper;

export interface LargestImageOptions {
  minArea: number;
  maxAspectRatio: number;
  /** Area divisor for candidates with "sprite" in their URL. */
  spritePenalty: number;
}

export interface ScrapeContext {
  http: HttpClient;
  logger: Logger;
  signal?: AbortSignal;
  largestImage: LargestImageOptions;
  probeSize: (
    url: string,
    referer: string | null,
  ) => Promise<ImageDimensions | null>;
}
