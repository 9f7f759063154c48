import { z } from "zod";
import type {
  ProviderScraper,
  ScrapeContext,
  ScrapeResult,
} from "../scraper/types.ts";
import { ParsedUrl } from "../url/parsed-url.ts";

export const OEMBED_ENDPOINT = "https://www.youtube.com/oembed";

const URL_MATCH = /^https?:\/\/((www\.)?youtube\.com\/watch|youtu\.be\/)/;

const OEmbed = z.object({
  thumbnail_url: z.string().optional(),
});

export function canHandle(url: string): boolean {
  return URL_MATCH.test(url);
}

export function oembedUrl(url: string, maxWidth: number): string {
  return ParsedUrl.parse(OEMBED_ENDPOINT)
    .withQuery({
      url,
      format: "json",
      maxwidth: maxWidth,
    })
    .toString();
}

export async function scrape(
  { url, maxWidth }: ProviderScraper,
  { http, logger, signal }: ScrapeContext,
): Promise<ScrapeResult> {
  let json: unknown;

  try {
    const response = await http.fetch(oembedUrl(url, maxWidth), { signal });
    json = JSON.parse(response.body.toString("utf8"));
  } catch (error) {
    signal?.throwIfAborted();
    logger.info(`Failed to fetch oEmbed data for ${url}`, error);
    return null;
  }

  const result = OEmbed.safeParse(json);

  if (!result.success) {
    logger.info(`Unexpected oEmbed response for ${url}`, result.error);
    return null;
  }

  return result.data.thumbnail_url || null;
}
