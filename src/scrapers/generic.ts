import * as cheerio from "cheerio";
import _ from "lodash";
import type { FetchedResource } from "../http-client.ts";
import type {
  GenericScraper,
  ScrapeContext,
  ScrapeResult,
} from "../scraper/types.ts";
import { isSafeUrl } from "../url/safety.ts";
import { coerceUrlToProtocol, resolveUrl } from "../url/utils.ts";
import { decodeHtml } from "../utils/charset.ts";

interface Page {
  url: string;
  protocol: string;
  $: cheerio.CheerioAPI;
}

type Heuristic = (page: Page, context: ScrapeContext) => Promise<ScrapeResult>;

const OPEN_GRAPH_SELECTORS = [
  "meta[property='og:image']",
  "meta[name='og:image']",
  "meta[property='og:image:url']",
  "meta[name='og:image:url']",
];

const heuristics: [name: string, heuristic: Heuristic][] = [
  ["Open Graph image", scrapeOpenGraphImage],
  ["image_src link", scrapeThumbnailLink],
  ["largest image", findLargestImage],
];

export async function scrape(
  { url, protocol }: GenericScraper,
  context: ScrapeContext,
): Promise<ScrapeResult> {
  const { http, logger, signal } = context;
  let resource: FetchedResource;

  try {
    resource = await http.fetch(url, { signal });
  } catch (error) {
    signal?.throwIfAborted();
    logger.info(`Failed to fetch ${url}`, error);
    return null;
  }

  const contentType = resource.contentType?.toLowerCase() ?? "";

  if (!resource.body.length) {
    return null;
  }

  // the link points straight at an image
  if (contentType.includes("image")) {
    return url;
  }

  if (!contentType.includes("html")) {
    return null;
  }

  const page: Page = {
    url,
    protocol,
    $: cheerio.load(decodeHtml(resource.body, resource.contentType)),
  };

  for (const [name, heuristic] of heuristics) {
    logger.debug(`Trying ${name} on ${url}`);

    const result = await heuristic(page, context);

    if (result !== null) {
      return result;
    }
  }

  return null;
}

function absolutify(page: Page, relative: string, context: ScrapeContext) {
  const absolute = resolveUrl(relative, page.url);

  if (absolute === null || !isSafeUrl(absolute)) {
    context.logger.debug(`Ignoring unusable URL ${JSON.stringify(relative)}`);
    return null;
  }

  return absolute;
}

async function scrapeOpenGraphImage(
  page: Page,
  context: ScrapeContext,
): Promise<ScrapeResult> {
  const { $ } = page;
  const meta = OPEN_GRAPH_SELECTORS.map((selector) =>
    $(selector).first(),
  ).find((element) => element.length > 0);
  const content = meta?.attr("content")?.trim();

  return content ? absolutify(page, content, context) : null;
}

async function scrapeThumbnailLink(
  page: Page,
  context: ScrapeContext,
): Promise<ScrapeResult> {
  const href = page.$("link[rel~='image_src']").first().attr("href")?.trim();

  return href ? absolutify(page, href, context) : null;
}

function extractImageUrls({ $, url, protocol }: Page): string[] {
  return $("img[src]")
    .map((_index, element) => {
      const src = $(element).attr("src")?.trim();

      if (!src) {
        return null;
      }

      // protocol-relative
      if (src.startsWith("//")) {
        return coerceUrlToProtocol(src, protocol);
      }

      return resolveUrl(src, url);
    })
    .toArray();
}

/**
 * No guidance from the author: probe every `<img>` and pick the one with the
 * largest area, ignoring small images, very long or wide ones, and
 * penalizing sprite sheets.
 */
async function findLargestImage(
  page: Page,
  { probeSize, logger, largestImage }: ScrapeContext,
): Promise<ScrapeResult> {
  const { minArea, maxAspectRatio, spritePenalty } = largestImage;
  const candidates: { url: string; score: number }[] = [];

  for (const imageUrl of extractImageUrls(page)) {
    const size = await probeSize(imageUrl, page.url);

    if (!size) {
      logger.debug(`Ignoring unsized image ${imageUrl}`);
      continue;
    }

    const { width, height } = size;
    let score = width * height;

    if (score < minArea) {
      logger.debug(`Ignoring little image ${imageUrl} (${width}x${height})`);
      continue;
    }

    if (Math.max(width, height) / Math.min(width, height) > maxAspectRatio) {
      logger.debug(`Ignoring dimensions of ${imageUrl} (${width}x${height})`);
      continue;
    }

    if (imageUrl.toLowerCase().includes("sprite")) {
      logger.debug(`Penalizing sprite ${imageUrl}`);
      score /= spritePenalty;
    }

    if (score > 0) {
      candidates.push({ url: imageUrl, score });
    }
  }

  const best = _.maxBy(candidates, "score");

  logger.debug(`Largest image on ${page.url}: ${best?.url ?? "none"}`);

  return best?.url ?? null;
}
