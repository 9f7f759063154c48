import { match } from "ts-pattern";
import type {
  ScrapeContext,
  ScrapeResult,
  ScraperVariant,
} from "./scraper/types.ts";
import * as Generic from "./scrapers/generic.ts";
import * as YouTube from "./scrapers/youtube.ts";
import { ParsedUrl } from "./url/parsed-url.ts";

export interface ResolveScraperOptions {
  oembedMaxWidth: number;
  useProviderScrapers: boolean;
}

export function resolveScraper(
  url: string,
  { oembedMaxWidth, useProviderScrapers }: ResolveScraperOptions,
): ScraperVariant {
  if (useProviderScrapers && YouTube.canHandle(url)) {
    return {
      kind: "provider",
      provider: "youtube",
      url,
      maxWidth: oembedMaxWidth,
    };
  }

  return {
    kind: "generic",
    url,
    protocol: ParsedUrl.parse(url).scheme || "http",
  };
}

export default function scrape(
  scraper: ScraperVariant,
  context: ScrapeContext,
): Promise<ScrapeResult> {
  return match(scraper)
    .with({ kind: "provider", provider: "youtube" }, (youtube) =>
      YouTube.scrape(youtube, context),
    )
    .with({ kind: "generic" }, (generic) => Generic.scrape(generic, context))
    .exhaustive();
}
