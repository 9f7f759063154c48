import { Buffer } from "node:buffer";
import { ParsedUrl } from "./parsed-url.ts";

/** Percent-encodes every non-ASCII character as UTF-8. */
export function cleanUrl(url: string): string {
  let cleaned = "";

  for (const char of url) {
    if (char.charCodeAt(0) < 127) {
      cleaned += char;
      continue;
    }

    for (const byte of Buffer.from(char, "utf8")) {
      cleaned += "%" + byte.toString(16).toUpperCase().padStart(2, "0");
    }
  }

  return cleaned;
}

/**
 * Gives an absolute, possibly protocol-relative, URL the given scheme:
 * `//cdn.example.com/a.png` becomes `https://cdn.example.com/a.png`.
 */
export function coerceUrlToProtocol(url: string, protocol = "http"): string {
  return ParsedUrl.parse(url).withScheme(protocol).toString();
}

export function stripWww(domain: string): string {
  if (domain.split(".").length > 2 && /^www\d*\./.test(domain)) {
    return domain.split(".").slice(1).join(".");
  }

  return domain;
}

/**
 * Canonical form used to compare links: lowercase host without `www`, and
 * the fragment dropped unless it is a `#!` route.
 */
export function baseUrl(url: string): string {
  const parsed = ParsedUrl.parse(url);

  return parsed
    .withParts({
      hostname: stripWww(parsed.hostname),
      fragment: parsed.fragment.startsWith("!") ? parsed.fragment : "",
    })
    .toString();
}

/** Resolves `relative` against `base`, or `null` if either is unusable. */
export function resolveUrl(relative: string, base: string): string | null {
  if (!URL.canParse(relative, base)) {
    return null;
  }

  return new URL(relative, base).href;
}
