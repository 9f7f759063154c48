import { ParsedUrl } from "./parsed-url.ts";

export const VALID_SCHEMES: ReadonlySet<string> = new Set([
  "http",
  "https",
  "ftp",
  "mailto",
]);

// Characters that different URL parsers disagree about. A space only matters
// directly before the scheme.
const PROBLEMATIC_CHARACTERS =
  /^\x20|[\x00-\x1f\xa0\u1680\u180e\u2000-\u2029\u205f\u3000\\]/g;

function hasProblematicCharacters(raw: string): boolean {
  for (const match of raw.matchAll(PROBLEMATIC_CHARACTERS)) {
    // Non-breaking spaces show up in title slugs; after the third slash they
    // are past the authority and parsers agree on them.
    if (match[0] === "\xa0" && countSlashes(raw, match.index ?? 0) >= 3) {
      continue;
    }

    return true;
  }

  return false;
}

function countSlashes(raw: string, end: number): number {
  return raw.substring(0, end).split("/").length - 1;
}

function passesChecks(url: ParsedUrl): boolean {
  if (url.raw.startsWith("///")) {
    return false;
  }

  if (!url.hostname && url.path.startsWith("//")) {
    return false;
  }

  // `https:/baz` or `https:?quux`
  if (url.scheme && !url.hostname) {
    return false;
  }

  if (url.rawNetloc.includes("@")) {
    return false;
  }

  if (url.scheme && !VALID_SCHEMES.has(url.scheme.toLowerCase())) {
    return false;
  }

  return !hasProblematicCharacters(url.raw);
}

/**
 * Whether the URL can be handed to a browser or an HTTP client without the
 * two parsing it differently.
 *
 * The checks run twice: on the URL as given and on the result of
 * serializing and re-parsing it, since serialization can both hide and
 * introduce a bad form. Both have to pass.
 */
export function isWebSafeUrl(url: ParsedUrl): boolean {
  return (
    passesChecks(url) && passesChecks(ParsedUrl.parse(url.toString()))
  );
}

export function isSafeUrl(raw: string): boolean {
  return isWebSafeUrl(ParsedUrl.parse(raw));
}
