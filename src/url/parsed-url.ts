import _ from "lodash";

export interface UrlParts {
  scheme: string;
  username: string | null;
  password: string | null;
  hostname: string;
  port: number | null;
  path: string;
  params: string;
  queryParameters: ReadonlyMap<string, string>;
  fragment: string;
}

// scheme, authority, path, query, fragment
const URL_REGEX =
  /^(?:([A-Za-z][A-Za-z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/;

// Schemes whose last path segment may carry `;params`.
const PARAMS_SCHEMES = new Set(["", "ftp", "http", "https", "sftp", "rtsp"]);

// Schemes that are serialized with a `//` authority marker even without a host.
const NETLOC_SCHEMES = new Set([
  "ftp",
  "http",
  "https",
  "sftp",
  "rtsp",
  "ws",
  "wss",
]);

function unquotePlus(value: string): string | null {
  try {
    return decodeURIComponent(value.replaceAll("+", " "));
  } catch {
    return null;
  }
}

/**
 * Form-style escaping of a single query key or value: unreserved characters
 * are kept, spaces become `+`, everything else is percent-encoded as UTF-8.
 *
 * Returns `null` for strings that are not valid UTF-16 (lone surrogates).
 */
export function urlEscape(value: string): string | null {
  try {
    return encodeURIComponent(value)
      .replace(
        /[!'()*]/g,
        (c) => "%" + c.charCodeAt(0).toString(16).toUpperCase(),
      )
      .replaceAll("%20", "+");
  } catch {
    return null;
  }
}

export function parseQueryString(query: string): Map<string, string> {
  const parameters = new Map<string, string>();

  for (const pair of query.split("&")) {
    if (!pair) {
      continue;
    }

    const [rawKey, ...rawValue] = pair.split("=");
    const key = unquotePlus(rawKey);
    const value = unquotePlus(rawValue.join("="));

    if (key === null || value === null) {
      continue;
    }

    parameters.set(key, value);
  }

  return parameters;
}

export function buildQueryString(
  parameters: ReadonlyMap<string, string>,
): string {
  const pairs: string[] = [];

  for (const [key, value] of parameters) {
    const escapedKey = urlEscape(key);
    const escapedValue = urlEscape(value);

    if (escapedKey === null || escapedValue === null) {
      continue;
    }

    pairs.push(`${escapedKey}=${escapedValue}`);
  }

  return pairs.join("&");
}

function splitParams(scheme: string, path: string): [string, string] {
  if (!PARAMS_SCHEMES.has(scheme)) {
    return [path, ""];
  }

  const index = path.indexOf(";", path.lastIndexOf("/") + 1);

  if (index === -1) {
    return [path, ""];
  }

  return [path.substring(0, index), path.substring(index + 1)];
}

function splitNetloc(netloc: string) {
  const at = netloc.lastIndexOf("@");
  let username: string | null = null;
  let password: string | null = null;

  if (at !== -1) {
    const userinfo = netloc.substring(0, at);
    const colon = userinfo.indexOf(":");

    if (colon === -1) {
      username = userinfo;
    } else {
      username = userinfo.substring(0, colon);
      password = userinfo.substring(colon + 1);
    }
  }

  const hostinfo = netloc.substring(at + 1);
  let hostname: string;
  let rawPort: string;

  if (hostinfo.includes("[")) {
    const bracketed = hostinfo.substring(hostinfo.indexOf("[") + 1);
    const close = bracketed.indexOf("]");

    hostname = close === -1 ? bracketed : bracketed.substring(0, close);
    const rest = close === -1 ? "" : bracketed.substring(close + 1);
    rawPort = rest.includes(":") ? rest.substring(rest.indexOf(":") + 1) : "";
  } else {
    const colon = hostinfo.indexOf(":");

    hostname = colon === -1 ? hostinfo : hostinfo.substring(0, colon);
    rawPort = colon === -1 ? "" : hostinfo.substring(colon + 1);
  }

  const port =
    /^\d{1,5}$/.test(rawPort) && Number(rawPort) <= 65535
      ? Number(rawPort)
      : null;

  return { username, password, hostname: hostname.toLowerCase(), port };
}

/**
 * Structural view of a URL that can be modified and turned back into a
 * string.
 *
 * Unlike the WHATWG `URL`, parsing does not normalize anything, so oddities
 * in the input (extra slashes, control characters, credentials) are still
 * visible to {@link isWebSafeUrl}. Instances are immutable; every `with*`
 * method returns a new one.
 */
export class ParsedUrl implements UrlParts {
  readonly scheme: string;
  readonly username: string | null;
  readonly password: string | null;
  readonly hostname: string;
  readonly port: number | null;
  readonly path: string;
  readonly params: string;
  readonly queryParameters: ReadonlyMap<string, string>;
  readonly fragment: string;

  /** The string this URL was parsed from. */
  readonly raw: string;
  /** The authority exactly as it appeared in {@link raw}. */
  readonly rawNetloc: string;

  private constructor(parts: UrlParts, raw: string, rawNetloc: string) {
    this.scheme = parts.scheme;
    this.username = parts.username;
    this.password = parts.password;
    this.hostname = parts.hostname;
    this.port = parts.port;
    this.path = parts.path;
    this.params = parts.params;
    this.queryParameters = parts.queryParameters;
    this.fragment = parts.fragment;
    this.raw = raw;
    this.rawNetloc = rawNetloc;
  }

  /** Never throws: anything unrecognizable ends up in `path`. */
  static parse(raw: string): ParsedUrl {
    const match = URL_REGEX.exec(raw) ?? [];
    const [
      ,
      rawScheme = "",
      rawNetloc = "",
      rawPath = "",
      rawQuery = "",
      rawFragment = "",
    ] = match;
    const scheme = rawScheme.toLowerCase();
    const [path, params] = splitParams(scheme, rawPath);

    return new ParsedUrl(
      {
        scheme,
        ...splitNetloc(rawNetloc),
        path,
        params,
        queryParameters: parseQueryString(rawQuery),
        fragment: rawFragment,
      },
      raw,
      rawNetloc,
    );
  }

  /** `hostname[:port]`, without credentials. */
  get netloc(): string {
    if (!this.hostname) {
      return "";
    }

    const host = this.hostname.includes(":")
      ? `[${this.hostname}]`
      : this.hostname;

    return this.port === null ? host : `${host}:${this.port}`;
  }

  withParts(changes: Partial<UrlParts>): ParsedUrl {
    return new ParsedUrl(
      {
        scheme: this.scheme,
        username: this.username,
        password: this.password,
        hostname: this.hostname,
        port: this.port,
        path: this.path,
        params: this.params,
        queryParameters: this.queryParameters,
        fragment: this.fragment,
        ...changes,
      },
      this.raw,
      this.rawNetloc,
    );
  }

  withScheme(scheme: string): ParsedUrl {
    return this.withParts({ scheme: scheme.toLowerCase() });
  }

  /**
   * Replaces the extension of the last path segment. The extension is given
   * without the leading dot; an empty string removes it.
   */
  withExtension(extension: string): ParsedUrl {
    const dirs = this.path.split("/");
    const filename = dirs.pop() ?? "";
    const pieces = filename.split(".");
    let base = pieces.length > 1 ? pieces.slice(0, -1).join(".") : filename;

    if (extension) {
      base += "." + extension;
    }

    return this.withParts({ path: [...dirs, base].join("/") });
  }

  withQuery(updates: Record<string, string | number>): ParsedUrl {
    const queryParameters = new Map(this.queryParameters);

    for (const [key, value] of Object.entries(updates)) {
      queryParameters.set(key, String(value));
    }

    return this.withParts({ queryParameters });
  }

  pathExtension(): string {
    const pieces = (this.path.split("/").at(-1) ?? "").split(".");

    return pieces.length === 1 ? "" : (pieces.at(-1) ?? "");
  }

  hasImageExtension(): boolean {
    return ["gif", "jpeg", "jpg", "png", "tiff"].includes(
      this.pathExtension().toLowerCase(),
    );
  }

  hasStaticImageExtension(): boolean {
    return ["jpeg", "jpg", "png", "tiff"].includes(
      this.pathExtension().toLowerCase(),
    );
  }

  /**
   * Loose equality: the query is compared as a set of parameters, so URLs
   * that only differ in parameter order are equivalent.
   */
  equivalentTo(other: ParsedUrl): boolean {
    return (
      this.effectiveScheme === other.effectiveScheme &&
      this.netloc === other.netloc &&
      this.normalizedPath === other.normalizedPath &&
      this.params === other.params &&
      this.fragment === other.fragment &&
      _.isEqual(
        Object.fromEntries(this.queryParameters),
        Object.fromEntries(other.queryParameters),
      )
    );
  }

  private get effectiveScheme(): string {
    return this.scheme || (this.netloc ? "http" : "");
  }

  private get normalizedPath(): string {
    return this.path.replace(/^\/{2,}/, "/");
  }

  toString(): string {
    const scheme = this.effectiveScheme;
    const netloc = this.netloc;
    let url = this.normalizedPath;

    if (this.params) {
      url += ";" + this.params;
    }

    if (netloc) {
      if (url && !url.startsWith("/")) {
        url = "/" + url;
      }

      url = "//" + netloc + url;
    } else if (NETLOC_SCHEMES.has(scheme) && (!url || url.startsWith("/"))) {
      url = "//" + url;
    }

    if (scheme) {
      url = `${scheme}:${url}`;
    }

    const query = buildQueryString(this.queryParameters);

    if (query) {
      url += "?" + query;
    }

    if (this.fragment) {
      url += "#" + this.fragment;
    }

    return url;
  }
}

export function parseUrl(raw: string): ParsedUrl {
  return ParsedUrl.parse(raw);
}
