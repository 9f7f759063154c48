import iconv from "iconv-lite";
import type { Buffer } from "node:buffer";

const HEADER_CHARSET = /charset=["']?([^;"'\s]+)/i;

// <meta charset="..."> or <meta http-equiv="content-type" content="...; charset=...">
const META_CHARSET = /<meta[^>]+charset\s*=\s*["']?([^"'\s/>;]+)/i;

const SNIFF_BYTES = 1024;

function usableCharset(charset: string | undefined): string | null {
  const normalized = charset?.trim().toLowerCase();

  return normalized && iconv.encodingExists(normalized) ? normalized : null;
}

/**
 * Charset of an HTML document: the `content-type` header wins, then a
 * `<meta>` declaration near the top of the document, then UTF-8.
 */
export function detectCharset(
  body: Buffer,
  contentType: string | undefined,
): string {
  const fromHeader = usableCharset(
    HEADER_CHARSET.exec(contentType ?? "")?.[1],
  );

  if (fromHeader) {
    return fromHeader;
  }

  const head = body.subarray(0, SNIFF_BYTES).toString("latin1");

  return usableCharset(META_CHARSET.exec(head)?.[1]) ?? "utf-8";
}

export function decodeHtml(
  body: Buffer,
  contentType: string | undefined,
): string {
  const charset = detectCharset(body, contentType);

  if (charset === "utf-8" || charset === "utf8") {
    return body.toString("utf8");
  }

  return iconv.decode(body, charset);
}
