import { imageSize } from "image-size";
import type { Buffer } from "node:buffer";

const mimeTypes: Record<string, string> = {
  bmp: "image/bmp",
  gif: "image/gif",
  ico: "image/x-icon",
  jpg: "image/jpeg",
  png: "image/png",
  svg: "image/svg+xml",
  tiff: "image/tiff",
  webp: "image/webp",
};

export type ImageType = {
  type: string;
  mime: string;
};

/** Detects the format of a fully downloaded image from its bytes. */
export function sniffImageType(bytes: Buffer): ImageType | null {
  let type: string | undefined;

  try {
    type = imageSize(bytes).type;
  } catch {
    return null;
  }

  if (type === undefined) {
    return null;
  }

  return {
    type,
    mime: mimeTypes[type] ?? `image/${type}`,
  };
}
