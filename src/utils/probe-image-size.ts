import probe from "probe-image-size";
import type { HttpClient } from "../http-client.ts";
import { silentLogger, type Logger } from "../logger.ts";

export const PROBE_CHUNK_SIZE = 1024;

export interface ImageDimensions {
  width: number;
  height: number;
  type?: string;
}

export interface ProbeOptions {
  http: HttpClient;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Reads just enough of a remote image to learn its pixel size.
 *
 * The body is consumed in {@link PROBE_CHUNK_SIZE} chunks and the connection
 * is dropped as soon as the header parser has an answer. Resolves to `null`
 * when the image cannot be fetched or recognized; rejects only if `signal`
 * was aborted.
 */
export default async function probeImageSize(
  url: string,
  referer: string | null,
  { http, signal, logger = silentLogger }: ProbeOptions,
): Promise<ImageDimensions | null> {
  try {
    const response = await http.open(url, {
      referer,
      signal,
      highWaterMark: PROBE_CHUNK_SIZE,
    });
    const result = await probe(response.body).finally(() => {
      response.body.destroy();
    });

    return {
      width: result.width,
      height: result.height,
      type: result.type,
    };
  } catch (error) {
    signal?.throwIfAborted();

    logger.debug(`Failed to probe image size of ${url}`, error);

    return null;
  }
}
