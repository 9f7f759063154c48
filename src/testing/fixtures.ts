import { Buffer } from "node:buffer";
import { Dispatcher, MockAgent } from "undici";
import { vi } from "vitest";
import { defaultConfig, type Config } from "../config.ts";
import { HttpClient } from "../http-client.ts";
import { silentLogger, type Logger } from "../logger.ts";
import type { ScrapeContext } from "../scraper/types.ts";
import probeImageSize from "../utils/probe-image-size.ts";

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * A PNG signature and IHDR chunk for the given size, padded so the body
 * spans several probe chunks. Enough for header parsers, not for decoders.
 */
export function png(width: number, height: number): Buffer {
  const header = Buffer.alloc(33);

  Buffer.from(PNG_SIGNATURE).copy(header, 0);
  header.writeUInt32BE(13, 8);
  header.write("IHDR", 12, "latin1");
  header.writeUInt32BE(width, 16);
  header.writeUInt32BE(height, 20);
  header[24] = 8;
  header[25] = 6;

  return Buffer.concat([header, Buffer.alloc(4096)]);
}

export function html(head: string, body = ""): string {
  return `<!doctype html><html><head>${head}</head><body>${body}</body></html>`;
}

export const HTML_HEADERS = {
  headers: { "content-type": "text/html; charset=utf-8" },
};

export const PNG_HEADERS = {
  headers: { "content-type": "image/png" },
};

export function createMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();

  return agent;
}

/** A server that accepts the request and never answers. */
export class StalledDispatcher extends Dispatcher {
  dispatch(): boolean {
    return true;
  }
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return { ...defaultConfig(), logLevel: "silent", ...overrides };
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function createScrapeContext(
  dispatcher: Dispatcher,
  overrides: Partial<ScrapeContext> = {},
): ScrapeContext {
  const http = new HttpClient({
    userAgent: defaultConfig().userAgent,
    dispatcher,
  });

  return {
    http,
    logger: silentLogger,
    largestImage: defaultConfig().largestImage,
    probeSize: (url, referer) => probeImageSize(url, referer, { http }),
    ...overrides,
  };
}
