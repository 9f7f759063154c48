import type { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { HttpStatusError } from "./errors.ts";
import {
  createMockAgent,
  createTestLogger,
  html,
  HTML_HEADERS,
  png,
  PNG_HEADERS,
  StalledDispatcher,
  testConfig,
} from "./testing/fixtures.ts";
import { createCaches, ThumbnailFinder } from "./thumbnail-finder.ts";

const ORIGIN = "https://example.com";

describe("ThumbnailFinder", () => {
  let agent: MockAgent;
  let logger: ReturnType<typeof createTestLogger>;
  let finder: ThumbnailFinder;

  beforeEach(() => {
    agent = createMockAgent();
    logger = createTestLogger();
    finder = new ThumbnailFinder({
      config: testConfig(),
      logger,
      dispatcher: agent,
    });
  });

  afterEach(async () => {
    await agent.close();
  });

  function servePage(path: string, head: string, body = "") {
    let requests = 0;

    agent
      .get(ORIGIN)
      .intercept({ path })
      .reply(
        200,
        () => {
          requests++;
          return html(head, body);
        },
        HTML_HEADERS,
      )
      .persist();

    return () => requests;
  }

  describe("getThumbnailUrl", () => {
    it("returns null for missing input", async () => {
      await expect(finder.getThumbnailUrl(null)).resolves.toBeNull();
      await expect(finder.getThumbnailUrl(undefined)).resolves.toBeNull();
      await expect(finder.getThumbnailUrl("")).resolves.toBeNull();
    });

    it("refuses unsafe URLs without a request", async () => {
      const requests = servePage(
        "/",
        `<meta property="og:image" content="/a.png">`,
      );

      await expect(
        finder.getThumbnailUrl("https://user:pw@example.com/"),
      ).resolves.toBeNull();
      expect(requests()).toBe(0);
      expect(logger.warn).toHaveBeenCalledWith(
        'Refusing unsafe URL "https://user:pw@example.com/"',
      );
    });

    it("scrapes each page once", async () => {
      const requests = servePage(
        "/post",
        `<meta property="og:image" content="/og.png">`,
      );

      await expect(finder.getThumbnailUrl(`${ORIGIN}/post`)).resolves.toBe(
        "https://example.com/og.png",
      );
      await expect(finder.getThumbnailUrl(`${ORIGIN}/post`)).resolves.toBe(
        "https://example.com/og.png",
      );
      expect(requests()).toBe(1);
    });

    it("shares a scrape between concurrent callers", async () => {
      const requests = servePage(
        "/post",
        `<meta property="og:image" content="/og.png">`,
      );

      const results = await Promise.all([
        finder.getThumbnailUrl(`${ORIGIN}/post`),
        finder.getThumbnailUrl(`${ORIGIN}/post`),
        finder.getThumbnailUrl(`${ORIGIN}/post`),
      ]);

      expect(results).toEqual([
        "https://example.com/og.png",
        "https://example.com/og.png",
        "https://example.com/og.png",
      ]);
      expect(requests()).toBe(1);
    });

    it("remembers pages without a thumbnail", async () => {
      let requests = 0;

      agent
        .get(ORIGIN)
        .intercept({ path: "/gone" })
        .reply(404, () => {
          requests++;
          return "";
        })
        .persist();

      await expect(
        finder.getThumbnailUrl(`${ORIGIN}/gone`),
      ).resolves.toBeNull();
      await expect(
        finder.getThumbnailUrl(`${ORIGIN}/gone`),
      ).resolves.toBeNull();
      expect(requests).toBe(1);
      expect(finder.caches.thumbnails.has([`${ORIGIN}/gone`])).toBe(true);
    });

    it("probes candidate images once per referer", async () => {
      let imageRequests = 0;

      servePage("/a", "", `<img src="/shared.png">`);
      servePage("/b", "", `<img src="/shared.png"><img src="/shared.png">`);
      agent
        .get(ORIGIN)
        .intercept({ path: "/shared.png" })
        .reply(
          200,
          () => {
            imageRequests++;
            return png(100, 100);
          },
          PNG_HEADERS,
        )
        .persist();

      await expect(finder.getThumbnailUrl(`${ORIGIN}/a`)).resolves.toBe(
        "https://example.com/shared.png",
      );
      await expect(finder.getThumbnailUrl(`${ORIGIN}/b`)).resolves.toBe(
        "https://example.com/shared.png",
      );
      expect(imageRequests).toBe(2);
    });

    it("asks oEmbed for YouTube videos without loading the page", async () => {
      let pageRequests = 0;

      agent
        .get("https://www.youtube.com")
        .intercept({ path: (path) => path.startsWith("/watch") })
        .reply(200, () => {
          pageRequests++;
          return html("");
        })
        .persist();
      agent
        .get("https://www.youtube.com")
        .intercept({ path: (path) => path.startsWith("/oembed?") })
        .reply(
          200,
          JSON.stringify({ thumbnail_url: "https://i.ytimg.com/vi/x/0.jpg" }),
        );

      await expect(
        finder.getThumbnailUrl("https://www.youtube.com/watch?v=x"),
      ).resolves.toBe("https://i.ytimg.com/vi/x/0.jpg");
      expect(pageRequests).toBe(0);
    });

    it("gives up after the deadline and does not remember it", async () => {
      const slowFinder = new ThumbnailFinder({
        config: testConfig({ deadlineMs: 50 }),
        logger,
        dispatcher: new StalledDispatcher(),
      });

      await expect(
        slowFinder.getThumbnailUrl(`${ORIGIN}/slow`),
      ).resolves.toBeNull();
      expect(logger.error).toHaveBeenCalledWith(
        "Timed out on https://example.com/slow",
      );
      expect(slowFinder.caches.thumbnails.has([`${ORIGIN}/slow`])).toBe(false);
    });

    it("logs unexpected errors and does not remember them", async () => {
      const error = new Error("kaboom");

      servePage("/gallery", "", `<img src="/photo.png">`);
      vi.spyOn(finder, "probeSize").mockRejectedValue(error);

      await expect(
        finder.getThumbnailUrl(`${ORIGIN}/gallery`),
      ).resolves.toBeNull();
      expect(logger.error).toHaveBeenCalledWith(
        "Error fetching https://example.com/gallery",
        error,
      );
      expect(finder.caches.thumbnails.has([`${ORIGIN}/gallery`])).toBe(false);
    });

    it("can share caches between finders", async () => {
      const caches = createCaches({ maxEntries: 10 });
      const requests = servePage(
        "/post",
        `<meta property="og:image" content="/og.png">`,
      );
      const first = new ThumbnailFinder({
        config: testConfig(),
        logger,
        dispatcher: agent,
        caches,
      });
      const second = new ThumbnailFinder({
        config: testConfig(),
        logger,
        dispatcher: agent,
        caches: { thumbnails: caches.thumbnails },
      });

      await first.getThumbnailUrl(`${ORIGIN}/post`);

      await expect(second.getThumbnailUrl(`${ORIGIN}/post`)).resolves.toBe(
        "https://example.com/og.png",
      );
      expect(requests()).toBe(1);
    });
  });

  describe("fetchBytes", () => {
    it("downloads and remembers the body", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/photo.png" })
        .reply(200, png(4, 4), PNG_HEADERS);

      const first = await finder.fetchBytes(`${ORIGIN}/photo.png`);
      const second = await finder.fetchBytes(`${ORIGIN}/photo.png`);

      expect(first?.equals(png(4, 4))).toBe(true);
      expect(second).toBe(first);
    });

    it("returns null for missing input", async () => {
      await expect(finder.fetchBytes(null)).resolves.toBeNull();
    });

    it("returns null when the download fails", async () => {
      agent
        .get(ORIGIN)
        .intercept({ path: "/broken.png" })
        .reply(500, "Internal Server Error");

      await expect(
        finder.fetchBytes(`${ORIGIN}/broken.png`),
      ).resolves.toBeNull();
      expect(logger.info).toHaveBeenCalledWith(
        "Failed to fetch https://example.com/broken.png",
        expect.any(HttpStatusError),
      );
    });
  });
});
