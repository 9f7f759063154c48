import fs from "node:fs";
import process from "node:process";
import util from "node:util";
import { loadConfig } from "./config.ts";
import { ThumbnailFinder } from "./thumbnail-finder.ts";
import { sniffImageType } from "./utils/probe-image.ts";

const { values: args, positionals: pageUrls } = util.parseArgs({
  args: process.argv.slice(2),
  allowPositionals: true,
  options: {
    output: {
      type: "string",
      short: "o",
    },
    verbose: {
      type: "boolean",
      short: "v",
    },
  },
});

if (!pageUrls.length) {
  console.error("Usage:");
  console.error("- cli.ts <page url> [<page url>]... [--verbose]");
  console.error("- cli.ts <page url> --output <file>");
  process.exit(1);
}

if (args.output !== undefined && pageUrls.length !== 1) {
  console.error("Invalid usage: --output takes exactly one page url");
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  console.error(reason);
});

const config = loadConfig();
const finder = new ThumbnailFinder({
  config: args.verbose ? { ...config, logLevel: "debug" } : config,
});

try {
  for (const pageUrl of pageUrls) {
    const thumbnailUrl = await finder.getThumbnailUrl(pageUrl);

    console.log(thumbnailUrl ?? "null");

    if (args.output === undefined) {
      continue;
    }

    const bytes = await finder.fetchBytes(thumbnailUrl);

    if (!bytes) {
      console.error("Failed to download the thumbnail");
      process.exitCode = 1;
      continue;
    }

    await fs.promises.writeFile(args.output, bytes);

    const imageType = sniffImageType(bytes);

    console.error(
      `Wrote ${bytes.length} bytes (${imageType?.mime ?? "unknown type"}) to ${args.output}`,
    );
  }
} finally {
  await finder.close();
}
