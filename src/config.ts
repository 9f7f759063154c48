import _ from "lodash";
import process from "node:process";
import { z } from "zod";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 6.3; Win64; x64) Gecko/20100101 Firefox/53.0";

const ZodBooleanString = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["1", "0", "true", "false", "yes", "no", "on", "off"]))
  .transform((value) => ["1", "true", "yes", "on"].includes(value));

const Env = z.object({
  THUMBNAIL_DEADLINE_MS: z.coerce.number().int().positive().default(30_000),
  THUMBNAIL_CACHE_MAX_ENTRIES: z.coerce
    .number()
    .int()
    .positive()
    .default(1_000),
  THUMBNAIL_CACHE_TTL_MS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(3_600_000),
  THUMBNAIL_USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  THUMBNAIL_OEMBED_MAX_WIDTH: z.coerce.number().int().positive().default(600),
  THUMBNAIL_MIN_AREA: z.coerce.number().nonnegative().default(5_000),
  THUMBNAIL_MAX_ASPECT_RATIO: z.coerce.number().min(1).default(2),
  THUMBNAIL_SPRITE_PENALTY: z.coerce.number().positive().default(10),
  THUMBNAIL_USE_PROVIDER_SCRAPERS: ZodBooleanString.default("true"),
  LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error", "silent"])
    .default("warn"),
});

export const Config = Env.transform((env) => ({
  deadlineMs: env.THUMBNAIL_DEADLINE_MS,
  cache: {
    maxEntries: env.THUMBNAIL_CACHE_MAX_ENTRIES,
    ttlMs: env.THUMBNAIL_CACHE_TTL_MS,
  },
  userAgent: env.THUMBNAIL_USER_AGENT,
  oembedMaxWidth: env.THUMBNAIL_OEMBED_MAX_WIDTH,
  largestImage: {
    minArea: env.THUMBNAIL_MIN_AREA,
    maxAspectRatio: env.THUMBNAIL_MAX_ASPECT_RATIO,
    spritePenalty: env.THUMBNAIL_SPRITE_PENALTY,
  },
  useProviderScrapers: env.THUMBNAIL_USE_PROVIDER_SCRAPERS,
  logLevel: env.LOG_LEVEL,
}));
export type Config = z.infer<typeof Config>;

let cachedConfig: Config | undefined;

function parseEnv(env: NodeJS.ProcessEnv): Config {
  // `FOO= cmd` sets FOO to an empty string; treat it as unset
  return Config.parse(
    _.omitBy(env, (value) => value === undefined || value.trim() === ""),
  );
}

export function loadConfig(env?: NodeJS.ProcessEnv): Config {
  if (env !== undefined) {
    return parseEnv(env);
  }

  cachedConfig ??= parseEnv(process.env);

  return cachedConfig;
}

export function defaultConfig(): Config {
  return parseEnv({});
}
