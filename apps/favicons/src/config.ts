import { configDotenv } from "dotenv";
import { z } from "zod";

configDotenv();

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const configSchema = z.object({
  LOGGING_LEVEL: z.string().default("info"),
  ENV: z.string().default("development"),

  FAVICON_CACHE_DIR: z.string().default("dist/favicon"),
  FAVICON_HTML_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  FAVICON_DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FAVICON_HTML_MAX_BYTES: z.coerce.number().int().positive().default(204800),
  FAVICON_MAX_HTML_CANDIDATES: z.coerce.number().int().positive().default(10),
  FAVICON_MIN_BYTES: z.coerce.number().int().nonnegative().default(100),
  FAVICON_MAX_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  FAVICON_POLITENESS_DELAY_MS: z.coerce.number().int().nonnegative().default(100),

  FAVICON_SERVICE_URL: z
    .string()
    .url()
    .default("https://www.google.com/s2/favicons"),
  FAVICON_SERVICE_SIZE: z.coerce.number().int().positive().default(64),

  ICON_LINK_PARSER: z.enum(["cheerio", "markup"]).default("cheerio"),
  FAVICON_USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
});

export type Config = z.infer<typeof configSchema>;

export const config: Config = configSchema.parse(process.env);
