import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const envSchema = z.object({
  LINKEDIN_EMAIL: z.string().optional(),
  LINKEDIN_PASSWORD: z.string().optional(),
  PLAYWRIGHT_HEADLESS: z.string().default("false").transform((v) => v === "true"),
  PLAYWRIGHT_SLOW_MO: z.coerce.number().default(0),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  SCRAPER_WINDOW_WIDTH: z.coerce.number().default(1200),
  SCRAPER_WINDOW_HEIGHT: z.coerce.number().default(900),
  SCRAPER_NUM_SCROLLS: z.coerce.number().default(12),
  SCRAPER_SCROLL_PAUSE_SECONDS: z.coerce.number().default(2.5),
  SCRAPER_MAX_COMMENTS: z.coerce.number().default(15),
  SCRAPER_IDLE_SCROLL_LIMIT: z.coerce.number().default(0),
  SCRAPER_AUTH_TIMEOUT_MS: z.coerce.number().default(30000),
  SCRAPER_COMMENT_WAIT_MS: z.coerce.number().default(1500),
  SCRAPER_FEED_WAIT_MS: z.coerce.number().default(10000),
  SCRAPER_OUTPUT_DIR: z.string().default("./output"),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
