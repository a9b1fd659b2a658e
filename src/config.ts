import * as cheerio from "cheerio";
import cron from "node-cron";
import path from "node:path";
import { z } from "zod";

export const DEFAULT_URL =
  "https://www.psoas.fi/en/apartments/?_sfm_htyyppi=k-%2C-p-%2C-y" +
  "&_sfm_huoneistojen_tilanne=vapaa_ja_vapautumassa&_sfm_koko=7+84" +
  "&_sfm_vuokra=161+791&_sfm_huonelkm=1+7";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0 Safari/537.36";

const TRUTHY = new Set(["1", "true", "yes", "on"]);

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined ? fallback : TRUTHY.has(v.trim().toLowerCase())));

const schema = z.object({
  URL: z.string().url().default(DEFAULT_URL),
  STATE_DIR: z.string().default(".state"),
  CONTENT_SELECTOR: z
    .string()
    .default("body")
    .superRefine((v, ctx) => {
      try {
        cheerio.load("")(v);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a valid CSS selector" });
      }
    }),
  LISTING_PATH_PREFIX: z.string().startsWith("/").default("/en/apartments/"),
  IGNORE_PATTERN: z
    .string()
    .optional()
    .superRefine((v, ctx) => {
      if (v === undefined) return;
      try {
        new RegExp(v);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "not a valid regular expression" });
      }
    }),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  DIFF_MAX_LINES: z.coerce.number().int().positive().default(2000),
  NOTIFY_ON_FIRST_RUN: flag(false),
  NOTIFY_ON_CONTENT_CHANGE: flag(true),
  EMAIL_ON_ERROR: flag(false),
  TELEGRAM_ON_ERROR: flag(true),
  SMTP_SERVER: z.string().default("smtp.gmail.com"),
  SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
  SMTP_USERNAME: z.string().optional(),
  SMTP_PASSWORD: z.string().optional(),
  EMAIL_FROM: z.string().optional(),
  RECIPIENT_EMAIL: z.string().optional(),
  TELEGRAM_BOT_TOKEN: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  CRON_SCHEDULE: z
    .string()
    .default("*/10 * * * *")
    .refine((v) => cron.validate(v), { message: "not a valid cron expression" }),
});

export type AppConfig = z.infer<typeof schema>;

/**
 * Validates the environment. Blank values count as unset so that a `.env`
 * written with empty placeholders falls back to the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value.trim();
  }

  const parsed = schema.safeParse(cleaned);
  if (!parsed.success) {
    // Key names only, values may be secrets
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }

  return { ...parsed.data, STATE_DIR: path.resolve(parsed.data.STATE_DIR) };
}

export function ignorePatternOf(config: AppConfig): RegExp | undefined {
  return config.IGNORE_PATTERN === undefined ? undefined : new RegExp(config.IGNORE_PATTERN);
}
