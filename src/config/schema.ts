import { z } from "zod";
import cron from "node-cron";

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return true;
  } catch {
    return false;
  }
}

const stateConfigSchema = z.object({
  path: z.string().min(1).default("./data/news-monitor.json"),
  lockPath: z.string().min(1).default("./news-monitor.lock"),
  historyLimit: z.number().int().positive().default(5000),
});

const feedConfigSchema = z.object({
  searchUrl: z.string().url().default("https://news.google.com/rss/search"),
  language: z.string().min(1).default("en-US"),
  region: z.string().min(1).default("US"),
  edition: z.string().min(1).default("US:en"),
  windowDays: z.number().int().positive().default(3),
  chunkSize: z.number().int().positive().default(5),
  chunkDelayMs: z.number().int().nonnegative().default(1000),
  timeoutMs: z.number().int().positive().default(30000),
  resolveLinks: z.boolean().default(false),
  resolveTimeoutMs: z.number().int().positive().default(10000),
});

const scheduleConfigSchema = z.object({
  poll: z
    .string()
    .refine((expression) => cron.validate(expression), "invalid cron expression")
    .default("*/5 * * * *"),
  initialDelayMs: z.number().int().nonnegative().default(15000),
});

const notifyConfigSchema = z.object({
  delayMs: z.number().int().nonnegative().default(1500),
  timezone: z
    .string()
    .refine(isKnownTimeZone, "unknown IANA timezone")
    .default("America/Sao_Paulo"),
});

const unlockConfigSchema = z.object({
  mode: z.enum(["direct", "assisted"]).default("direct"),
  apiUrl: z.string().url().default("https://12ft.io/api/v1/proxy"),
  serviceUrl: z.string().url().default("https://12ft.io/"),
  timeoutMs: z.number().int().positive().default(10000),
});

const resetConfigSchema = z.object({
  countdownSeconds: z.number().int().nonnegative().default(3),
});

const telegramConfigSchema = z.object({
  apiBaseUrl: z.string().url().default("https://api.telegram.org"),
  pollTimeoutSeconds: z.number().int().nonnegative().default(30),
});

export const appConfigSchema = z.object({
  state: stateConfigSchema.default({}),
  feed: feedConfigSchema.default({}),
  schedule: scheduleConfigSchema.default({}),
  notify: notifyConfigSchema.default({}),
  unlock: unlockConfigSchema.default({}),
  reset: resetConfigSchema.default({}),
  telegram: telegramConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type FeedConfig = AppConfig["feed"];
export type UnlockConfig = AppConfig["unlock"];
