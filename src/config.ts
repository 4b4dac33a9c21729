import { z } from "zod";

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const normalized = (value ?? "").trim().toLowerCase();
      if (normalized === "") return fallback;
      return !["0", "false", "no", "off"].includes(normalized);
    });

const chatId = z.coerce.number().int().default(0);

const envSchema = z.object({
  BOT_TOKEN: z.string().trim().min(1, "BOT_TOKEN is required"),
  ADMIN_CHAT_ID: chatId,
  FEEDBACK_CHAT_ID: chatId,
  SHEETS_ENABLED: flag(true),
  GSHEET_ID: z.string().trim().default(""),
  GSHEET_TAB: z.string().trim().default("Ads"),
  GOOGLE_CREDENTIALS_JSON: z.string().default(""),
  GSHEET_REFRESH_SEC: z.coerce.number().int().positive().default(120),
  ADS_ENABLED: flag(true),
  ADS_PROB: z.coerce.number().min(0).max(1).default(0.18),
  ADS_COOLDOWN_SEC: z.coerce.number().int().min(0).default(180),
  UTM_SOURCE: z.string().default("telegram"),
  UTM_MEDIUM: z.string().default("bot"),
  UTM_CAMPAIGN: z.string().default("bot_ads"),
  MEDIA_RETRY_COUNT: z.coerce.number().int().min(1).default(3),
  MEDIA_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  LEAD_RETRY_COUNT: z.coerce.number().int().min(1).default(3),
  LEAD_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  DB_PATH: z.string().default("liveplace_stats.db"),
  ZERO_PRICE_PASSES: flag(true),
  SESSION_TTL_SEC: z.coerce.number().int().min(0).default(0),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.string().default("info")
});

export type AppConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function blankToUndefined(env: Env): Env {
  return Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value === undefined || value.trim() === "" ? undefined : value])
  );
}

export function loadConfig(env: Env = process.env): AppConfig {
  const source = blankToUndefined(env);
  const token = source.BOT_TOKEN ?? source.TELEGRAM_BOT_TOKEN ?? source.API_TOKEN;
  const parsed = envSchema.safeParse({ ...source, BOT_TOKEN: token });
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
