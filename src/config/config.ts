import os from "os";

const toNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const config = {
  // Telegram
  TELEGRAM_BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN || "",

  // Groq (OpenAI-compatible chat completions)
  GROQ_API_KEY: process.env.GROQ_API_KEY || "",
  GROQ_API_URL: process.env.GROQ_API_URL || "https://api.groq.com/openai/v1/chat/completions",
  GROQ_MODEL: process.env.GROQ_MODEL || "llama3-70b-8192",

  // LLM timeouts
  EXTRACTION_TIMEOUT_MS: 20000,
  FOLLOW_UP_TIMEOUT_MS: 15000,
  EXTRACTION_TEMPERATURE: 0.2,

  // Google (Sheets + Vision share one service account)
  GOOGLE_SHEET_ID: process.env.GOOGLE_SHEET_ID || "",
  GOOGLE_CREDENTIALS_BASE64: process.env.GOOGLE_CREDENTIALS_BASE64 || "",
  GOOGLE_CREDENTIALS_PATH: process.env.GOOGLE_CREDENTIALS_PATH || "credentials.json",
  GOOGLE_API_TIMEOUT_MS: toNumber(process.env.GOOGLE_API_TIMEOUT_MS, 30000),

  // Downloaded photos land here until OCR is done with them
  TEMP_DIR: process.env.TEMP_DIR || os.tmpdir(),

  // HTTP server / webhook
  PORT: toNumber(process.env.PORT, 5000),
  WEBHOOK_DOMAIN: process.env.WEBHOOK_DOMAIN || "",
  WEBHOOK_PATH: process.env.WEBHOOK_PATH || "/telegram/webhook",

  // Keep-alive ping for free hosting tiers
  SELF_PING_URL: process.env.SELF_PING_URL || "",
};

export type AppConfig = typeof config;

const REQUIRED_KEYS = ["TELEGRAM_BOT_TOKEN", "GROQ_API_KEY", "GOOGLE_SHEET_ID"] as const;

/**
 * Lists required settings that are empty. Startup refuses to continue while any are missing.
 */
export const getMissingConfigKeys = (cfg: Pick<AppConfig, (typeof REQUIRED_KEYS)[number]>): string[] => {
  return REQUIRED_KEYS.filter((key) => !cfg[key].trim());
};
