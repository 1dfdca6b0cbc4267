// Load environment variables FIRST before any other imports
import dotenv from "dotenv";
dotenv.config();

import { Server } from "http";
import { google } from "googleapis";
import { Telegraf } from "telegraf";
import { createApp } from "./app";
import { config, getMissingConfigKeys } from "./config/config";
import { ensureCredentialsFile } from "./config/credentials.config";
import { CardBotController } from "./controllers/bot.controller";
import keepServerActive from "./cron/serverActive";
import { ConversationStore } from "./services/conversationStore.service";
import { ContactSheet, createGoogleSheetStore } from "./services/googleSheets.service";
import { createGroqClient } from "./services/llm.service";
import { createGoogleVisionOcrEngine } from "./services/ocr.service";
import { TelegramTransport, registerBotHandlers } from "./services/telegram.service";

const GOOGLE_SCOPES = [
  "https://www.googleapis.com/auth/spreadsheets",
  "https://www.googleapis.com/auth/cloud-vision",
];

const buildBot = (): Telegraf => {
  const keyFile = ensureCredentialsFile(config.GOOGLE_CREDENTIALS_PATH, config.GOOGLE_CREDENTIALS_BASE64);
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: GOOGLE_SCOPES });

  const bot = new Telegraf(config.TELEGRAM_BOT_TOKEN);

  const controller = new CardBotController({
    transport: new TelegramTransport(bot.telegram, config.TEMP_DIR),
    ocr: createGoogleVisionOcrEngine(auth, config.GOOGLE_API_TIMEOUT_MS),
    llm: createGroqClient({
      apiKey: config.GROQ_API_KEY,
      apiUrl: config.GROQ_API_URL,
      model: config.GROQ_MODEL,
    }),
    store: new ConversationStore(),
    sheet: new ContactSheet(createGoogleSheetStore(auth, config.GOOGLE_SHEET_ID, config.GOOGLE_API_TIMEOUT_MS)),
  });

  registerBotHandlers(bot, controller);
  return bot;
};

const startServer = async () => {
  const missing = getMissingConfigKeys(config);
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
  }

  const bot = buildBot();
  const usePolling = !config.WEBHOOK_DOMAIN;

  const app = createApp({
    webhook: usePolling
      ? undefined
      : await bot.createWebhook({ domain: config.WEBHOOK_DOMAIN, path: config.WEBHOOK_PATH }),
  });

  const server: Server = app.listen(config.PORT, () => {
    console.log(`🚀 Server is running on port ${config.PORT}`);
    console.log(`📍 Health check: http://localhost:${config.PORT}/health`);
  });

  if (usePolling) {
    bot
      .launch(() => console.log("🤖 Bot running 24×7 (long polling)"))
      .catch((error: unknown) => {
        console.error("❌ Bot polling stopped with an error:", error);
        process.exit(1);
      });
  } else {
    console.log(`🤖 Bot running 24×7 (webhook ${config.WEBHOOK_DOMAIN}${config.WEBHOOK_PATH})`);
  }

  const cronTask = keepServerActive(config.SELF_PING_URL);

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down`);
    cronTask?.stop();
    if (usePolling) {
      bot.stop(signal);
    }
    server.close();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
};

startServer().catch((error: unknown) => {
  console.error("❌ App initialization failed:", error);
  process.exit(1);
});
