import fs from "fs";
import path from "path";
import axios, { AxiosInstance } from "axios";
import { Telegraf, Telegram } from "telegraf";
import { message } from "telegraf/filters";
import { v4 as uuidv4 } from "uuid";
import { BOT_MESSAGES, CardBotController, ChatTransport, ReplyFormat } from "../controllers/bot.controller";
import { splitMessage } from "../utils/telegramText.util";
import { ChatId } from "./conversationStore.service";

const DOWNLOAD_TIMEOUT_MS = 30000;

export class TelegramTransport implements ChatTransport {
  constructor(
    private readonly telegram: Pick<Telegram, "sendMessage" | "getFileLink">,
    private readonly tempDir: string,
    private readonly http: Pick<AxiosInstance, "get"> = axios
  ) {}

  async reply(chatId: ChatId, text: string, format: ReplyFormat = "plain"): Promise<void> {
    const extra: { parse_mode?: "Markdown" } = format === "markdown" ? { parse_mode: "Markdown" } : {};
    for (const chunk of splitMessage(text)) {
      await this.telegram.sendMessage(chatId, chunk, extra);
    }
  }

  async downloadPhoto(fileId: string): Promise<string> {
    const link = await this.telegram.getFileLink(fileId);
    const res = await this.http.get<ArrayBuffer>(link.href, {
      responseType: "arraybuffer",
      timeout: DOWNLOAD_TIMEOUT_MS,
    });

    await fs.promises.mkdir(this.tempDir, { recursive: true });
    const filepath = path.join(this.tempDir, `${uuidv4()}.jpg`);
    await fs.promises.writeFile(filepath, Buffer.from(res.data));
    console.log(`✅ Saved temp file: ${filepath}`);

    return filepath;
  }

  async discardPhoto(filepath: string): Promise<void> {
    await fs.promises.rm(filepath, { force: true });
  }
}

interface MessageEntityLike {
  type: string;
  offset: number;
}

export const isBotCommand = (entities: readonly MessageEntityLike[] | undefined): boolean => {
  return (entities ?? []).some((entity) => entity.type === "bot_command" && entity.offset === 0);
};

/**
 * Wires Telegram updates to the controller: photos are scanned, plain text is a follow-up
 * question, commands other than /start are ignored.
 */
export const registerBotHandlers = (bot: Telegraf, controller: CardBotController): void => {
  bot.start(async (ctx) => {
    await ctx.reply(BOT_MESSAGES.WELCOME);
  });

  bot.on(message("photo"), async (ctx) => {
    const sizes = ctx.message.photo;
    const largest = sizes[sizes.length - 1];
    if (!largest) return;

    console.log(`📸 Photo received from chat ${ctx.message.chat.id}`);
    await controller.receive({ kind: "photo", chatId: ctx.message.chat.id, fileId: largest.file_id });
  });

  bot.on(message("text"), async (ctx) => {
    if (isBotCommand(ctx.message.entities)) return;
    await controller.receive({ kind: "text", chatId: ctx.message.chat.id, text: ctx.message.text });
  });

  bot.catch((error, ctx) => {
    console.error(`❌ Unhandled bot error for update ${ctx.update.update_id}:`, error);
  });
};
