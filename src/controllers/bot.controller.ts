import { ContactRecord, formatContactSummary, mergeContactRecord } from "../helpers/contactRecord.helper";
import { extractSemanticFields } from "../services/cardAnalysis.service";
import { extractContactFields } from "../services/contactExtractor.service";
import { ChatId, ConversationStore } from "../services/conversationStore.service";
import { answerFollowUp } from "../services/followUp.service";
import { ContactSheet } from "../services/googleSheets.service";
import { LlmClient } from "../services/llm.service";
import { OcrEngine, joinOcrLines } from "../services/ocr.service";

export type ReplyFormat = "plain" | "markdown";

export interface ChatTransport {
  reply(chatId: ChatId, text: string, format?: ReplyFormat): Promise<void>;
  // Returns the local path of the downloaded image
  downloadPhoto(fileId: string): Promise<string>;
  // Removes a file returned by downloadPhoto; a missing file is not an error
  discardPhoto(path: string): Promise<void>;
}

export type InboundEvent =
  | { kind: "photo"; chatId: ChatId; fileId: string }
  | { kind: "text"; chatId: ChatId; text: string };

export interface CardBotDependencies {
  transport: ChatTransport;
  ocr: OcrEngine;
  llm: LlmClient;
  store: ConversationStore;
  sheet: Pick<ContactSheet, "appendRow">;
}

export const BOT_MESSAGES = {
  PHOTO_RECEIVED: "📸 Image received & analyzing...",
  SEND_IMAGE_FIRST: "Please send a visiting card image first.",
  PROCESSING_FAILED: "⚠️ Sorry, something went wrong while processing your message. Please try again.",
  WELCOME:
    "👋 Send me a photo of a visiting card and I'll extract the contact details and save them.\n" +
    "After that, ask me anything about the company on the card.",
};

export class CardBotController {
  constructor(private readonly deps: CardBotDependencies) {}

  /**
   * Entry point for every inbound event. Failures outside the LLM calls (download, OCR,
   * sheet, send) abort this event only: they are logged and the user is told, the bot
   * keeps running.
   */
  async receive(event: InboundEvent): Promise<void> {
    try {
      if (event.kind === "photo") {
        await this.handlePhoto(event.chatId, event.fileId);
      } else {
        await this.handleText(event.chatId, event.text);
      }
    } catch (error) {
      console.error(`❌ Failed to handle ${event.kind} message for chat ${event.chatId}:`, error);
      await this.deps.transport.reply(event.chatId, BOT_MESSAGES.PROCESSING_FAILED).catch((replyError: unknown) => {
        console.error(`❌ Could not notify chat ${event.chatId} about the failure:`, replyError);
      });
    }
  }

  async handlePhoto(chatId: ChatId, fileId: string): Promise<Readonly<ContactRecord>> {
    const { transport, ocr, llm, store, sheet } = this.deps;

    await transport.reply(chatId, BOT_MESSAGES.PHOTO_RECEIVED);

    const imagePath = await transport.downloadPhoto(fileId);
    let text: string;
    try {
      text = joinOcrLines(await ocr.recognize(imagePath));
    } finally {
      await transport.discardPhoto(imagePath);
    }

    console.log("OCR RAW TEXT >>>>>>>>>>>>>>>>>>");
    console.log(text);
    console.log("<<<<<<<<<<<<<<<<<<<<<<<<<<<<<<<<");

    const contactFields = extractContactFields(text);
    const aiFields = await extractSemanticFields(llm, text);
    const record = mergeContactRecord(contactFields, aiFields);

    store.put(chatId, record);
    await sheet.appendRow(chatId, record);

    await transport.reply(chatId, formatContactSummary(record), "markdown");
    return record;
  }

  /**
   * Answers a question about the last scanned company. Returns the reply that was sent.
   */
  async handleText(chatId: ChatId, question: string): Promise<string> {
    const { transport, llm, store } = this.deps;

    const record = store.get(chatId);
    if (!record) {
      await transport.reply(chatId, BOT_MESSAGES.SEND_IMAGE_FIRST);
      return BOT_MESSAGES.SEND_IMAGE_FIRST;
    }

    console.log(`💬 Follow-up question from chat ${chatId} about ${record.Company}`);
    const answer = await answerFollowUp(llm, record, question);
    await transport.reply(chatId, answer);
    return answer;
  }
}
