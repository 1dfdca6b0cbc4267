import { ContactRecord } from "../helpers/contactRecord.helper";

export type ChatId = number | string;

/**
 * Last scanned card per chat, kept in memory for the life of the process.
 *
 * One owner (the bot controller) holds the instance. There is no locking: a text message
 * racing a photo in the same chat may read the previous record, which is acceptable here.
 */
export class ConversationStore {
  private readonly records = new Map<ChatId, Readonly<ContactRecord>>();

  put(chatId: ChatId, record: Readonly<ContactRecord>): void {
    this.records.set(chatId, record);
  }

  get(chatId: ChatId): Readonly<ContactRecord> | undefined {
    return this.records.get(chatId);
  }

  get size(): number {
    return this.records.size;
  }
}
