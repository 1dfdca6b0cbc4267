/**
 * Google Sheets persistence
 *
 * - SpreadsheetStore: the three primitives the bot needs from a sheet
 * - GoogleSheetStore: SpreadsheetStore on the first tab of a Google Spreadsheet
 * - ContactSheet: append-only log of scanned cards, writes the header row on first use
 */

import { Auth, google, sheets_v4 } from "googleapis";
import { CONTACT_RECORD_KEYS, ContactRecord } from "../helpers/contactRecord.helper";
import { formatTimestamp } from "../utils/timestamp.util";
import { ChatId } from "./conversationStore.service";

export interface SpreadsheetStore {
  appendRow(values: string[]): Promise<void>;
  readCell(row: number, col: number): Promise<string | undefined>;
  rowCount(): Promise<number>;
}

export const SHEET_HEADER = [
  "Timestamp (IST)",
  "Telegram_ID",
  ...CONTACT_RECORD_KEYS,
];

/**
 * Converts a 1-based column number to its A1 letters (1 -> A, 27 -> AA)
 */
export const columnToLetters = (col: number): string => {
  let letters = "";
  let n = col;
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
};

// The slice of the Sheets v4 client GoogleSheetStore calls
export type SheetsClient = {
  spreadsheets: Pick<sheets_v4.Resource$Spreadsheets, "get"> & {
    values: Pick<sheets_v4.Resource$Spreadsheets$Values, "append" | "get">;
  };
};

const quoteSheetTitle = (title: string): string => `'${title.replace(/'/g, "''")}'`;

export class GoogleSheetStore implements SpreadsheetStore {
  private firstSheetTitle: string | null = null;

  constructor(
    private readonly sheets: SheetsClient,
    private readonly spreadsheetId: string,
    private readonly timeoutMs: number
  ) {}

  private async getFirstSheet(): Promise<sheets_v4.Schema$SheetProperties> {
    const res = await this.sheets.spreadsheets.get(
      { spreadsheetId: this.spreadsheetId, fields: "sheets.properties" },
      { timeout: this.timeoutMs }
    );

    const properties = res.data.sheets?.[0]?.properties;
    if (!properties?.title) {
      throw new Error(`Spreadsheet ${this.spreadsheetId} has no sheets`);
    }
    this.firstSheetTitle = properties.title;
    return properties;
  }

  private async getTitle(): Promise<string> {
    if (this.firstSheetTitle) {
      return this.firstSheetTitle;
    }
    const properties = await this.getFirstSheet();
    return properties.title ?? "";
  }

  async appendRow(values: string[]): Promise<void> {
    const title = await this.getTitle();
    await this.sheets.spreadsheets.values.append(
      {
        spreadsheetId: this.spreadsheetId,
        range: `${quoteSheetTitle(title)}!A1`,
        valueInputOption: "RAW",
        insertDataOption: "INSERT_ROWS",
        requestBody: { values: [values] },
      },
      { timeout: this.timeoutMs }
    );
  }

  async readCell(row: number, col: number): Promise<string | undefined> {
    const title = await this.getTitle();
    const res = await this.sheets.spreadsheets.values.get(
      {
        spreadsheetId: this.spreadsheetId,
        range: `${quoteSheetTitle(title)}!${columnToLetters(col)}${row}`,
      },
      { timeout: this.timeoutMs }
    );

    const value: unknown = res.data.values?.[0]?.[0];
    return value === undefined || value === null ? undefined : String(value);
  }

  // Grid size of the first sheet, not the number of filled rows
  async rowCount(): Promise<number> {
    const properties = await this.getFirstSheet();
    return properties.gridProperties?.rowCount ?? 0;
  }
}

export const createGoogleSheetStore = (
  auth: Auth.GoogleAuth,
  spreadsheetId: string,
  timeoutMs: number
): GoogleSheetStore => {
  const sheets = google.sheets({ version: "v4", auth });
  return new GoogleSheetStore(sheets, spreadsheetId, timeoutMs);
};

export const buildSheetRow = (chatId: ChatId, record: Readonly<ContactRecord>, at: Date): string[] => {
  return [formatTimestamp(at), String(chatId), ...CONTACT_RECORD_KEYS.map((key) => record[key])];
};

export class ContactSheet {
  private headerReady: Promise<void> | null = null;

  constructor(
    private readonly store: SpreadsheetStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async appendRow(chatId: ChatId, record: Readonly<ContactRecord>): Promise<void> {
    await this.ensureHeader();
    await this.store.appendRow(buildSheetRow(chatId, record, this.now()));
    console.log(`✅ Saved card for chat ${chatId} to Google Sheet`);
  }

  // Concurrent first calls share one check; a failed check is retried on the next call
  private ensureHeader(): Promise<void> {
    if (!this.headerReady) {
      this.headerReady = this.writeHeaderIfEmpty().catch((error: unknown) => {
        this.headerReady = null;
        throw error;
      });
    }
    return this.headerReady;
  }

  private async writeHeaderIfEmpty(): Promise<void> {
    const rows = await this.store.rowCount();
    const firstCell = rows === 0 ? undefined : await this.store.readCell(1, 1);

    if (rows === 0 || firstCell === undefined || firstCell.trim() === "") {
      await this.store.appendRow([...SHEET_HEADER]);
      console.log("🧾 Header row written to empty sheet");
    }
  }
}
