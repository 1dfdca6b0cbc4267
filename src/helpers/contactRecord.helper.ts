import { escapeMarkdown } from "../utils/telegramText.util";

export const NOT_FOUND = "Not Found";

// Fields the regex pass owns
export interface ContactFields {
  Phone: string;
  Email: string;
  Website: string;
}

// Fields the language model owns
export interface SemanticFields {
  Name: string;
  Designation: string;
  Company: string;
  Address: string;
  Industry: string;
  Services: string;
}

export type SemanticFieldKey = keyof SemanticFields;

export interface ContactRecord extends ContactFields, SemanticFields {}

export const SEMANTIC_FIELD_KEYS: readonly SemanticFieldKey[] = [
  "Name",
  "Designation",
  "Company",
  "Address",
  "Industry",
  "Services",
];

// Display and sheet order
export const CONTACT_RECORD_KEYS: readonly (keyof ContactRecord)[] = [
  "Name",
  "Designation",
  "Company",
  "Phone",
  "Email",
  "Website",
  "Address",
  "Industry",
  "Services",
];

export const emptySemanticFields = (): SemanticFields => ({
  Name: NOT_FOUND,
  Designation: NOT_FOUND,
  Company: NOT_FOUND,
  Address: NOT_FOUND,
  Industry: NOT_FOUND,
  Services: NOT_FOUND,
});

/**
 * Coerces one value coming back from the model. Lists (models like to return Services as
 * an array) are joined; anything blank or non-textual becomes the sentinel.
 */
const toFieldValue = (value: unknown): string => {
  if (typeof value === "string") {
    return value.trim() !== "" ? value.trim() : NOT_FOUND;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (Array.isArray(value)) {
    const parts = value.filter((item): item is string => typeof item === "string" && item.trim() !== "");
    return parts.length > 0 ? parts.map((item) => item.trim()).join(", ") : NOT_FOUND;
  }
  return NOT_FOUND;
};

/**
 * Combines both extractors into one record. Total: missing or unusable AI keys become
 * "Not Found", keys outside the six AI-owned fields are ignored.
 */
export const mergeContactRecord = (
  regexFields: ContactFields,
  aiFields: Partial<Record<SemanticFieldKey, unknown>>
): Readonly<ContactRecord> => {
  return Object.freeze({
    Name: toFieldValue(aiFields.Name),
    Designation: toFieldValue(aiFields.Designation),
    Company: toFieldValue(aiFields.Company),
    Phone: regexFields.Phone,
    Email: regexFields.Email,
    Website: regexFields.Website,
    Address: toFieldValue(aiFields.Address),
    Industry: toFieldValue(aiFields.Industry),
    Services: toFieldValue(aiFields.Services),
  });
};

/**
 * One "*Key*: value" line per field, in record order, for a Markdown reply.
 */
export const formatContactSummary = (record: Readonly<ContactRecord>): string => {
  return CONTACT_RECORD_KEYS.map((key) => `*${key}*: ${escapeMarkdown(record[key])}`).join("\n");
};
