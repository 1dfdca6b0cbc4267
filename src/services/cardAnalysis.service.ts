import { config } from "../config/config";
import {
  SEMANTIC_FIELD_KEYS,
  SemanticFieldKey,
  emptySemanticFields,
} from "../helpers/contactRecord.helper";
import { LlmClient, LlmResult, llmFailure } from "./llm.service";

export type RawSemanticFields = Partial<Record<SemanticFieldKey, unknown>>;

const SYSTEM_PROMPT = "You are an expert at reading business cards.";

/**
 * Prompt for turning raw OCR text into the six descriptive fields
 */
export const buildExtractionPrompt = (ocrText: string): string => {
  return `
You are extracting information from a visiting card OCR text.

Rules:
- Use reasoning to infer fields even if labels are missing.
- Names are usually short, capitalized, near top.
- Company names are often bold, larger, or repeated.
- Address may span multiple lines.
- If multiple guesses exist, choose the most likely one.
- If absolutely impossible, return "Not Found".

Return ONLY valid JSON with exactly these keys:
${SEMANTIC_FIELD_KEYS.join(", ")}

OCR TEXT:
${ocrText}
`;
};

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

/**
 * Parses the model's reply. Markdown fences and chatter around the object are tolerated,
 * anything that is not a JSON object is reported as malformed.
 */
export const parseSemanticFields = (content: string): LlmResult<RawSemanticFields> => {
  const cleaned = content.replace(/```json|```/g, "").trim();
  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start === -1 || end < start) {
    return llmFailure("malformed_json", "No JSON object in model response");
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned.substring(start, end + 1));
  } catch (err) {
    return llmFailure("malformed_json", err instanceof Error ? err.message : String(err));
  }

  if (!isPlainObject(parsed)) {
    return llmFailure("malformed_json", "Model response is not a JSON object");
  }

  const fields: RawSemanticFields = {};
  for (const key of SEMANTIC_FIELD_KEYS) {
    if (key in parsed) {
      fields[key] = parsed[key];
    }
  }
  return { success: true, data: fields };
};

/**
 * Asks the model for the descriptive fields. Missing keys are left missing; the merge
 * step fills them in.
 */
export const requestSemanticFields = async (
  llm: LlmClient,
  ocrText: string
): Promise<LlmResult<RawSemanticFields>> => {
  console.log("🔍 Analyzing OCR text with Groq...");

  const completion = await llm.complete({
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: buildExtractionPrompt(ocrText) },
    ],
    temperature: config.EXTRACTION_TEMPERATURE,
    timeoutMs: config.EXTRACTION_TIMEOUT_MS,
  });

  if (!completion.success) {
    return completion;
  }

  const parsed = parseSemanticFields(completion.data);
  if (parsed.success) {
    console.log("✅ Groq OCR analysis succeeded");
  }
  return parsed;
};

/**
 * Same as requestSemanticFields but never fails: any error yields all six fields "Not Found".
 */
export const extractSemanticFields = async (
  llm: LlmClient,
  ocrText: string
): Promise<RawSemanticFields> => {
  const result = await requestSemanticFields(llm, ocrText);
  if (!result.success) {
    console.warn(`⚠️ AI extraction failed (${result.error.reason}), falling back to "Not Found" fields`);
    return emptySemanticFields();
  }
  return result.data;
};
