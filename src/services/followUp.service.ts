import { config } from "../config/config";
import { ContactRecord } from "../helpers/contactRecord.helper";
import { LlmClient, LlmResult } from "./llm.service";

export const FOLLOW_UP_FALLBACK = "Unable to fetch information right now.";

type CompanyContext = Pick<ContactRecord, "Company" | "Industry" | "Services">;

/**
 * Only the company-level fields go to the model; personal details stay out of the prompt.
 */
export const buildFollowUpPrompt = (record: CompanyContext, question: string): string => {
  const context = `
Company: ${record.Company}
Industry: ${record.Industry}
Services: ${record.Services}
`;

  return `
You are a business analyst.
Answer using public knowledge and reasoning.
If exact data is unavailable, provide realistic estimates
and clearly state assumptions.

Context:
${context}

Question:
${question}
`;
};

export const requestFollowUp = (
  llm: LlmClient,
  record: CompanyContext,
  question: string
): Promise<LlmResult<string>> => {
  return llm.complete({
    messages: [{ role: "user", content: buildFollowUpPrompt(record, question) }],
    timeoutMs: config.FOLLOW_UP_TIMEOUT_MS,
  });
};

export const answerFollowUp = async (
  llm: LlmClient,
  record: CompanyContext,
  question: string
): Promise<string> => {
  const result = await requestFollowUp(llm, record, question);
  if (!result.success) {
    console.warn(`⚠️ Follow-up answer failed (${result.error.reason})`);
    return FOLLOW_UP_FALLBACK;
  }
  return result.data;
};
