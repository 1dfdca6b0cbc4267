import axios, { AxiosInstance } from "axios";

export type LlmFailureReason = "timeout" | "network" | "http_error" | "empty_response" | "malformed_json";

export interface LlmFailure {
  reason: LlmFailureReason;
  message: string;
}

// Outcome of a call that is allowed to fail; callers decide how to degrade
export type LlmResult<T> = { success: true; data: T } | { success: false; error: LlmFailure };

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  temperature?: number;
  timeoutMs: number;
}

export interface LlmClient {
  complete(request: ChatCompletionRequest): Promise<LlmResult<string>>;
}

export interface GroqClientOptions {
  apiKey: string;
  apiUrl: string;
  model: string;
  http?: Pick<AxiosInstance, "post">;
}

interface ChatCompletionResponse {
  choices?: { message?: { content?: unknown } }[];
}

export const llmFailure = (reason: LlmFailureReason, message: string): { success: false; error: LlmFailure } => ({
  success: false,
  error: { reason, message },
});

const classifyError = (err: unknown): LlmFailure => {
  if (axios.isAxiosError(err)) {
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
      return { reason: "timeout", message: err.message };
    }
    if (err.response) {
      return { reason: "http_error", message: `HTTP ${err.response.status}: ${err.message}` };
    }
    return { reason: "network", message: err.message };
  }
  return { reason: "network", message: err instanceof Error ? err.message : String(err) };
};

/**
 * Chat-completion client for Groq's OpenAI-compatible endpoint.
 * Never throws: every failure is reported through the result.
 */
export const createGroqClient = (options: GroqClientOptions): LlmClient => {
  const http = options.http ?? axios;

  return {
    async complete(request: ChatCompletionRequest): Promise<LlmResult<string>> {
      const body: Record<string, unknown> = {
        model: options.model,
        messages: request.messages,
      };
      if (request.temperature !== undefined) {
        body.temperature = request.temperature;
      }

      try {
        const res = await http.post<ChatCompletionResponse>(options.apiUrl, body, {
          headers: {
            Authorization: `Bearer ${options.apiKey}`,
            "Content-Type": "application/json",
          },
          timeout: request.timeoutMs,
        });

        const content = res?.data?.choices?.[0]?.message?.content;
        if (typeof content !== "string" || content.trim() === "") {
          return llmFailure("empty_response", "No message content in completion response");
        }

        return { success: true, data: content };
      } catch (err) {
        const failure = classifyError(err);
        console.warn(`⚠️ Groq request failed (${failure.reason}): ${failure.message}`);
        return { success: false, error: failure };
      }
    },
  };
};
