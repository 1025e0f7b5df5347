import OpenAI from "openai";

// OpenRouter speaks the OpenAI-compatible API.
export const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export function createLlmClient(apiKey: string): OpenAI {
  return new OpenAI({
    baseURL: OPENROUTER_BASE_URL,
    apiKey,
    // Retries are handled by withRetry so backoff is logged in one place.
    maxRetries: 0,
    defaultHeaders: {
      "X-Title": "KB Concierge",
    },
  });
}
