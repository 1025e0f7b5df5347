import { describe, it, expect } from "vitest";
import { buildPrompt, buildRetrievalQuery } from "../src/chat/prompt.js";
import type { RetrievalResult } from "../src/retrieval/vector-store.js";
import { TEST_PERSONA } from "./helpers/fakes.js";

function chunk(chunkId: string, content: string): RetrievalResult {
  return { chunkId, content, metadata: {}, distance: 0.1 };
}

const CLOSING =
  "Please answer the user's question using the provided context. " +
  "If the context doesn't contain enough information, acknowledge this " +
  "and suggest contacting Acme Staffing directly.";

describe("buildPrompt", () => {
  // ── Full prompt ────────────────────────────────────────

  it("orders directive, context, conversation and question", () => {
    const prompt = buildPrompt({
      persona: TEST_PERSONA,
      query: "How fast?",
      chunks: [chunk("faq_0", "Q: How fast? A: Two weeks."), chunk("company_overview", "Acme.")],
      conversation: "User: hi\nAssistant: hello",
    });

    expect(prompt).toBe(
      [
        "You are the Acme assistant.",
        "Context from the Acme Staffing knowledge base:\n" +
          "[Context 1]: Q: How fast? A: Two weeks.\n\n[Context 2]: Acme.",
        "Conversation so far:\nUser: hi\nAssistant: hello",
        "User question: How fast?",
        CLOSING,
      ].join("\n\n"),
    );
  });

  // ── Empty blocks ───────────────────────────────────────

  it("leaves out context and conversation when there are none", () => {
    const prompt = buildPrompt({
      persona: TEST_PERSONA,
      query: "Hello",
      chunks: [],
      conversation: "",
    });

    expect(prompt).toBe(
      `You are the Acme assistant.\n\nUser question: Hello\n\n${CLOSING}`,
    );
  });
});

describe("buildRetrievalQuery", () => {
  it("is the bare query without history", () => {
    expect(buildRetrievalQuery("", "pricing?")).toBe("pricing?");
  });

  it("appends the query to the rendered conversation", () => {
    expect(buildRetrievalQuery("User: hi\nAssistant: hello", "pricing?")).toBe(
      "User: hi\nAssistant: hello\nUser: pricing?",
    );
  });
});
