import { contactChannel, type Persona } from "../knowledge/persona.js";
import type { RetrievalResult } from "../retrieval/vector-store.js";

// ── Confidence ───────────────────────────────────────────

export type Confidence = "high" | "medium" | "low";

export type QueryIntent = "pricing" | "contact-request" | "open-question" | "other";

/**
 * Coverage heuristic: how many chunks came back, not how close they are.
 * 3+ → high, 2 → medium, fewer → low. Distances are ignored because the
 * embedding model's distance scale has no calibrated relevance cutoff.
 */
export function scoreConfidence(results: readonly RetrievalResult[]): Confidence {
  if (results.length >= 3) return "high";
  if (results.length === 2) return "medium";
  return "low";
}

// ── Query intent (keyword match) ─────────────────────────

const PRICING_WORDS = new Set([
  "price", "prices", "pricing", "cost", "costs", "fee", "fees",
  "rate", "rates", "quote", "budget", "expensive", "cheap", "charge",
]);

const CONTACT_WORDS = new Set([
  "contact", "email", "phone", "call", "reach", "speak", "talk",
  "meeting", "schedule", "consultation", "appointment", "human",
]);

const QUESTION_WORDS = new Set([
  "what", "how", "why", "when", "where", "who", "which", "can", "could",
  "do", "does", "is", "are", "will", "would", "should",
]);

export function classifyQuery(query: string): QueryIntent {
  const text = query.trim().toLowerCase();
  const words = text.split(/[^a-z0-9']+/).filter(Boolean);

  if (text.includes("how much") || words.some((w) => PRICING_WORDS.has(w))) {
    return "pricing";
  }
  if (words.some((w) => CONTACT_WORDS.has(w))) return "contact-request";
  if (text.endsWith("?") || QUESTION_WORDS.has(words[0] ?? "")) {
    return "open-question";
  }
  return "other";
}

// ── Fallback text ────────────────────────────────────────

/**
 * Canned reply for a query the knowledge base cannot cover, steering the
 * user to a human channel. Returns null unless confidence is low.
 */
export function selectFallback(
  query: string,
  confidence: Confidence,
  persona: Persona,
): string | null {
  if (confidence !== "low") return null;
  return fallbackMessage(classifyQuery(query), persona);
}

export function fallbackMessage(intent: QueryIntent, persona: Persona): string {
  const channel = contactChannel(persona);
  switch (intent) {
    case "pricing":
      return (
        "Pricing depends on the scope of what you need, so I'd rather not guess. " +
        `Our team can put together a tailored quote: reach us at ${channel}.`
      );
    case "contact-request":
      return (
        `I'd be happy to connect you with the ${persona.companyName} team. ` +
        `You can reach us at ${channel} and someone will get back to you shortly.`
      );
    case "open-question":
      return (
        "I don't have enough information in my knowledge base to answer that confidently. " +
        `Please contact our team at ${channel} and they'll be glad to help.`
      );
    case "other":
      return (
        `I'm not sure I can help with that. For anything about ${persona.companyName}, ` +
        `feel free to reach out at ${channel}.`
      );
  }
}
