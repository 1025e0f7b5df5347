import type {
  AnalyticsEvent,
  AnalyticsRecorder,
  AnalyticsSummary,
  Outcome,
} from "../analytics/recorder.js";
import type { ResponseCache } from "../cache/response-cache.js";
import { SessionNotFoundError, describeError } from "../errors.js";
import { contactChannel, type Persona } from "../knowledge/persona.js";
import type { Generator } from "../llm/generator.js";
import { moduleLogger } from "../logger.js";
import { Err, Ok, type Result } from "../result.js";
import type { Retriever } from "../retrieval/retriever.js";
import type { RetrievalResult } from "../retrieval/vector-store.js";
import type { SessionStore } from "../session/store.js";
import { scoreConfidence, selectFallback, type Confidence } from "./confidence.js";
import { buildPrompt, buildRetrievalQuery } from "./prompt.js";

const log = moduleLogger("orchestrator");

// ── Types ────────────────────────────────────────────────

export interface ChatRequest {
  query: string;
  sessionId?: string;
  /** Defaults to true. Only standalone (history-free) questions ever touch the cache. */
  useCache?: boolean;
}

export interface ChatAnswer {
  response: string;
  sessionId: string;
  cached: boolean;
  confidence: Confidence;
  sourcesUsed: number;
  /** Ids of the chunks the answer was grounded on. */
  sources: string[];
}

export interface OrchestratorDeps {
  sessions: SessionStore;
  cache: ResponseCache;
  analytics: AnalyticsRecorder;
  retriever: Retriever;
  generator: Generator;
  persona: Persona;
  topK: number;
  now?: () => number;
}

/** User-safe reply when generation (or anything unexpected) fails. */
export function apologyMessage(persona: Persona): string {
  return (
    "I'm sorry, I'm having trouble answering right now. " +
    `Please try again in a moment, or reach out to us directly at ${contactChannel(persona)}.`
  );
}

// ── Conversation Orchestrator ────────────────────────────

/**
 * Runs one chat turn:
 * resolve session → cache (standalone only) → retrieve → score confidence →
 * fallback text or generation → update session → update cache → record analytics.
 *
 * Holds no state of its own. Turns on the same session id are serialized;
 * every turn records exactly one analytics event, whatever branch it took.
 */
export class ConversationOrchestrator {
  private readonly now: () => number;

  constructor(private readonly deps: OrchestratorDeps) {
    this.now = deps.now ?? Date.now;
  }

  answer(request: ChatRequest): Promise<ChatAnswer> {
    const { sessionId } = request;
    if (!sessionId) return this.runTurn(request);
    return this.deps.sessions.exclusive(sessionId, () => this.runTurn(request));
  }

  getSummary(): AnalyticsSummary {
    return this.deps.analytics.summarize(this.deps.sessions.size());
  }

  clearSession(sessionId: string): Result<void, SessionNotFoundError> {
    if (!this.deps.sessions.delete(sessionId)) {
      return Err(new SessionNotFoundError(sessionId));
    }
    log.info({ sessionId }, "🗑️ Session cleared");
    return Ok(undefined);
  }

  clearCache(): number {
    const removed = this.deps.cache.clear();
    log.info({ removed }, "🧽 Response cache cleared");
    return removed;
  }

  // ── Turn ───────────────────────────────────────────────

  private async runTurn(request: ChatRequest): Promise<ChatAnswer> {
    const { sessions, cache, persona } = this.deps;
    const started = this.now();
    const query = request.query.trim();
    const event: AnalyticsEvent = { timestamp: started, query };
    let answer: ChatAnswer;

    try {
      // RESOLVE_SESSION
      const resolved = sessions.resolve(request.sessionId);
      const sessionId = resolved.sessionId;
      event.sessionId = sessionId;
      const standalone = resolved.history.length === 0;
      const useCache = (request.useCache ?? true) && standalone;

      // CHECK_CACHE
      const hit = useCache ? cache.lookup(query) : undefined;
      if (hit) {
        sessions.appendExchange(sessionId, query, hit.response);
        answer = {
          response: hit.response,
          sessionId,
          cached: true,
          confidence: hit.confidence ?? "low",
          sourcesUsed: hit.sources.length,
          sources: hit.sources,
        };
        Object.assign(event, this.outcomeFields("cached", answer));
        return answer;
      }

      // RETRIEVE
      const conversation = sessions.renderContext(sessionId);
      const retrievalStarted = this.now();
      const retrieval = await this.deps.retriever.retrieve(
        buildRetrievalQuery(conversation, query),
        this.deps.topK,
      );
      event.retrievalMs = this.now() - retrievalStarted;
      let chunks: RetrievalResult[] = [];
      if (retrieval.ok) {
        chunks = retrieval.value;
      } else {
        log.warn({ sessionId, err: retrieval.error.message }, "⚠️ Retrieval degraded");
      }
      const sources = chunks.map((c) => c.chunkId);

      // SCORE_CONFIDENCE
      const confidence = scoreConfidence(chunks);
      const fallback = selectFallback(query, confidence, persona);

      let outcome: Outcome;
      let response: string;
      if (fallback !== null) {
        // FALLBACK
        outcome = "fallback";
        response = fallback;
      } else {
        // GENERATE
        const generationStarted = this.now();
        const generated = await this.deps.generator.generate(
          buildPrompt({ persona, query, chunks, conversation }),
        );
        event.generationMs = this.now() - generationStarted;
        if (generated.ok) {
          outcome = "generated";
          response = generated.value.text;
          event.model = generated.value.model;
          event.inputTokens = generated.value.inputTokens;
          event.outputTokens = generated.value.outputTokens;
        } else {
          outcome = "error";
          response = apologyMessage(persona);
          event.error = generated.error.message;
        }
      }

      // UPDATE_SESSION
      sessions.appendExchange(sessionId, query, response);

      // UPDATE_CACHE (apologies are never cached)
      if (useCache && outcome !== "error") {
        cache.put(query, response, { confidence, sources });
      }

      answer = {
        response,
        sessionId,
        cached: false,
        confidence,
        sourcesUsed: sources.length,
        sources,
      };
      Object.assign(event, this.outcomeFields(outcome, answer));
      return answer;
    } catch (err) {
      log.error({ err, sessionId: event.sessionId }, "❌ Chat turn failed");
      answer = {
        response: apologyMessage(persona),
        sessionId: event.sessionId ?? request.sessionId ?? "",
        cached: false,
        confidence: "low",
        sourcesUsed: 0,
        sources: [],
      };
      event.error = describeError(err);
      Object.assign(event, this.outcomeFields("error", answer));
      return answer;
    } finally {
      // RECORD_ANALYTICS
      event.latencyMs = this.now() - started;
      this.deps.analytics.record(event);
      log.info(
        {
          sessionId: event.sessionId,
          outcome: event.outcome,
          confidence: event.confidence,
          cached: event.cached,
          latencyMs: event.latencyMs,
        },
        "💬 Chat turn",
      );
    }
  }

  private outcomeFields(
    outcome: Outcome,
    answer: ChatAnswer,
  ): Pick<AnalyticsEvent, "outcome" | "cached" | "confidence" | "sourcesUsed"> {
    return {
      outcome,
      cached: answer.cached,
      confidence: answer.confidence,
      sourcesUsed: answer.sourcesUsed,
    };
  }
}
