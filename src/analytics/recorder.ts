import { z } from "zod";
import { normalizeQuery } from "../cache/response-cache.js";
import { moduleLogger } from "../logger.js";

const log = moduleLogger("analytics");

// ── Analytics ────────────────────────────────────────────
// Diagnostic ring buffer of request outcomes. In-memory only; resets on restart.

export const OUTCOMES = ["cached", "generated", "fallback", "error"] as const;
export type Outcome = (typeof OUTCOMES)[number];

const nonNegative = z.number().nonnegative();

export const AnalyticsEventSchema = z.object({
  timestamp: z.number(),
  query: z.string(),
  sessionId: z.string().optional(),
  outcome: z.enum(OUTCOMES).optional(),
  cached: z.boolean().optional(),
  confidence: z.enum(["high", "medium", "low"]).optional(),
  sourcesUsed: z.number().int().nonnegative().optional(),
  latencyMs: nonNegative.optional(),
  retrievalMs: nonNegative.optional(),
  generationMs: nonNegative.optional(),
  inputTokens: nonNegative.optional(),
  outputTokens: nonNegative.optional(),
  model: z.string().optional(),
  error: z.string().optional(),
});

export type AnalyticsEvent = z.infer<typeof AnalyticsEventSchema>;

export interface QueryCount {
  query: string;
  count: number;
}

export interface AnalyticsSummary {
  totalQueries: number;
  cacheHits: number;
  cacheHitRate: number;
  confidenceDistribution: Record<"high" | "medium" | "low", number>;
  outcomes: Record<Outcome, number>;
  averageLatencyMs: number;
  topQueries: QueryCount[];
  activeSessions: number;
  tokens: { input: number; output: number };
  uptimeMs: number;
}

export interface AnalyticsRecorderOptions {
  capacity: number;
  /** How many entries `topQueries` lists. */
  topN?: number;
  now?: () => number;
}

export class AnalyticsRecorder {
  private events: AnalyticsEvent[] = [];
  private readonly capacity: number;
  private readonly topN: number;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(opts: AnalyticsRecorderOptions) {
    this.capacity = Math.max(1, opts.capacity);
    this.topN = opts.topN ?? 5;
    this.now = opts.now ?? Date.now;
    this.startedAt = this.now();
  }

  /**
   * Append an event, dropping the oldest beyond capacity.
   * Never throws: a malformed event is logged and discarded.
   */
  record(event: AnalyticsEvent): boolean {
    try {
      const parsed = AnalyticsEventSchema.safeParse(event);
      if (!parsed.success) {
        log.warn(
          { issues: parsed.error.issues.map((i) => i.path.join(".")) },
          "⚠️ Dropping malformed analytics event",
        );
        return false;
      }
      this.events.push(parsed.data);
      if (this.events.length > this.capacity) {
        this.events.splice(0, this.events.length - this.capacity);
      }
      return true;
    } catch (err) {
      log.warn({ err }, "⚠️ Analytics recording failed");
      return false;
    }
  }

  /** Aggregate the buffered events. Missing optional fields count as zero/absent. */
  summarize(activeSessions = 0): AnalyticsSummary {
    const total = this.events.length;
    const confidenceDistribution = { high: 0, medium: 0, low: 0 };
    const outcomes: Record<Outcome, number> = {
      cached: 0,
      generated: 0,
      fallback: 0,
      error: 0,
    };
    const queryCounts = new Map<string, number>();
    let cacheHits = 0;
    let latencySum = 0;
    let latencyCount = 0;
    let inputTokens = 0;
    let outputTokens = 0;

    for (const e of this.events) {
      if (e.cached) cacheHits++;
      if (e.confidence) confidenceDistribution[e.confidence]++;
      if (e.outcome) outcomes[e.outcome]++;
      if (e.latencyMs !== undefined) {
        latencySum += e.latencyMs;
        latencyCount++;
      }
      inputTokens += e.inputTokens ?? 0;
      outputTokens += e.outputTokens ?? 0;

      const q = normalizeQuery(e.query);
      if (q) queryCounts.set(q, (queryCounts.get(q) ?? 0) + 1);
    }

    const topQueries = [...queryCounts.entries()]
      .map(([query, count]) => ({ query, count }))
      .sort((a, b) => b.count - a.count || (a.query < b.query ? -1 : 1))
      .slice(0, this.topN);

    return {
      totalQueries: total,
      cacheHits,
      cacheHitRate: total > 0 ? cacheHits / total : 0,
      confidenceDistribution,
      outcomes,
      averageLatencyMs: latencyCount > 0 ? latencySum / latencyCount : 0,
      topQueries,
      activeSessions,
      tokens: { input: inputTokens, output: outputTokens },
      uptimeMs: this.now() - this.startedAt,
    };
  }

  get size(): number {
    return this.events.length;
  }

  clear(): void {
    this.events = [];
  }
}

// ── Rendering ────────────────────────────────────────────

/** Human-readable summary for logs and the console. */
export function formatSummary(s: AnalyticsSummary): string {
  if (s.totalQueries === 0) {
    return "📊 No queries recorded yet.";
  }

  const { high, medium, low } = s.confidenceDistribution;
  const lines = [
    "📊 Assistant Analytics",
    "────────────────────",
    `⏱ Uptime: ${formatDuration(s.uptimeMs)}`,
    `💬 Total queries: ${s.totalQueries}`,
    `♻️ Cache hit rate: ${(s.cacheHitRate * 100).toFixed(1)}%`,
    `🎯 Confidence: high ${high} · medium ${medium} · low ${low}`,
    `🧭 Outcomes: generated ${s.outcomes.generated} · fallback ${s.outcomes.fallback} · cached ${s.outcomes.cached} · error ${s.outcomes.error}`,
    `⚡ Avg latency: ${Math.round(s.averageLatencyMs)}ms`,
    `📦 Tokens: ${s.tokens.input} in / ${s.tokens.output} out`,
    `👥 Active sessions: ${s.activeSessions}`,
  ];
  if (s.topQueries.length > 0) {
    lines.push("🔝 Top queries:");
    s.topQueries.forEach((q, i) => lines.push(`  ${i + 1}. ${q.query} (${q.count})`));
  }
  return lines.join("\n");
}

export function formatDuration(ms: number): string {
  const secs = Math.floor(ms / 1000);
  const mins = Math.floor(secs / 60);
  const hours = Math.floor(mins / 60);

  if (hours > 0) return `${hours}h ${mins % 60}m`;
  if (mins > 0) return `${mins}m ${secs % 60}s`;
  return `${secs}s`;
}
