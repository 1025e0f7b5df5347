import { z } from "zod";
import type { ConversationOrchestrator } from "../chat/orchestrator.js";
import { describeError } from "../errors.js";
import { moduleLogger } from "../logger.js";

const log = moduleLogger("routes");

export const API_VERSION = "1.0.0";

// ── Request / Response shapes ────────────────────────────

export const ChatRequestSchema = z.object({
  message: z
    .string()
    .transform((s) => s.trim())
    .pipe(z.string().min(1, "Message cannot be empty").max(4000)),
  session_id: z.string().min(1).optional(),
  use_cache: z.boolean().optional().default(true),
});

export interface ApiRequest {
  method: string;
  /** Path without query string. */
  path: string;
  body: string;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export interface ApiDeps {
  orchestrator: ConversationOrchestrator;
  /** Chunks in the index; undefined until startup has built or loaded it. */
  indexedChunks: () => Promise<number | undefined>;
}

function json(status: number, body: unknown): ApiResponse {
  return { status, body };
}

// ── Router ───────────────────────────────────────────────

/** Route one request. Never throws: failures come back as 4xx/5xx bodies. */
export async function handleApiRequest(
  deps: ApiDeps,
  req: ApiRequest,
): Promise<ApiResponse> {
  const { method, path } = req;

  try {
    if (method === "GET" && path === "/") {
      return json(200, {
        status: "online",
        message: "Knowledge base assistant API is running",
        api_version: API_VERSION,
      });
    }

    if (method === "GET" && path === "/health") {
      const count = await deps.indexedChunks();
      if (count === undefined) {
        return json(503, { detail: "Assistant not initialized" });
      }
      return json(200, {
        status: "healthy",
        message: "Assistant is ready to serve requests",
        api_version: API_VERSION,
        indexed_chunks: count,
      });
    }

    if (method === "POST" && path === "/chat") {
      return await chat(deps, req.body);
    }

    if (method === "GET" && path === "/analytics") {
      return json(200, deps.orchestrator.getSummary());
    }

    if (method === "DELETE" && path.startsWith("/session/")) {
      const sessionId = decodeURIComponent(path.slice("/session/".length));
      const result = deps.orchestrator.clearSession(sessionId);
      if (!result.ok) return json(404, { detail: result.error.message });
      return json(200, { status: "deleted", session_id: sessionId });
    }

    if (method === "DELETE" && path === "/cache") {
      const removed = deps.orchestrator.clearCache();
      return json(200, { status: "cleared", entries_removed: removed });
    }

    return json(404, { detail: "Not found" });
  } catch (err) {
    log.error({ err, method, path }, "❌ Request failed");
    return json(500, { detail: `Error processing request: ${describeError(err)}` });
  }
}

async function chat(deps: ApiDeps, rawBody: string): Promise<ApiResponse> {
  if ((await deps.indexedChunks()) === undefined) {
    return json(503, { detail: "Assistant not initialized. Please try again later." });
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody);
  } catch {
    return json(400, { detail: "Request body must be JSON" });
  }

  const parsed = ChatRequestSchema.safeParse(payload);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => i.message).join("; ");
    return json(400, { detail });
  }

  const { message, session_id, use_cache } = parsed.data;
  const answer = await deps.orchestrator.answer({
    query: message,
    sessionId: session_id,
    useCache: use_cache,
  });

  return json(200, {
    response: answer.response,
    session_id: answer.sessionId,
    cached: answer.cached,
    confidence: answer.confidence,
    sources_used: answer.sourcesUsed,
    sources: answer.sources,
    status: "success",
  });
}
