import dotenv from "dotenv";
import { ConfigError } from "./errors.js";

dotenv.config();

// ── Types ────────────────────────────────────────────────

export type VectorBackend = "file" | "pinecone";

export interface AppConfig {
  openRouterApiKey: string;
  llmModel: string;
  fallbackModel: string;
  llmTemperature: number;

  pineconeApiKey: string;
  pineconeIndex: string;
  embeddingModel: string;

  knowledgeBasePath: string;
  vectorBackend: VectorBackend;
  vectorStorePath: string;
  vectorCollection: string;
  forceRebuild: boolean;
  retrievalTopK: number;

  sessionTtlMs: number;
  sessionWindow: number;
  sessionContextTurns: number;
  cacheTtlMs: number;
  analyticsCapacity: number;

  companyName: string;
  contactEmail: string;
  companyWebsite: string;
  systemPromptPath: string;

  port: number;
}

type Env = Record<string, string | undefined>;

// ── Helpers ──────────────────────────────────────────────

function intOr(raw: string | undefined, fallback: number, min = 0): number {
  const value = parseInt(raw ?? "", 10);
  return Number.isNaN(value) || value < min ? fallback : value;
}

function floatOr(raw: string | undefined, fallback: number): number {
  const value = parseFloat(raw ?? "");
  return Number.isNaN(value) ? fallback : value;
}

function isVectorBackend(value: string): value is VectorBackend {
  return value === "file" || value === "pinecone";
}

function flag(raw: string | undefined): boolean {
  return ["1", "true", "yes"].includes((raw ?? "").trim().toLowerCase());
}

// ── Config ───────────────────────────────────────────────

/**
 * Parse the process environment into a typed config.
 * Throws ConfigError naming every missing required variable at once.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing: string[] = [];
  const required = (key: string): string => {
    const value = env[key]?.trim();
    if (!value) {
      missing.push(key);
      return "";
    }
    return value;
  };

  const backendRaw = (env.VECTOR_BACKEND || "file").trim().toLowerCase();
  if (!isVectorBackend(backendRaw)) {
    throw new ConfigError(
      ["VECTOR_BACKEND"],
      `VECTOR_BACKEND must be "file" or "pinecone", got "${backendRaw}"`,
    );
  }
  const vectorBackend = backendRaw;

  const openRouterApiKey = required("OPENROUTER_API_KEY");
  const pineconeApiKey = required("PINECONE_API_KEY");
  const knowledgeBasePath = required("KNOWLEDGE_BASE_PATH");
  const pineconeIndex =
    vectorBackend === "pinecone"
      ? required("PINECONE_INDEX")
      : env.PINECONE_INDEX?.trim() || "";

  if (missing.length > 0) throw new ConfigError(missing);

  const sessionWindow = intOr(env.SESSION_WINDOW, 10, 1);

  return Object.freeze({
    openRouterApiKey,
    llmModel: env.LLM_MODEL || "google/gemini-2.0-flash-exp:free",
    fallbackModel: env.FALLBACK_MODEL || "",
    llmTemperature: floatOr(env.LLM_TEMPERATURE, 0.3),

    pineconeApiKey,
    pineconeIndex,
    embeddingModel: env.EMBEDDING_MODEL || "multilingual-e5-large",

    knowledgeBasePath,
    vectorBackend,
    vectorStorePath: env.VECTOR_STORE_PATH || "data/vector-store",
    vectorCollection: env.VECTOR_COLLECTION || "company_knowledge_base",
    forceRebuild: flag(env.FORCE_REBUILD),
    retrievalTopK: intOr(env.RETRIEVAL_TOP_K, 3, 1),

    sessionTtlMs: intOr(env.SESSION_TTL_MINUTES, 30, 1) * 60_000,
    sessionWindow,
    sessionContextTurns: Math.min(
      intOr(env.SESSION_CONTEXT_TURNS, 6),
      sessionWindow,
    ),
    cacheTtlMs: intOr(env.CACHE_TTL_SECONDS, 3600) * 1000,
    analyticsCapacity: intOr(env.ANALYTICS_CAPACITY, 1000, 1),

    companyName: env.COMPANY_NAME || "",
    contactEmail: env.CONTACT_EMAIL || "",
    companyWebsite: env.COMPANY_WEBSITE || "",
    systemPromptPath: env.SYSTEM_PROMPT_PATH || "persona.md",

    port: intOr(env.PORT, 8000, 1),
  });
}
