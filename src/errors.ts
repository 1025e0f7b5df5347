// ── Error taxonomy ───────────────────────────────────────

export type ErrorCode =
  | "SCHEMA_ERROR"
  | "INDEX_UNAVAILABLE"
  | "GENERATION_ERROR"
  | "SESSION_NOT_FOUND"
  | "CONFIG_ERROR";

export class AssistantError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AssistantError";
    this.code = code;
  }
}

/** The knowledge document (or a persisted store file) does not have the expected shape. Fatal at build time. */
export class SchemaError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SCHEMA_ERROR", message, options);
    this.name = "SchemaError";
  }
}

/** Query-time embedding or vector search failed. */
export class IndexUnavailableError extends AssistantError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INDEX_UNAVAILABLE", message, options);
    this.name = "IndexUnavailableError";
  }
}

/** The text generator failed after its own retries. */
export class GenerationError extends AssistantError {
  readonly model: string | undefined;

  constructor(message: string, options?: { cause?: unknown; model?: string }) {
    super("GENERATION_ERROR", message, options);
    this.name = "GenerationError";
    this.model = options?.model;
  }
}

export class SessionNotFoundError extends AssistantError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
    this.sessionId = sessionId;
  }
}

export class ConfigError extends AssistantError {
  readonly missing: string[];

  constructor(missing: string[], message?: string) {
    super(
      "CONFIG_ERROR",
      message ?? `Missing required environment variables: ${missing.join(", ")}`,
    );
    this.name = "ConfigError";
    this.missing = missing;
  }
}

/** True for a filesystem error whose code is ENOENT. */
export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "ENOENT"
  );
}

/** Best-effort human-readable message for an unknown thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
