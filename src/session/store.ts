import { randomUUID } from "crypto";
import { SessionNotFoundError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import { KeyedLock } from "./keyed-lock.js";

const log = moduleLogger("sessions");

// ── Types ────────────────────────────────────────────────

export type Role = "user" | "assistant";

export interface Turn {
  role: Role;
  content: string;
  timestamp: number; // Unix ms
}

export interface Session {
  id: string;
  history: Turn[];
  createdAt: number;
  lastActivity: number;
}

export interface SessionStoreOptions {
  /** Idle time after which a session is purged. */
  ttlMs: number;
  /** Max turns kept per session (N). Oldest are dropped first. */
  windowSize: number;
  /** Turns rendered into prompt context (M ≤ N). */
  contextTurns: number;
  now?: () => number;
  newId?: () => string;
}

export interface ResolvedSession {
  sessionId: string;
  /** Snapshot of the history at resolve time. */
  history: readonly Turn[];
  isNew: boolean;
}

// ── Session Store ────────────────────────────────────────

/**
 * Process-wide conversation sessions with a sliding-window history and
 * idle expiry. Table operations are synchronous, so each one is atomic
 * with respect to other requests; `exclusive` serializes whole turns on
 * the same session id.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly lock = new KeyedLock();
  private readonly now: () => number;
  private readonly newId: () => string;
  readonly ttlMs: number;
  readonly windowSize: number;
  readonly contextTurns: number;

  constructor(opts: SessionStoreOptions) {
    if (opts.windowSize < 1) throw new RangeError("windowSize must be ≥ 1");
    this.ttlMs = opts.ttlMs;
    this.windowSize = opts.windowSize;
    this.contextTurns = Math.min(Math.max(opts.contextTurns, 0), opts.windowSize);
    this.now = opts.now ?? Date.now;
    this.newId = opts.newId ?? randomUUID;
  }

  /** Run `task` with no other `exclusive` task on the same session id in flight. */
  exclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(sessionId, task);
  }

  /**
   * Return the live session for `sessionId` with its activity refreshed,
   * or mint a fresh one when the id is absent, unknown or expired.
   */
  resolve(sessionId?: string): ResolvedSession {
    this.sweep();
    const now = this.now();

    const existing = sessionId ? this.sessions.get(sessionId) : undefined;
    if (existing) {
      existing.lastActivity = now;
      return { sessionId: existing.id, history: [...existing.history], isNew: false };
    }

    const session: Session = {
      id: this.newId(),
      history: [],
      createdAt: now,
      lastActivity: now,
    };
    this.sessions.set(session.id, session);
    log.debug({ sessionId: session.id }, "🆕 Session created");
    return { sessionId: session.id, history: [], isNew: true };
  }

  append(sessionId: string, role: Role, content: string): void {
    this.appendTurns(sessionId, [{ role, content }]);
  }

  /** Append a user turn and its reply in one step. */
  appendExchange(sessionId: string, userMessage: string, reply: string): void {
    this.appendTurns(sessionId, [
      { role: "user", content: userMessage },
      { role: "assistant", content: reply },
    ]);
  }

  get(sessionId: string): Session | undefined {
    const session = this.live(sessionId);
    return session ? { ...session, history: [...session.history] } : undefined;
  }

  delete(sessionId: string): boolean {
    const existed = this.live(sessionId) !== undefined;
    this.sessions.delete(sessionId);
    return existed;
  }

  /** Purge every session idle for longer than the TTL. Returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let purged = 0;
    for (const [id, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(id);
        purged++;
      }
    }
    if (purged > 0) log.debug({ purged }, "🧹 Expired sessions swept");
    return purged;
  }

  /** Live sessions after a sweep. */
  size(): number {
    this.sweep();
    return this.sessions.size;
  }

  /**
   * The last `turns` turns as "User: …" / "Assistant: …" lines.
   * Empty string for an unknown session or one with no history.
   */
  renderContext(sessionId: string, turns = this.contextTurns): string {
    const session = this.live(sessionId);
    if (!session || turns <= 0) return "";
    return session.history
      .slice(-turns)
      .map((t) => `${t.role === "user" ? "User" : "Assistant"}: ${t.content}`)
      .join("\n");
  }

  // ── Internals ──────────────────────────────────────────

  private appendTurns(
    sessionId: string,
    turns: { role: Role; content: string }[],
  ): void {
    const session = this.live(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);

    const now = this.now();
    session.history.push(...turns.map((t) => ({ ...t, timestamp: now })));
    if (session.history.length > this.windowSize) {
      session.history.splice(0, session.history.length - this.windowSize);
    }
    session.lastActivity = now;
  }

  /** The session if it exists and has not expired. Expired sessions are purged on sight. */
  private live(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    if (this.isExpired(session, this.now())) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    return session;
  }

  private isExpired(session: Session, now: number): boolean {
    return now - session.lastActivity > this.ttlMs;
  }
}
