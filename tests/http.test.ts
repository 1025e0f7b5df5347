import { afterEach, describe, it, expect } from "vitest";
import type { Server } from "http";
import {
  MAX_BODY_BYTES,
  createApiServer,
  startApiServer,
  stopApiServer,
} from "../src/server/http.js";
import { testOrchestrator } from "./helpers/orchestrator.js";

let server: Server | undefined;

afterEach(async () => {
  if (server) await stopApiServer(server);
  server = undefined;
});

async function listen(): Promise<string> {
  const s = createApiServer({
    orchestrator: await testOrchestrator(),
    indexedChunks: async () => 1,
  });
  server = s;
  await startApiServer(s, 0);
  const address = s.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  return `http://127.0.0.1:${address.port}`;
}

describe("API server", () => {
  it("serves JSON with CORS headers", async () => {
    const base = await listen();
    const res = await fetch(`${base}/health?verbose=1`);

    expect(res.status).toBe(200);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
    expect(res.headers.get("content-type")).toBe("application/json");
    expect(await res.json()).toMatchObject({ status: "healthy", indexed_chunks: 1 });
  });

  it("answers preflight requests with 204", async () => {
    const base = await listen();
    const res = await fetch(`${base}/chat`, { method: "OPTIONS" });
    expect(res.status).toBe(204);
  });

  it("routes a chat POST through to the orchestrator", async () => {
    const base = await listen();
    const res = await fetch(`${base}/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ message: "how fast" }),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ session_id: "s1", sources: ["faq_0"] });
  });

  it("answers an oversized body with 413", async () => {
    const base = await listen();
    const res = await fetch(`${base}/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ message: "x".repeat(MAX_BODY_BYTES * 3) }),
    });

    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ detail: "Request body too large" });
  });
});
