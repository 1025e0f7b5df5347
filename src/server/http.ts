import { createServer, type IncomingMessage, type Server } from "http";
import { moduleLogger } from "../logger.js";
import { handleApiRequest, type ApiDeps } from "./routes.js";

const log = moduleLogger("http");

/** Request bodies above this size are refused with 413. */
export const MAX_BODY_BYTES = 64 * 1024;

class BodyTooLargeError extends Error {}

// ── Helper: read request body ────────────────────────────

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    let size = 0;
    let tooLarge = false;
    // Past the limit the rest is drained unbuffered, so the socket stays up for the 413.
    req.on("data", (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        data = "";
        return;
      }
      data += chunk.toString();
    });
    req.on("end", () => {
      if (tooLarge) reject(new BodyTooLargeError(`Body exceeds ${limit} bytes`));
      else resolve(data);
    });
    req.on("error", reject);
  });
}

// ── HTTP Server ──────────────────────────────────────────

export function createApiServer(deps: ApiDeps): Server {
  return createServer(async (req, res) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    let body = "";
    try {
      body = await readBody(req, MAX_BODY_BYTES);
    } catch (err) {
      const tooLarge = err instanceof BodyTooLargeError;
      res.writeHead(tooLarge ? 413 : 400, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ detail: tooLarge ? "Request body too large" : "Bad request" }));
      return;
    }

    const path = (req.url || "/").split("?")[0] || "/";
    const result = await handleApiRequest(deps, {
      method: req.method || "GET",
      path,
      body,
    });

    res.writeHead(result.status, { "Content-Type": "application/json" });
    res.end(JSON.stringify(result.body));
  });
}

export function startApiServer(server: Server, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      log.info({ port }, "🌐 HTTP API listening");
      resolve();
    });
  });
}

export function stopApiServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
