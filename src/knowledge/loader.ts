import { readFile } from "fs/promises";
import { SchemaError } from "../errors.js";
import { moduleLogger } from "../logger.js";
import { KnowledgeDocumentSchema, type KnowledgeDocument } from "./schema.js";

const log = moduleLogger("knowledge");

/** Validate an already-parsed value as a knowledge document. */
export function parseKnowledgeDocument(raw: unknown): KnowledgeDocument {
  const parsed = KnowledgeDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new SchemaError(`Malformed knowledge document: ${issues}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Read and validate the knowledge document at an explicit path. */
export async function loadKnowledgeDocument(
  path: string,
): Promise<KnowledgeDocument> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new SchemaError(`Cannot read knowledge document at ${path}`, {
      cause: err,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SchemaError(`Knowledge document at ${path} is not valid JSON`, {
      cause: err,
    });
  }

  const doc = parseKnowledgeDocument(raw);
  log.info(
    { path, sections: Object.keys(doc).length },
    "📥 Knowledge document loaded",
  );
  return doc;
}
