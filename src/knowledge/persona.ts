import { readFile } from "fs/promises";
import { isNotFound } from "../errors.js";
import { moduleLogger } from "../logger.js";
import type { KnowledgeDocument } from "./schema.js";

const log = moduleLogger("persona");

/** Who the assistant speaks for, and where it sends people it cannot help. */
export interface Persona {
  companyName: string;
  contactEmail: string;
  website: string;
  /** System directive that opens every generation prompt. */
  directive: string;
}

export interface PersonaOverrides {
  companyName?: string;
  contactEmail?: string;
  website?: string;
}

/**
 * Build the persona from explicit overrides, falling back to what the
 * knowledge document says about the company and its contact channels.
 */
export function derivePersona(
  doc: KnowledgeDocument,
  overrides: PersonaOverrides = {},
  directive?: string,
): Persona {
  const companyName =
    overrides.companyName || doc.company?.name || "our company";
  const contactEmail =
    overrides.contactEmail || findContactValue(doc, /e-?mail/) || "";
  const website =
    overrides.website || findContactValue(doc, /website|url|web/) || "";

  const base = { companyName, contactEmail, website };
  return { ...base, directive: directive?.trim() || defaultDirective(base) };
}

/** "info@x.com or www.x.com", "info@x.com", or a generic channel when neither is known. */
export function contactChannel(persona: Omit<Persona, "directive">): string {
  const channels = [persona.contactEmail, persona.website].filter(Boolean);
  return channels.length > 0 ? channels.join(" or ") : "our team";
}

/** Read an operator-supplied directive file. Absent file means the default directive. */
export async function loadDirective(path: string): Promise<string | undefined> {
  try {
    const text = (await readFile(path, "utf-8")).trim();
    log.info({ path }, "🧬 Persona directive loaded");
    return text || undefined;
  } catch (err) {
    if (isNotFound(err)) {
      log.warn({ path }, "⚠️ Persona directive not found, using default");
    } else {
      log.warn({ err, path }, "⚠️ Persona directive unreadable, using default");
    }
    return undefined;
  }
}

// ── Helpers ──────────────────────────────────────────────

function defaultDirective(persona: Omit<Persona, "directive">): string {
  return [
    `You are a helpful AI assistant for ${persona.companyName}.`,
    "",
    "Your role is to:",
    `1. Answer questions about ${persona.companyName}'s services, pricing, processes and team`,
    "2. Help people schedule consultations and find contact information",
    "3. Keep a professional, friendly and helpful tone",
    "",
    "Always base your answers on the provided context from the knowledge base.",
    `When you don't know something specific, say so honestly and suggest contacting us at ${contactChannel(persona)}.`,
  ].join("\n");
}

function findContactValue(
  doc: KnowledgeDocument,
  keyPattern: RegExp,
): string | undefined {
  if (!doc.contact) return undefined;
  const sections = Object.keys(doc.contact).sort();
  for (const section of sections) {
    const details = doc.contact[section];
    if (typeof details === "string") {
      if (keyPattern.test(section.toLowerCase())) return details;
      continue;
    }
    if (typeof details === "object" && details !== null) {
      for (const key of Object.keys(details).sort()) {
        const value = details[key];
        if (typeof value === "string" && keyPattern.test(key.toLowerCase())) {
          return value;
        }
      }
    }
  }
  return undefined;
}
