import type { Chunk, KnowledgeDocument } from "./schema.js";

// ── Chunk Builder ─────────────────────────────────────────

/**
 * Split a knowledge document into retrievable chunks.
 *
 * One chunk per semantic unit: the company overview, each service's
 * description and (separately) its process, each pricing category, each
 * FAQ entry, each leadership member, and one aggregated contact chunk.
 *
 * Pure and deterministic. Map-shaped sections are walked in sorted key
 * order, so ids and contents do not depend on JSON key order.
 */
export function buildChunks(doc: KnowledgeDocument): Chunk[] {
  const chunks: Chunk[] = [];

  if (doc.company) {
    const { name, description, mission, vision } = doc.company;
    const parts = [`Company: ${sentence(name)}`, sentence(description)];
    if (mission) parts.push(`Mission: ${sentence(mission)}`);
    if (vision) parts.push(`Vision: ${sentence(vision)}`);
    chunks.push({
      id: "company_overview",
      category: "company",
      content: join(parts),
      metadata: { type: "overview", section: "company" },
    });
  }

  if (doc.services) {
    for (const [key, service] of sortedEntries(doc.services)) {
      const details = service.details ?? [];
      chunks.push({
        id: `service_${key}_main`,
        category: "service",
        content: join([
          `${service.name}: ${sentence(service.description)}`,
          details.length > 0 ? `Details: ${details.join(" ")}` : "",
        ]),
        metadata: { type: "service", section: "services", service_name: key },
      });

      if (service.process && service.process.length > 0) {
        chunks.push({
          id: `service_${key}_process`,
          category: "service",
          content: `${service.name} process: ${service.process.join(" -> ")}`,
          metadata: { type: "process", section: "services", service_name: key },
        });
      }
    }
  }

  if (doc.pricing) {
    for (const [key, info] of sortedEntries(doc.pricing)) {
      const body =
        typeof info === "string" ? info : scalarPairs(info).join(". ");
      chunks.push({
        id: `pricing_${key}`,
        category: "pricing",
        content: `Pricing - ${key}: ${body}`.trimEnd(),
        metadata: { type: "pricing", section: "pricing", pricing_type: key },
      });
    }
  }

  if (doc.faq) {
    doc.faq.common_questions.forEach((qa, idx) => {
      chunks.push({
        id: `faq_${idx}`,
        category: "faq",
        content: `Q: ${qa.question} A: ${qa.answer}`,
        metadata: {
          type: "faq",
          section: "faq",
          category: qa.category ?? "general",
        },
      });
    });
  }

  if (doc.team?.leadership) {
    for (const [role, person] of sortedEntries(doc.team.leadership)) {
      const head = `${person.name}, ${person.title}`;
      chunks.push({
        id: `team_${role}`,
        category: "team",
        content: person.background ? `${head}: ${person.background}` : head,
        metadata: { type: "leadership", section: "team", role },
      });
    }
  }

  if (doc.contact) {
    const lines: string[] = [];
    for (const [section, details] of sortedEntries(doc.contact)) {
      if (isRecord(details)) {
        lines.push(...scalarPairs(details));
      } else {
        lines.push(`${section}: ${String(details)}`);
      }
    }
    if (lines.length > 0) {
      chunks.push({
        id: "contact_info",
        category: "contact",
        content: `Contact information: ${lines.join(". ")}`,
        metadata: { type: "contact", section: "contact" },
      });
    }
  }

  return chunks;
}

// ── Helpers ──────────────────────────────────────────────

function sortedEntries<T>(record: Record<string, T>): [string, T][] {
  return Object.entries(record).sort(([a], [b]) =>
    a < b ? -1 : a > b ? 1 : 0,
  );
}

/** `key: value` for every scalar field, in key order. Nested values are skipped. */
function scalarPairs(record: Record<string, unknown>): string[] {
  return sortedEntries(record)
    .filter(
      (entry): entry is [string, string | number | boolean] =>
        typeof entry[1] === "string" ||
        typeof entry[1] === "number" ||
        typeof entry[1] === "boolean",
    )
    .map(([k, v]) => `${k}: ${v}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Terminate with a period unless the text already ends in punctuation. */
function sentence(text: string): string {
  const trimmed = text.trim();
  if (trimmed === "" || /[.!?]$/.test(trimmed)) return trimmed;
  return `${trimmed}.`;
}

function join(parts: string[]): string {
  return parts.filter((p) => p.length > 0).join(" ");
}
