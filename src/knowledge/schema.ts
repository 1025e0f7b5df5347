/**
 * Zod schemas for the company knowledge document.
 *
 * Every top-level section is optional: an absent section yields no chunks.
 * A section that is present but shaped wrong fails validation.
 */

import { z } from "zod";

const ScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const CompanySectionSchema = z
  .object({
    name: z.string().min(1),
    description: z.string(),
    mission: z.string().optional(),
    vision: z.string().optional(),
  })
  .passthrough();

export const ServiceSchema = z
  .object({
    name: z.string().min(1),
    description: z.string(),
    details: z.array(z.string()).optional(),
    process: z.array(z.string()).optional(),
  })
  .passthrough();

/** A pricing entry is either a flat string or a record whose scalar fields are rendered. */
export const PricingEntrySchema = z.union([
  z.string(),
  z.record(z.unknown()),
]);

export const FaqEntrySchema = z.object({
  question: z.string().min(1),
  answer: z.string(),
  category: z.string().optional(),
});

export const FaqSectionSchema = z
  .object({ common_questions: z.array(FaqEntrySchema) })
  .passthrough();

export const LeaderSchema = z
  .object({
    name: z.string().min(1),
    title: z.string(),
    background: z.string().optional(),
  })
  .passthrough();

export const TeamSectionSchema = z
  .object({ leadership: z.record(LeaderSchema).optional() })
  .passthrough();

export const ContactSectionSchema = z.record(
  z.union([ScalarSchema, z.record(z.unknown())]),
);

export const KnowledgeDocumentSchema = z
  .object({
    company: CompanySectionSchema.optional(),
    services: z.record(ServiceSchema).optional(),
    pricing: z.record(PricingEntrySchema).optional(),
    faq: FaqSectionSchema.optional(),
    team: TeamSectionSchema.optional(),
    contact: ContactSectionSchema.optional(),
  })
  .passthrough();

export type KnowledgeDocument = z.infer<typeof KnowledgeDocumentSchema>;
export type Service = z.infer<typeof ServiceSchema>;
export type FaqEntry = z.infer<typeof FaqEntrySchema>;

// ── Chunks ───────────────────────────────────────────────

export const CHUNK_CATEGORIES = [
  "company",
  "service",
  "pricing",
  "faq",
  "team",
  "contact",
] as const;

export type ChunkCategory = (typeof CHUNK_CATEGORIES)[number];

export interface Chunk {
  /** Stable id derived from the chunk's location in the document. */
  id: string;
  category: ChunkCategory;
  content: string;
  metadata: Record<string, string>;
}
