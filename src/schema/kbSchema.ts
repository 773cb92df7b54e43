/**
 * corpuslint - KB Interchange Schema
 *
 * Zod schemas for the knowledge-base document layout every KB loader
 * converges to: passages, entities, events, relations and coreferences
 * tied together by character offsets and identifiers.
 */

import { z } from "zod";

// ============================================================================
// Shared pieces
// ============================================================================

/**
 * Half-open [start, end) character offset into the document text
 */
export const OffsetSchema = z.tuple([
  z.number().int().nonnegative("start must be a non-negative integer"),
  z.number().int().nonnegative("end must be a non-negative integer"),
]);

export type Offset = z.infer<typeof OffsetSchema>;

/**
 * Grounding link into an external knowledge base
 */
export const NormalizationSchema = z.object({
  db_name: z.string(),
  db_id: z.string(),
});

export type Normalization = z.infer<typeof NormalizationSchema>;

// ============================================================================
// Annotation layers
// ============================================================================

export const PassageSchema = z.object({
  id: z.string(),
  type: z.string(),
  /** One-element list; the length is checked by the offset verifier */
  text: z.array(z.string()),
  offsets: z.array(OffsetSchema),
});

export type Passage = z.infer<typeof PassageSchema>;

export const EntitySchema = z.object({
  id: z.string(),
  type: z.string(),
  /** One text per mention; discontiguous entities carry several */
  text: z.array(z.string()),
  offsets: z.array(OffsetSchema),
  normalized: z.array(NormalizationSchema).default([]),
});

export type Entity = z.infer<typeof EntitySchema>;

export const EventArgumentSchema = z.object({
  role: z.string(),
  ref_id: z.string(),
});

export type EventArgument = z.infer<typeof EventArgumentSchema>;

export const EventSchema = z.object({
  id: z.string(),
  type: z.string(),
  trigger: z.object({
    text: z.array(z.string()),
    offsets: z.array(OffsetSchema),
  }),
  arguments: z.array(EventArgumentSchema).default([]),
});

export type Event = z.infer<typeof EventSchema>;

export const RelationSchema = z.object({
  id: z.string(),
  type: z.string(),
  arg1_id: z.string(),
  arg2_id: z.string(),
  normalized: z.array(NormalizationSchema).default([]),
});

export type Relation = z.infer<typeof RelationSchema>;

export const CoreferenceSchema = z.object({
  id: z.string(),
  entity_ids: z.array(z.string()),
});

export type Coreference = z.infer<typeof CoreferenceSchema>;

// ============================================================================
// KB Document
// ============================================================================

export const KbDocumentSchema = z.object({
  id: z.string().min(1, "id must not be empty"),
  document_id: z.string().nullable().default(null),
  passages: z.array(PassageSchema).default([]),
  entities: z.array(EntitySchema).default([]),
  events: z.array(EventSchema).default([]),
  coreferences: z.array(CoreferenceSchema).default([]),
  relations: z.array(RelationSchema).default([]),
});

export type KbDocument = z.infer<typeof KbDocumentSchema>;

/**
 * Layers whose records carry a `type` label
 */
export const KB_TYPED_LAYERS = ["passages", "entities", "relations", "events"] as const;

export type KbTypedLayer = (typeof KB_TYPED_LAYERS)[number];
