/**
 * corpuslint - Text-level Schemas
 *
 * Entailment, text pairs, text-to-text and text classification records.
 * None of them carry offsets or annotation identifiers besides `id`.
 */

import { z } from "zod";

export const EntailmentDocumentSchema = z.object({
  id: z.string().min(1, "id must not be empty"),
  premise: z.string(),
  hypothesis: z.string(),
  label: z.string(),
});

export type EntailmentDocument = z.infer<typeof EntailmentDocumentSchema>;

export const PairsDocumentSchema = z.object({
  id: z.string().min(1, "id must not be empty"),
  document_id: z.string().nullable().default(null),
  text_1: z.string(),
  text_2: z.string(),
  label: z.string(),
});

export type PairsDocument = z.infer<typeof PairsDocumentSchema>;

export const Text2TextDocumentSchema = z.object({
  id: z.string().min(1, "id must not be empty"),
  document_id: z.string().nullable().default(null),
  text_1: z.string(),
  text_2: z.string(),
  text_1_name: z.string().default(""),
  text_2_name: z.string().default(""),
});

export type Text2TextDocument = z.infer<typeof Text2TextDocumentSchema>;

export const TextDocumentSchema = z.object({
  id: z.string().min(1, "id must not be empty"),
  document_id: z.string().nullable().default(null),
  text: z.string(),
  labels: z.array(z.string()).default([]),
});

export type TextDocument = z.infer<typeof TextDocumentSchema>;
