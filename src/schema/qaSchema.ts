/**
 * corpuslint - Question Answering Schema
 */

import { z } from "zod";

/**
 * Question types that must come with a list of choices
 */
export const CHOICE_QUESTION_TYPES = ["multiple_choice", "yesno"] as const;

export const QaDocumentSchema = z.object({
  id: z.string().min(1, "id must not be empty"),
  question_id: z.string(),
  document_id: z.string().nullable().default(null),
  question: z.string(),
  /** e.g. multiple_choice, yesno, factoid, list, summary */
  type: z.string(),
  choices: z.array(z.string()).default([]),
  context: z.string().default(""),
  answer: z.array(z.string()).default([]),
});

export type QaDocument = z.infer<typeof QaDocumentSchema>;

export function isChoiceQuestionType(type: string): boolean {
  return (CHOICE_QUESTION_TYPES as readonly string[]).includes(type);
}
