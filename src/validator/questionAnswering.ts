/**
 * corpuslint - Question Answering Checks
 *
 * Multiple-choice and yes/no questions must list their choices, and every
 * answer must be one of them.
 */

import { isChoiceQuestionType, type QaDocument } from "../schema/qaSchema.js";
import { createFinding, type Finding, type FindingContext } from "./findings.js";

export interface QaCheckOptions {
  skipKeys?: ReadonlySet<string>;
}

export function checkQuestionAnswering(
  document: QaDocument,
  context: FindingContext = {},
  options: QaCheckOptions = {}
): Finding[] {
  const skip = options.skipKeys ?? new Set<string>();
  const findings: Finding[] = [];
  const qaContext = { ...context, annotationId: document.id };

  if (skip.has("choices")) {
    return findings;
  }

  const choiceType = isChoiceQuestionType(document.type);

  if (document.choices.length > 0 && !choiceType) {
    findings.push(
      createFinding(
        "WARNING",
        "qa",
        "CHOICES_WITHOUT_CHOICE_TYPE",
        `choices are populated but type is '${document.type}', not 'multiple_choice' or 'yesno'`,
        qaContext,
        { type: document.type, choices: document.choices.length }
      )
    );
  }

  if (!choiceType) {
    return findings;
  }

  if (document.choices.length === 0) {
    findings.push(
      createFinding(
        "WARNING",
        "qa",
        "CHOICE_TYPE_WITHOUT_CHOICES",
        `type is '${document.type}' but there are no choices`,
        qaContext,
        { type: document.type }
      )
    );
    return findings;
  }

  if (skip.has("answer")) {
    return findings;
  }

  for (const answer of document.answer) {
    if (!document.choices.includes(answer)) {
      findings.push(
        createFinding(
          "WARNING",
          "qa",
          "ANSWER_NOT_IN_CHOICES",
          `answer '${answer}' is not one of the choices`,
          qaContext,
          { answer, choices: document.choices }
        )
      );
    }
  }

  return findings;
}
