import type {
  Classification,
  FlagEvaluation,
  PolicyInputs,
  RedFlagKind,
  RedFlagRule,
} from "./types.js";

/**
 * Classification policy. First matching row wins:
 *
 *   hard red                      -> REJECT
 *   soft red, 0 green             -> REJECT
 *   soft red, >= 1 green          -> REVIEW
 *   no red, green >= threshold    -> ACCEPT
 *   no red, green <  threshold    -> REVIEW
 *
 * Hard red means a "closed" or "disqualifier" rule fired; soft red means the
 * "invitation_only" rule fired.
 */
export function classify(
  inputs: PolicyInputs,
  threshold: number,
): Classification {
  if (inputs.hardRed) return "REJECT";
  if (inputs.softRed) return inputs.greenCount >= 1 ? "REVIEW" : "REJECT";
  return inputs.greenCount >= threshold ? "ACCEPT" : "REVIEW";
}

/** Kind of the rule behind a fired label; unknown labels disqualify. */
export function redFlagKind(label: string, redFlags: readonly RedFlagRule[]): RedFlagKind {
  return redFlags.find((rule) => rule.label === label)?.kind ?? "disqualifier";
}

export function policyInputsFrom(
  evaluation: FlagEvaluation,
  redFlags: readonly RedFlagRule[],
): PolicyInputs {
  const kinds = evaluation.redFlagsFired.map((label) => redFlagKind(label, redFlags));
  return {
    hardRed: kinds.some((kind) => kind !== "invitation_only"),
    softRed: kinds.includes("invitation_only"),
    greenCount: evaluation.greenCount,
  };
}
