// Decision Types
//
// FlagEvaluation — what the rationale says fired, as read by the resolver
// DecisionResolution — resolver output (classification + repaired rationale)
// Decision — the immutable record handed to the result sink

import type { Candidate } from "./candidate.js";
import type { Citation } from "./evidence.js";

export type Classification = "ACCEPT" | "REVIEW" | "REJECT";

export const CLASSIFICATIONS: readonly Classification[] = [
  "ACCEPT",
  "REVIEW",
  "REJECT",
];

export interface PolicyInputs {
  hardRed: boolean;
  softRed: boolean;
  greenCount: number;
}

export interface FlagEvaluation {
  redFlagsFired: string[];
  greenFlagsMet: string[];
  greenCount: number;
  greenTotal: number;
  context: string;
  redReadable: boolean;
  greenReadable: boolean;
}

export interface DecisionResolution {
  classification: Classification;
  rationale: string;
  confidence: number;
  next_action_date: string | null;
  sources: Citation[];
  upstream_classification: Classification | null;
}

export interface Decision {
  readonly candidate: Candidate;
  readonly classification: Classification;
  readonly rationale: string;
  readonly confidence: number;
  readonly next_action_date: string | null;
  readonly sources: readonly Citation[];
  readonly upstream_classification: Classification | null;
  readonly screened_at: string;
}
