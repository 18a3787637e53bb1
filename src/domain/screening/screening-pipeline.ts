import type {
  Candidate,
  Citation,
  Classification,
  Decision,
  EvidenceBundle,
  RuleConfiguration,
} from "./types.js";
import { renderEvaluationPrompt } from "./prompt-formatter.js";
import { fallbackResolution, resolveDecision } from "./decision-resolver.js";
import { buildDecision } from "./decision-builder.js";
import { logError, logInfo, getErrorMessage } from "../../core/logging.js";

export interface ReasoningResponse {
  text: string;
  /** Sources the service grounded its answer on, in the order received. */
  citations: Citation[];
}

export interface GenerateOptions {
  temperature?: number;
}

export interface ReasoningService {
  generate(prompt: string, options?: GenerateOptions): Promise<ReasoningResponse>;
}

export interface EvidenceGatherer {
  gather(searchName: string, website?: string | null): Promise<EvidenceBundle>;
}

/** Where decisions are persisted. Knows which funders it already holds. */
export interface ResultSink {
  getProcessedNames(): Promise<Set<string>>;
  append(decision: Decision): Promise<void>;
}

export interface ScreeningPipelineConfig {
  rules: RuleConfiguration;
  evidence: EvidenceGatherer;
  reasoner: ReasoningService;
  sink?: ResultSink;
}

export interface DecisionProgress {
  index: number;
  total: number;
  persisted: boolean;
}

export interface BacklogRunOptions {
  onDecision?: (decision: Decision, progress: DecisionProgress) => void;
}

export interface WriteFailure {
  foundation_name: string;
  error: string;
}

export interface BacklogRunSummary {
  decisions: Decision[];
  skipped: string[];
  persisted: number;
  write_failures: WriteFailure[];
  counts: Record<Classification, number>;
}

// ScreeningPipeline runs candidates one at a time:
// evidence -> prompt -> reasoning -> resolve -> record -> persist.
// A failure inside one candidate becomes a REVIEW decision for that
// candidate and never reaches the next one.
export class ScreeningPipeline {
  private config: ScreeningPipelineConfig;

  constructor(config: ScreeningPipelineConfig) {
    this.config = config;
  }

  get rules(): RuleConfiguration {
    return this.config.rules;
  }

  async screenCandidate(candidate: Candidate): Promise<Decision> {
    const { rules, evidence, reasoner } = this.config;
    let bundle: EvidenceBundle | null = null;

    try {
      bundle = await evidence.gather(candidate.search_name, candidate.website);
      const prompt = renderEvaluationPrompt(rules, candidate, bundle.digest);
      const response = await reasoner.generate(prompt, { temperature: 0 });

      const resolution = resolveDecision({
        rawText: response.text,
        rules,
        evidenceCitations: bundle.citations,
        reasoningCitations: response.citations,
      });
      return buildDecision(candidate, resolution);
    } catch (err) {
      const message = getErrorMessage(err);
      logError(`Error screening ${candidate.foundation_name}:`, message);
      return buildDecision(
        candidate,
        fallbackResolution(
          `Error during screening: ${message}`,
          bundle ? [...bundle.citations] : [],
        ),
      );
    }
  }

  /**
   * Screen a backlog. The sink's processed names are read once up front;
   * funders already in the sink, or repeated within this batch, are skipped.
   * Each decision is persisted as soon as it exists.
   */
  async runBacklog(
    candidates: Candidate[],
    opts: BacklogRunOptions = {},
  ): Promise<BacklogRunSummary> {
    const { sink } = this.config;
    const processed = sink ? await sink.getProcessedNames() : new Set<string>();

    const queue: Candidate[] = [];
    const skipped: string[] = [];
    const seen = new Set<string>();
    for (const candidate of candidates) {
      const key = candidate.foundation_name.trim();
      if (processed.has(key) || seen.has(key)) {
        skipped.push(key);
        continue;
      }
      seen.add(key);
      queue.push(candidate);
    }
    if (skipped.length > 0) {
      logInfo(`Skipping ${skipped.length} already-processed grant(s).`);
    }

    const summary: BacklogRunSummary = {
      decisions: [],
      skipped,
      persisted: 0,
      write_failures: [],
      counts: { ACCEPT: 0, REVIEW: 0, REJECT: 0 },
    };

    for (const [i, candidate] of queue.entries()) {
      logInfo(`[${i + 1}/${queue.length}] Processing: ${candidate.foundation_name}`);
      const decision = await this.screenCandidate(candidate);
      summary.decisions.push(decision);
      summary.counts[decision.classification] += 1;

      let persisted = false;
      if (sink) {
        try {
          await sink.append(decision);
          persisted = true;
          summary.persisted += 1;
        } catch (err) {
          const message = getErrorMessage(err);
          logError(`Failed to persist decision for ${candidate.foundation_name}:`, message);
          summary.write_failures.push({
            foundation_name: candidate.foundation_name,
            error: message,
          });
        }
      }

      opts.onDecision?.(decision, { index: i, total: queue.length, persisted });
    }

    return summary;
  }
}
