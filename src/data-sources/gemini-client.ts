import { GoogleGenAI } from "@google/genai";
import { ConfigurationError } from "../core/errors.js";
import { logDebug } from "../core/logging.js";
import type { ReasoningConfig } from "../core/config.js";
import type { Citation } from "../domain/screening/types.js";
import type {
  GenerateOptions,
  ReasoningResponse,
  ReasoningService,
} from "../domain/screening/screening-pipeline.js";
import { domainLabel } from "../domain/evidence/citations.js";

/** The parts of a generateContent response this client reads. */
export interface GroundedResponse {
  text?: string;
  candidates?: Array<{
    groundingMetadata?: {
      groundingChunks?: Array<{
        web?: { uri?: string; title?: string };
      }>;
    };
  }>;
}

/** Answer text plus the web sources the model grounded on, in order. */
export function parseGroundedResponse(
  response: GroundedResponse,
): ReasoningResponse {
  const citations: Citation[] = [];
  const chunks = response.candidates?.[0]?.groundingMetadata?.groundingChunks ?? [];
  for (const chunk of chunks) {
    const uri = chunk.web?.uri;
    if (!uri) continue;
    citations.push({ label: chunk.web?.title || domainLabel(uri), url: uri });
  }
  return { text: response.text ?? "", citations };
}

/** Gemini with optional Google Search grounding. */
export class GeminiClient implements ReasoningService {
  private ai: GoogleGenAI;
  private config: ReasoningConfig;

  constructor(config: ReasoningConfig) {
    if (!config.geminiApiKey) {
      throw new ConfigurationError("GEMINI_API_KEY not set in environment");
    }
    this.config = config;
    this.ai = new GoogleGenAI({ apiKey: config.geminiApiKey });
  }

  async generate(
    prompt: string,
    options: GenerateOptions = {},
  ): Promise<ReasoningResponse> {
    const response = await this.ai.models.generateContent({
      model: this.config.model,
      contents: prompt,
      config: {
        temperature: options.temperature ?? 0,
        tools: this.config.searchGrounding ? [{ googleSearch: {} }] : undefined,
        httpOptions: { timeout: this.config.timeoutMs },
      },
    });

    const parsed = parseGroundedResponse(response);
    logDebug(
      `Gemini ${this.config.model}: ${parsed.text.length} chars, ${parsed.citations.length} grounding source(s)`,
    );
    return parsed;
  }
}
