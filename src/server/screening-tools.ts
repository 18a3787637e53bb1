import { candidateFromRow } from "../domain/screening/backlog.js";
import {
  compactDecision,
  compactRecord,
  compactRuleConfig,
  compactRunSummary,
} from "./response-formatter.js";
import {
  type ToolDefinition,
  type ToolResponse,
  argBoolOpt,
  argCount,
  argNumber,
  argString,
  argStringOpt,
  formatToolResponse,
  notAvailable,
  toolError,
} from "./tool-registry.js";
import type { ServerContext } from "./context.js";
import { logError, getErrorMessage } from "../core/logging.js";

const AD_HOC_STAGE = "Ad hoc";

function unavailable(ctx: ServerContext): ToolResponse {
  return toolError(`Screening not available: ${ctx.pipelineError ?? "pipeline not initialized"}`);
}

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "screen_grant",
      description:
        "Screen one grant opportunity against the configured red/green flags. Gathers evidence from ProPublica, Granted, Candid and CauseIQ, asks Gemini (with Google Search grounding) to evaluate it, then re-applies the decision policy. Returns ACCEPT, REVIEW or REJECT with a rationale and up to 5 sources, plus the funder's previous saved decision if there is one.",
      inputSchema: {
        type: "object",
        properties: {
          foundation_name: {
            type: "string",
            description: 'Funder name, e.g. "~Acme Family Foundation". A leading "~" is ignored.',
          },
          grant_name: {
            type: "string",
            description: "Optional: opportunity name as recorded in the CRM.",
          },
          website: {
            type: "string",
            description: "Optional: funder website or grant requirements page.",
          },
          amount: {
            type: "number",
            description: "Optional: requested amount in USD.",
          },
          focus_area: {
            type: "string",
            description: "Optional: program focus of the request.",
          },
          persist: {
            type: "boolean",
            description: "Save the decision to the decision store. Default: true.",
          },
        },
        required: ["foundation_name"],
      },
      handler: async (args, ctx) => {
        if (!ctx.pipeline) return unavailable(ctx);

        const foundation = argString(args, "foundation_name").trim();
        if (!foundation) {
          return toolError("foundation_name is required.");
        }

        const candidate = candidateFromRow({
          Id: "",
          Name: argStringOpt(args, "grant_name") ?? foundation,
          Corporate_Kanban_Sort__c: foundation,
          Amount: argNumber(args, "amount"),
          Grant_Requirements_Website__c: argStringOpt(args, "website"),
          Grant_Focus__c: argStringOpt(args, "focus_area"),
          StageName: AD_HOC_STAGE,
        });

        // Read before saving so the response shows what this screening replaces.
        const previous = ctx.decisionStore?.getLatestByFoundation(candidate.foundation_name) ?? null;
        const decision = await ctx.pipeline.screenCandidate(candidate);

        let persisted = false;
        if ((argBoolOpt(args, "persist") ?? true) && ctx.decisionStore) {
          try {
            ctx.decisionStore.saveDecision(decision);
            persisted = true;
          } catch (err) {
            logError("Failed to save decision:", getErrorMessage(err));
          }
        }

        return formatToolResponse({
          success: true,
          data: compactDecision(decision),
          persisted,
          previous: previous ? compactRecord(previous) : null,
        });
      },
    },
    {
      name: "run_backlog_screening",
      description:
        "Screen every backlog opportunity in a CRM stage (default: the configured stage filter). Funders already in the decision store are skipped, so the run can be repeated safely. Each decision is saved as soon as it is made.",
      inputSchema: {
        type: "object",
        properties: {
          stage: {
            type: "string",
            description: 'CRM stage to screen (default from DB_STAGE_FILTER, e.g. "LOI Backlog").',
          },
          limit: {
            type: "number",
            description: "Max opportunities to fetch from the backlog.",
          },
        },
      },
      handler: async (args, ctx) => {
        if (!ctx.pipeline) return unavailable(ctx);
        if (!ctx.backlog) return notAvailable("Backlog source");

        const stage = argStringOpt(args, "stage") ?? ctx.config.backlog.stageFilter;
        const limit = argCount(args, "limit") ?? ctx.config.backlog.limit;

        try {
          const candidates = await ctx.backlog.fetchCandidates({ stage, limit });
          const summary = await ctx.pipeline.runBacklog(candidates);
          return formatToolResponse({
            success: true,
            data: { stage, fetched: candidates.length, ...compactRunSummary(summary) },
          });
        } catch (err) {
          return toolError(`Backlog screening failed: ${getErrorMessage(err)}`);
        }
      },
    },
    {
      name: "get_rule_config",
      description:
        "Show the rule set in force: organization profile, red flags (including the grant-size rule when bounds are set), green flags and the green-flag threshold for ACCEPT.",
      inputSchema: {
        type: "object",
        properties: {},
      },
      handler: async (_args, ctx) =>
        formatToolResponse({
          success: true,
          data: compactRuleConfig(ctx.rules),
        }),
    },
  ];
}
