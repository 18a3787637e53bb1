import { compactRecord } from "./response-formatter.js";
import {
  type ToolDefinition,
  argBool,
  argClassification,
  argCount,
  argStringOpt,
  formatToolResponse,
  notAvailable,
  toolError,
} from "./tool-registry.js";
import { getErrorMessage } from "../core/logging.js";

export function getToolDefinitions(): ToolDefinition[] {
  return [
    {
      name: "list_decisions",
      description:
        "List saved screening decisions with summary stats. Filter by classification or date.",
      inputSchema: {
        type: "object",
        properties: {
          classification: {
            type: "string",
            enum: ["ACCEPT", "REVIEW", "REJECT"],
            description: "Filter by classification.",
          },
          since: {
            type: "string",
            description:
              "Only show decisions made after this ISO date (e.g., 2026-01-01).",
          },
          limit: {
            type: "number",
            description: "Max results to return (default 20, max 100).",
          },
        },
      },
      handler: async (args, ctx) => {
        if (!ctx.decisionStore) {
          return notAvailable("DecisionStore");
        }
        const classification = argClassification(args, "classification");
        if (!classification.ok) {
          return toolError('Invalid classification. Must be "ACCEPT", "REVIEW" or "REJECT".');
        }

        try {
          const results = ctx.decisionStore.listDecisions({
            classification: classification.value,
            since: argStringOpt(args, "since"),
            limit: argCount(args, "limit"),
          });
          return formatToolResponse({
            success: true,
            data: {
              results: results.map(compactRecord),
              stats: ctx.decisionStore.getStats(),
            },
          });
        } catch (err) {
          return toolError(getErrorMessage(err));
        }
      },
    },
    {
      name: "clear_decisions",
      description:
        "Delete every saved decision so the next backlog run screens all funders again. Requires confirm: true.",
      inputSchema: {
        type: "object",
        properties: {
          confirm: {
            type: "boolean",
            description: "Must be true to proceed.",
          },
        },
        required: ["confirm"],
      },
      handler: async (args, ctx) => {
        if (!argBool(args, "confirm")) {
          return toolError("Refusing to clear decisions without confirm: true.");
        }
        if (!ctx.decisionStore) {
          return notAvailable("DecisionStore");
        }
        const removed = ctx.decisionStore.clearResults();
        return formatToolResponse({ success: true, data: { removed } });
      },
    },
    {
      name: "count_backlog",
      description:
        "Count backlog opportunities per CRM stage and report how many are in the stage that backlog screening reads.",
      inputSchema: {
        type: "object",
        properties: {},
      },
      handler: async (_args, ctx) => {
        if (!ctx.backlog) return notAvailable("Backlog source");
        try {
          const stages = await ctx.backlog.countByStage();
          const stageFilter = ctx.config.backlog.stageFilter;
          return formatToolResponse({
            success: true,
            data: {
              stage_filter: stageFilter,
              in_stage: stages.find((s) => s.stage === stageFilter)?.count ?? 0,
              total: stages.reduce((sum, s) => sum + s.count, 0),
              stages,
            },
          });
        } catch (err) {
          return toolError(`Backlog count failed: ${getErrorMessage(err)}`);
        }
      },
    },
  ];
}
