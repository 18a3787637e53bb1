import { CLASSIFICATIONS, type Classification } from "../domain/screening/types.js";
import type { ServerContext } from "./context.js";

export type ToolArgs = Record<string, unknown> | undefined;

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError: boolean;
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
  handler: (args: ToolArgs, ctx: ServerContext) => Promise<ToolResponse>;
}

// ============================================================================
// Arg-parsing helpers
// ============================================================================

export function argString(args: ToolArgs, key: string): string {
  const val = args?.[key];
  return typeof val === "string" ? val : "";
}

/** Trimmed string, or undefined when missing or blank. */
export function argStringOpt(args: ToolArgs, key: string): string | undefined {
  const val = args?.[key];
  if (typeof val !== "string") return undefined;
  const trimmed = val.trim();
  return trimmed ? trimmed : undefined;
}

export function argBool(args: ToolArgs, key: string): boolean {
  return args?.[key] === true;
}

export function argBoolOpt(args: ToolArgs, key: string): boolean | undefined {
  const val = args?.[key];
  return typeof val === "boolean" ? val : undefined;
}

export function argNumber(args: ToolArgs, key: string): number | undefined {
  const val = args?.[key];
  return typeof val === "number" && Number.isFinite(val) ? val : undefined;
}

/** Positive whole count (limits); anything else is treated as absent. */
export function argCount(args: ToolArgs, key: string): number | undefined {
  const val = argNumber(args, key);
  if (val === undefined || val < 1) return undefined;
  return Math.floor(val);
}

export type ClassificationArg =
  | { ok: true; value: Classification | undefined }
  | { ok: false; raw: string };

/** Case-insensitive ACCEPT / REVIEW / REJECT filter. */
export function argClassification(args: ToolArgs, key: string): ClassificationArg {
  const raw = argStringOpt(args, key);
  if (raw === undefined) return { ok: true, value: undefined };
  const value = CLASSIFICATIONS.find((c) => c === raw.toUpperCase());
  return value ? { ok: true, value } : { ok: false, raw };
}

/**
 * Format a `{ success, ... }` result into an MCP content response.
 */
export function formatToolResponse(result: {
  success: boolean;
  [key: string]: unknown;
}): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

export function toolError(error: string): ToolResponse {
  return formatToolResponse({ success: false, error });
}

/** Response for a collaborator that failed to initialize at startup. */
export function notAvailable(what: string): ToolResponse {
  return toolError(`${what} not available. Check server logs for initialization errors.`);
}

/**
 * Holds the screening and decision tools by name and dispatches calls to them.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();

  register(defs: ToolDefinition[]): void {
    for (const def of defs) {
      if (this.tools.has(def.name)) {
        throw new Error(`Duplicate tool name: ${def.name}`);
      }
      this.tools.set(def.name, def);
    }
  }

  listTools(): Array<Omit<ToolDefinition, "handler">> {
    return [...this.tools.values()].map(({ name, description, inputSchema }) => ({
      name,
      description,
      inputSchema,
    }));
  }

  async callTool(name: string, args: ToolArgs, ctx: ServerContext): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return tool.handler(args, ctx);
  }
}
