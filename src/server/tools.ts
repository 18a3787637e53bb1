import { ToolRegistry } from "./tool-registry.js";
import * as screeningTools from "./screening-tools.js";
import * as decisionTools from "./decision-tools.js";

export function createToolRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register(screeningTools.getToolDefinitions());
  registry.register(decisionTools.getToolDefinitions());
  return registry;
}
