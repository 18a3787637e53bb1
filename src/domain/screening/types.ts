export * from "./types/rules.js";
export * from "./types/candidate.js";
export * from "./types/evidence.js";
export * from "./types/decision.js";
