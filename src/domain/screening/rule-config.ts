import { ConfigurationError } from "../../core/errors.js";
import {
  GRANT_SIZE_LABEL,
  HARD_REJECT_LABEL,
  INVITATION_ONLY_LABEL,
  RULE_DOCUMENT_VERSION,
  type GrantSizeBounds,
  type GreenFlagRule,
  type OrganizationProfile,
  type RedFlagRule,
  type RuleConfiguration,
} from "./types.js";

// ============================================================================
// Rule document parsing
//
// The on-disk document keeps the layout the setup wizard writes
// (snake_case keys, flags as "R2. text" strings). Both the document and the
// built-in default go through parseRuleDocument() so they come out with the
// same shape and the same validation.
// ============================================================================

type FlagPrefix = "R" | "G";

interface LabeledRule {
  label: string;
  text: string;
}

const LABEL_PATTERN = /^([RG])(\d+)([a-z]?)$/i;
const LABELED_LINE_PATTERN = /^\s*([RG]\d+[a-z]?)\s*[.:)]\s*([\s\S]+?)\s*$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(
  source: Record<string, unknown>,
  ...keys: string[]
): string | undefined {
  for (const key of keys) {
    const val = source[key];
    if (typeof val === "string") return val.trim();
  }
  return undefined;
}

function readNumber(value: unknown): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.replace(/[$,\s]/g, ""));
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** "r1A" -> "R1a", "g10" -> "G10". Returns null for anything else. */
export function canonicalLabel(raw: string): string | null {
  const match = LABEL_PATTERN.exec(raw.trim());
  if (!match) return null;
  return `${match[1].toUpperCase()}${match[2]}${match[3].toLowerCase()}`;
}

function parseFlagEntry(
  entry: unknown,
  prefix: FlagPrefix,
  index: number,
  problems: string[],
): LabeledRule | null {
  const where = `${prefix === "R" ? "red_flags" : "green_flags"}[${index}]`;
  let rawLabel: string | undefined;
  let text: string | undefined;

  if (typeof entry === "string") {
    const match = LABELED_LINE_PATTERN.exec(entry);
    if (!match) {
      problems.push(`${where} has no "${prefix}<n>." label: "${entry.trim()}"`);
      return null;
    }
    rawLabel = match[1];
    text = match[2];
  } else if (isRecord(entry)) {
    rawLabel = readString(entry, "label");
    text = readString(entry, "text");
  }

  if (!rawLabel || !text) {
    problems.push(`${where} must be a labeled string or { label, text }`);
    return null;
  }

  const label = canonicalLabel(rawLabel);
  if (!label || !label.startsWith(prefix)) {
    problems.push(`${where} label "${rawLabel}" must look like ${prefix}1`);
    return null;
  }
  return { label, text: text.replace(/\s+/g, " ") };
}

function toRedFlagRule({ label, text }: LabeledRule): RedFlagRule {
  if (label === HARD_REJECT_LABEL) {
    return { kind: "closed", label: HARD_REJECT_LABEL, text };
  }
  if (label === INVITATION_ONLY_LABEL) {
    return { kind: "invitation_only", label: INVITATION_ONLY_LABEL, text };
  }
  return { kind: "disqualifier", label, text };
}

function parseFlagList(
  raw: unknown,
  prefix: FlagPrefix,
  problems: string[],
): LabeledRule[] {
  if (!Array.isArray(raw)) {
    problems.push(
      `${prefix === "R" ? "red_flags" : "green_flags"} must be an array`,
    );
    return [];
  }
  const rules: LabeledRule[] = [];
  raw.forEach((entry, i) => {
    const rule = parseFlagEntry(entry, prefix, i, problems);
    if (rule) rules.push(rule);
  });
  return rules;
}

/**
 * Turn a parsed JSON rule document into a validated RuleConfiguration.
 * Throws ConfigurationError listing every problem found.
 */
export function parseRuleDocument(raw: unknown): RuleConfiguration {
  if (!isRecord(raw)) {
    throw new ConfigurationError("Rule document must be a JSON object");
  }

  const problems: string[] = [];
  const org = isRecord(raw.org) ? raw.org : isRecord(raw.organization) ? raw.organization : {};
  const size = isRecord(raw.grant_size) ? raw.grant_size : {};

  const organization: OrganizationProfile = {
    name: readString(org, "name") ?? "",
    mission: readString(org, "mission") ?? "",
    region: readString(org, "region", "state") ?? "",
    targetLocalities:
      readString(org, "target_localities", "target_cities") ?? "",
  };

  const grantSizeBounds: GrantSizeBounds = {
    min: readNumber(size.min) ?? 0,
    max: readNumber(size.max) ?? 0,
  };

  const threshold = readNumber(raw.green_threshold);
  const version = readNumber(raw.version) ?? RULE_DOCUMENT_VERSION;

  const config: RuleConfiguration = {
    version,
    organization,
    grantSizeBounds,
    redFlags: parseFlagList(raw.red_flags, "R", problems).map(toRedFlagRule),
    greenFlags: parseFlagList(raw.green_flags, "G", problems),
    greenThreshold: threshold ?? 4,
    customContext: readString(raw, "custom_context") ?? "",
  };

  problems.push(...collectRuleProblems(config));
  if (problems.length > 0) {
    throw new ConfigurationError("Invalid rule configuration", problems);
  }
  return config;
}

// ============================================================================
// Validation
// ============================================================================

function duplicates(labels: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const label of labels) {
    if (seen.has(label)) dupes.add(label);
    seen.add(label);
  }
  return [...dupes];
}

function collectRuleProblems(config: RuleConfiguration): string[] {
  const problems: string[] = [];
  const redLabels = config.redFlags.map((f) => f.label);
  const greenLabels = config.greenFlags.map((f) => f.label);

  if (config.version !== RULE_DOCUMENT_VERSION) {
    problems.push(
      `Unsupported rule document version ${config.version} (expected ${RULE_DOCUMENT_VERSION})`,
    );
  }
  if (!config.organization.name) problems.push("org.name is required");

  for (const label of duplicates(redLabels)) {
    problems.push(`Duplicate red flag label ${label}`);
  }
  for (const label of duplicates(greenLabels)) {
    problems.push(`Duplicate green flag label ${label}`);
  }
  if (redLabels.includes(GRANT_SIZE_LABEL)) {
    problems.push(`${GRANT_SIZE_LABEL} is reserved for the grant-size rule`);
  }
  if (!redLabels.includes(HARD_REJECT_LABEL)) {
    problems.push(`Red flag ${HARD_REJECT_LABEL} (closed / not accepting) is required`);
  }
  if (!redLabels.includes(INVITATION_ONLY_LABEL)) {
    problems.push(`Red flag ${INVITATION_ONLY_LABEL} (invitation only) is required`);
  }
  if (config.greenFlags.length === 0) {
    problems.push("At least one green flag is required");
  }

  const t = config.greenThreshold;
  if (!Number.isInteger(t) || t < 1) {
    problems.push("green_threshold must be an integer >= 1");
  } else if (t > config.greenFlags.length) {
    problems.push(
      `green_threshold ${t} exceeds the ${config.greenFlags.length} green flag(s); ACCEPT would be unreachable`,
    );
  }

  const { min, max } = config.grantSizeBounds;
  if (min < 0 || max < 0) problems.push("grant_size bounds must be non-negative");
  if (min > 0 && max > 0 && min > max) {
    problems.push("grant_size.min must be <= grant_size.max");
  }

  return problems;
}

/**
 * Validate a RuleConfiguration built in code (tests, callers that skip the
 * document). Throws on misconfiguration rather than running with a policy
 * that can never reach ACCEPT.
 */
export function validateRuleConfiguration(config: RuleConfiguration): void {
  const problems = collectRuleProblems(config);
  if (problems.length > 0) {
    throw new ConfigurationError("Invalid rule configuration", problems);
  }
}

// ============================================================================
// Built-in default
// ============================================================================

export const DEFAULT_ORGANIZATION: OrganizationProfile = {
  name: "Our Nonprofit",
  mission: "providing STEM education to underserved youth",
  region: "NJ",
  targetLocalities: "local cities",
};

/**
 * Baseline rule set used when no rule document exists. Region-specific
 * flags are filled in from the organization profile.
 */
export function buildDefaultRuleConfiguration(
  organization: OrganizationProfile = DEFAULT_ORGANIZATION,
): RuleConfiguration {
  const region = organization.region || DEFAULT_ORGANIZATION.region;
  const localities =
    organization.targetLocalities || DEFAULT_ORGANIZATION.targetLocalities;

  return parseRuleDocument({
    version: RULE_DOCUMENT_VERSION,
    org: {
      name: organization.name,
      mission: organization.mission,
      region,
      target_localities: localities,
    },
    grant_size: { min: 0, max: 0 },
    green_threshold: 4,
    red_flags: [
      'R1a. Status explicitly says "not accepting applications" or "permanently closed"',
      'R1b. Status says "invitation only"',
      `R2. Only funds a state that is not ${region}`,
      `R3. Zero ${region} grantees found`,
      "R4. Only funds colleges, hospitals or adults; no K-12 or youth",
      "R5. Mission contradicts actual grant focus",
      "R6. Only Environment, Animals, or Health; no education",
      "R7. Max grant < $2,500 or min grant > $100,000",
      "R8. Last grant awarded more than 2 years ago",
    ],
    green_flags: [
      "G1. Mission mentions STEM, coding, robotics, or girls in STEM",
      "G2. Past grantees include STEM programs or coding orgs",
      `G3. Based in or funds ${region}`,
      `G4. Past grants in ${localities}`,
      "G5. Age group: middle school, grades 6-8, youth, or K-12",
      "G6. Equity: underserved, low-income, or Title I",
      "G7. Typical grant $5,000-$50,000",
      "G8. Grants awarded in the last 12 months",
    ],
    custom_context: "",
  });
}

// ============================================================================
// Derived rules
// ============================================================================

function formatUsd(amount: number): string {
  return `$${amount.toLocaleString("en-US")}`;
}

export function describeGrantSizeRule(bounds: GrantSizeBounds): string | null {
  const { min, max } = bounds;
  if (min > 0 && max > 0) {
    return `Grant size outside [${formatUsd(min)}, ${formatUsd(max)}]`;
  }
  if (min > 0) return `Grant size below ${formatUsd(min)}`;
  if (max > 0) return `Grant size above ${formatUsd(max)}`;
  return null;
}

/** Configured red flags plus the synthesized grant-size rule, if any. */
export function effectiveRedFlags(config: RuleConfiguration): RedFlagRule[] {
  const sizeRule = describeGrantSizeRule(config.grantSizeBounds);
  if (!sizeRule) return config.redFlags;
  return [
    ...config.redFlags,
    { kind: "disqualifier", label: GRANT_SIZE_LABEL, text: sizeRule },
  ];
}
