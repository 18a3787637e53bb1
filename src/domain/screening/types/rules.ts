// Rule Configuration Types
//
// RedFlagRule is a tagged union: the two reserved labels carry their own kind
// so the resolver never depends on a rule's position in the list.

export const RULE_DOCUMENT_VERSION = 1;

export const HARD_REJECT_LABEL = "R1a";
export const INVITATION_ONLY_LABEL = "R1b";
export const GRANT_SIZE_LABEL = "R-size";

export type RedFlagKind = "closed" | "invitation_only" | "disqualifier";

export type RedFlagRule =
  | { kind: "closed"; label: typeof HARD_REJECT_LABEL; text: string }
  | { kind: "invitation_only"; label: typeof INVITATION_ONLY_LABEL; text: string }
  | { kind: "disqualifier"; label: string; text: string };

export interface GreenFlagRule {
  label: string;
  text: string;
}

export interface OrganizationProfile {
  name: string;
  mission: string;
  region: string;
  targetLocalities: string;
}

/** 0 on either side means unbounded on that side. */
export interface GrantSizeBounds {
  min: number;
  max: number;
}

export interface RuleConfiguration {
  version: number;
  organization: OrganizationProfile;
  grantSizeBounds: GrantSizeBounds;
  redFlags: RedFlagRule[];
  greenFlags: GreenFlagRule[];
  greenThreshold: number;
  customContext: string;
}
