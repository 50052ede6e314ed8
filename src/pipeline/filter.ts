// pattern: Functional Core
import type { FilterConfig } from "../config";

type CompiledPattern = {
  readonly pattern: string;
  readonly re: RegExp;
};

export type FilterRules = {
  readonly global: ReadonlyArray<CompiledPattern>;
  readonly byCommunity: ReadonlyMap<string, ReadonlyArray<CompiledPattern>>;
};

export type FilterRejection = {
  readonly scope: "global" | "community";
  readonly pattern: string;
};

// Patterns match from the start of the title; use a leading `.*` to match anywhere.
function compilePattern(pattern: string): CompiledPattern {
  return { pattern, re: new RegExp(`^(?:${pattern})`) };
}

/**
 * Compiles configured reject patterns into an immutable snapshot, taken once
 * per poll cycle.
 */
export function compileFilterRules(filters: FilterConfig): FilterRules {
  const byCommunity = new Map<string, ReadonlyArray<CompiledPattern>>();
  for (const [community, patterns] of Object.entries(filters.communities)) {
    byCommunity.set(community, patterns.map(compilePattern));
  }

  return {
    global: filters.global.map(compilePattern),
    byCommunity,
  };
}

/**
 * Returns the first reject pattern matching `text`, checking the global list
 * before the community's own list, or null when the text is allowed.
 */
export function findRejection(
  text: string,
  community: string,
  rules: FilterRules,
): FilterRejection | null {
  for (const { pattern, re } of rules.global) {
    if (re.test(text)) return { scope: "global", pattern };
  }

  for (const { pattern, re } of rules.byCommunity.get(community) ?? []) {
    if (re.test(text)) return { scope: "community", pattern };
  }

  return null;
}

export function isAllowed(
  text: string,
  community: string,
  rules: FilterRules,
): boolean {
  return findRejection(text, community, rules) === null;
}
