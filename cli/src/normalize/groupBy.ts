import type {ToolArguments} from "../types/mcp.js";
import {isPlainObject} from "../utils/sanitize.js";
import type {RuleContext} from "./types.js";

export const FALLBACK_DIMENSION = "SERVICE";

// Tag names the interpreter tends to pass off as dimensions.
const PSEUDO_DIMENSIONS = new Set(["costcenter", "environment", "project", "team", "department", "usagetypegroup"]);

function isTagGroup(value: unknown): boolean {
  return isPlainObject(value) && typeof value.Type === "string" && value.Type.toUpperCase() === "TAG";
}

/**
 * Tag groupings are not accepted by the cost and usage tool; tags may only
 * appear in filters. Runs ahead of the collapse so the collapsed value sees
 * "SERVICE" rather than the tag key.
 */
export function elideTagGroups(parameters: ToolArguments, context: RuleContext): void {
  const groupBy = parameters.group_by;
  if (!Array.isArray(groupBy) || !groupBy.some(isTagGroup)) {
    return;
  }
  parameters.group_by = groupBy.map((entry: unknown) => {
    if (!isTagGroup(entry)) {
      return entry;
    }
    context.warn("group-by-tag", "Tag grouping is not supported in group_by, grouping by SERVICE instead");
    return FALLBACK_DIMENSION;
  });
}

export function collapseGroupBy(parameters: ToolArguments): void {
  const groupBy = parameters.group_by;
  if (!Array.isArray(groupBy)) {
    return;
  }
  if (groupBy.length === 0) {
    parameters.group_by = null;
    return;
  }
  const [first]: unknown[] = groupBy;
  if (typeof first === "string") {
    parameters.group_by = first;
  } else if (isPlainObject(first) && "Key" in first) {
    parameters.group_by = String(first.Key);
  }
}

export function replacePseudoDimension(parameters: ToolArguments, context: RuleContext): void {
  const groupBy = parameters.group_by;
  if (typeof groupBy !== "string") {
    return;
  }
  const key = groupBy.toLowerCase().replace(/[\s_-]/g, "");
  if (!PSEUDO_DIMENSIONS.has(key)) {
    return;
  }
  parameters.group_by = FALLBACK_DIMENSION;
  context.warn("group-by-dimension", `"${groupBy}" is not a valid dimension for group_by, grouping by SERVICE instead`);
}
