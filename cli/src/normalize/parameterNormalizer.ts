import type {ToolArguments} from "../types/mcp.js";
import {
  alignComparisonMonths,
  clampFutureStart,
  excludeCurrentMonth,
  renamePeriodFields,
  separateCollidingRanges
} from "./dateRanges.js";
import {formatLocalDate, yearMonthOf} from "./dates.js";
import {rewriteFilterExpression} from "./filters.js";
import {collapseGroupBy, elideTagGroups, replacePseudoDimension} from "./groupBy.js";
import {collapseCompositeMetric, normalizeMetricCasing, replaceBothMetric} from "./metrics.js";
import {
  toolFamily,
  type NormalizationRule,
  type NormalizationWarning,
  type NormalizeOptions,
  type NormalizeResult,
  type RuleContext
} from "./types.js";

/**
 * Ordered repair rules. Every rule is idempotent on its own and the sequence
 * as a whole is idempotent, so normalizing twice equals normalizing once.
 */
export const NORMALIZATION_RULES: readonly NormalizationRule[] = [
  elideTagGroups,
  collapseGroupBy,
  replacePseudoDimension,
  clampFutureStart,
  normalizeMetricCasing,
  replaceBothMetric,
  collapseCompositeMetric,
  renamePeriodFields,
  alignComparisonMonths,
  excludeCurrentMonth,
  separateCollidingRanges,
  rewriteFilterExpression
];

/**
 * Repair the parameter shapes the upstream interpreter is known to get wrong
 * for the given tool. The caller's value is never modified.
 */
export function normalizeParameters(
  toolName: string,
  parameters: ToolArguments,
  options: NormalizeOptions = {}
): NormalizeResult {
  const now = (options.now ?? (() => new Date()))();
  const warnings: NormalizationWarning[] = [];
  const context: RuleContext = {
    toolName,
    family: toolFamily(toolName),
    today: formatLocalDate(now),
    currentMonth: yearMonthOf(now),
    warn: (rule, message) => {
      warnings.push({rule, message});
    }
  };

  const copy = structuredClone(parameters);
  for (const rule of NORMALIZATION_RULES) {
    rule(copy, context);
  }
  return {parameters: copy, warnings};
}
