import type {ToolCall} from "../types/mcp.js";
import {COST_BASIS_METRIC, COST_BASIS_ORDER, detectCostBases, spellMetric} from "./metrics.js";

export const SPLITTABLE_TOOL = "get_cost_and_usage";

const DEFAULT_SPLIT_METRICS = ["AmortizedCost", "BlendedCost"] as const;

export interface SplitOptions {
  /** Free-text request the call was interpreted from. */
  query?: string;
  /** Metrics the caller asked for explicitly. */
  metrics?: readonly string[];
}

function wantsSeparateMetrics(query: string): boolean {
  const text = query.toLowerCase();
  return /\b(separate|both)\b/.test(text) && /\b(metrics?|costs?)\b/.test(text);
}

/** Metrics to request separately for a query, or an empty list when no split is wanted. */
export function metricsForQuery(query: string): string[] {
  const bases = detectCostBases(query);
  if (bases.length < 2 && !wantsSeparateMetrics(query)) {
    return [];
  }
  if (bases.length === 0) {
    return [...DEFAULT_SPLIT_METRICS];
  }
  return COST_BASIS_ORDER.filter((basis) => bases.includes(basis)).map((basis) => COST_BASIS_METRIC[basis]);
}

function uniqueMetrics(metrics: readonly string[]): string[] {
  const spelled = metrics.map((metric) => spellMetric(metric, "usage") ?? metric);
  return [...new Set(spelled)];
}

/**
 * The cost and usage tool accepts a single metric per call. A request for
 * several metrics becomes one call per metric; anything else is returned as
 * a one-element list holding the original call.
 */
export function splitMetricRequests(call: ToolCall, options: SplitOptions = {}): ToolCall[] {
  if (call.tool_name !== SPLITTABLE_TOOL) {
    return [call];
  }

  let metrics: string[] = [];
  if (options.metrics && options.metrics.length >= 2) {
    metrics = uniqueMetrics(options.metrics);
  } else if (options.query) {
    metrics = metricsForQuery(options.query);
  }
  if (metrics.length < 2) {
    return [call];
  }

  return metrics.map((metric) => ({
    tool_name: call.tool_name,
    parameters: {...structuredClone(call.parameters), metric}
  }));
}
