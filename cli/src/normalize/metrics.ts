import type {ToolArguments} from "../types/mcp.js";
import type {RuleContext, ToolFamily} from "./types.js";

interface MetricSpelling {
  usage: string;
  forecast: string;
}

// Keyed by the lower-cased name with every non-alphanumeric removed.
const METRIC_TABLE: Record<string, MetricSpelling> = {
  unblendedcost: {usage: "UnblendedCost", forecast: "UNBLENDED_COST"},
  blendedcost: {usage: "BlendedCost", forecast: "BLENDED_COST"},
  amortizedcost: {usage: "AmortizedCost", forecast: "AMORTIZED_COST"},
  netamortizedcost: {usage: "NetAmortizedCost", forecast: "NET_AMORTIZED_COST"},
  netunblendedcost: {usage: "NetUnblendedCost", forecast: "NET_UNBLENDED_COST"},
  usagequantity: {usage: "UsageQuantity", forecast: "USAGE_QUANTITY"},
  normalizedusageamount: {usage: "NormalizedUsageAmount", forecast: "NORMALIZED_USAGE_AMOUNT"}
};

export const FAMILY_DEFAULT_METRIC: Record<ToolFamily, string> = {
  forecast: "UNBLENDED_COST",
  usage: "AmortizedCost"
};

export type CostBasis = "amortized" | "net_amortized" | "blended" | "unblended" | "net_unblended";

export const COST_BASIS_ORDER: readonly CostBasis[] = [
  "amortized",
  "net_amortized",
  "blended",
  "unblended",
  "net_unblended"
];

export const COST_BASIS_METRIC: Record<CostBasis, string> = {
  amortized: "AmortizedCost",
  net_amortized: "NetAmortizedCost",
  blended: "BlendedCost",
  unblended: "UnblendedCost",
  net_unblended: "NetUnblendedCost"
};

// "unblended" is tried before "blended" at each position, so the scan never
// reads "unblended" as "blended".
const COST_BASIS_PATTERN = /((?<![a-z])net[\s_-]*)?(unblended|blended|amortized)/g;

/** Distinct cost bases named in a free-text string, in order of first mention. */
export function detectCostBases(text: string): CostBasis[] {
  const found: CostBasis[] = [];
  for (const match of text.toLowerCase().matchAll(COST_BASIS_PATTERN)) {
    const net = match[1] !== undefined;
    const base = match[2];
    let basis: CostBasis;
    if (base === "amortized") {
      basis = net ? "net_amortized" : "amortized";
    } else if (base === "unblended") {
      basis = net ? "net_unblended" : "unblended";
    } else {
      basis = "blended";
    }
    if (!found.includes(basis)) {
      found.push(basis);
    }
  }
  return found;
}

export function metricKey(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]/g, "");
}

export function spellMetric(value: string, family: ToolFamily): string | undefined {
  const key = metricKey(value);
  const spelling = METRIC_TABLE[key] ?? METRIC_TABLE[`${key}cost`];
  return spelling?.[family];
}

export function normalizeMetricCasing(parameters: ToolArguments, context: RuleContext): void {
  const {metric, metric_for_comparison: comparisonMetric} = parameters;
  if (typeof metric === "string") {
    const spelled = spellMetric(metric, context.family);
    if (spelled !== undefined) {
      parameters.metric = spelled;
    }
  }
  if (typeof comparisonMetric === "string") {
    const spelled = spellMetric(comparisonMetric, "usage");
    if (spelled !== undefined) {
      parameters.metric_for_comparison = spelled;
    }
  }
}

export function replaceBothMetric(parameters: ToolArguments, context: RuleContext): void {
  const {metric} = parameters;
  if (typeof metric !== "string" || metric.trim().toUpperCase() !== "BOTH") {
    return;
  }
  const fallback = FAMILY_DEFAULT_METRIC[context.family];
  parameters.metric = fallback;
  context.warn("metric-both", `"${metric}" is not a supported metric for ${context.toolName}, using ${fallback} instead`);
}

export function collapseCompositeMetric(parameters: ToolArguments, context: RuleContext): void {
  const {metric} = parameters;
  if (typeof metric !== "string" || detectCostBases(metric).length < 2) {
    return;
  }
  const fallback = FAMILY_DEFAULT_METRIC[context.family];
  parameters.metric = fallback;
  context.warn(
    "metric-composite",
    `Metric "${metric}" names several cost bases, using ${fallback}. Request one call per metric instead.`
  );
}
