import type {ToolArguments} from "../types/mcp.js";
import type {YearMonth} from "./dates.js";

export type ToolFamily = "forecast" | "usage";

export interface NormalizationWarning {
  rule: string;
  message: string;
}

export interface NormalizeOptions {
  /** Clock used for the date rules; defaults to the system clock. */
  now?: () => Date;
}

export interface NormalizeResult {
  parameters: ToolArguments;
  warnings: NormalizationWarning[];
}

export interface RuleContext {
  toolName: string;
  family: ToolFamily;
  /** Local calendar date, YYYY-MM-DD. */
  today: string;
  currentMonth: YearMonth;
  warn(rule: string, message: string): void;
}

/** Rewrites the (already copied) parameter bag in place. */
export type NormalizationRule = (parameters: ToolArguments, context: RuleContext) => void;

export function toolFamily(toolName: string): ToolFamily {
  return toolName.toLowerCase().includes("forecast") ? "forecast" : "usage";
}
