import type {ToolArguments} from "../types/mcp.js";
import {isPlainObject} from "../utils/sanitize.js";
import {firstDayOf, isIsoDate, parseYearMonth, sameMonth, shiftMonth} from "./dates.js";
import type {RuleContext} from "./types.js";

type DateRange = Record<string, unknown>;

const COMPARISON_RANGES = ["baseline_date_range", "comparison_date_range"] as const;

const PERIOD_RENAMES: ReadonlyArray<readonly [string, string]> = [
  ["current_period", "baseline_date_range"],
  ["previous_period", "comparison_date_range"]
];

function rangeAt(parameters: ToolArguments, key: string): DateRange | undefined {
  const value = parameters[key];
  return isPlainObject(value) ? value : undefined;
}

/** Forecasts must start today or earlier. */
export function clampFutureStart(parameters: ToolArguments, context: RuleContext): void {
  const range = rangeAt(parameters, "date_range");
  const start = range?.start_date;
  if (!range || !isIsoDate(start)) {
    return;
  }
  if (start > context.today) {
    range.start_date = context.today;
  }
}

export function renamePeriodFields(parameters: ToolArguments): void {
  for (const [from, to] of PERIOD_RENAMES) {
    if (from in parameters && !(to in parameters)) {
      parameters[to] = parameters[from];
      delete parameters[from];
    }
  }
}

/** Each comparison range becomes exactly the calendar month its start falls in. */
export function alignComparisonMonths(parameters: ToolArguments): void {
  for (const key of COMPARISON_RANGES) {
    const range = rangeAt(parameters, key);
    if (!range || !("end_date" in range)) {
      continue;
    }
    const start = parseYearMonth(range.start_date);
    if (!start) {
      continue;
    }
    range.start_date = firstDayOf(start);
    range.end_date = firstDayOf(shiftMonth(start, 1));
  }
}

/** The current month is incomplete and is never compared. */
export function excludeCurrentMonth(parameters: ToolArguments, context: RuleContext): void {
  for (const key of COMPARISON_RANGES) {
    const range = rangeAt(parameters, key);
    const start = range ? parseYearMonth(range.start_date) : undefined;
    if (!range || !start || !sameMonth(start, context.currentMonth)) {
      continue;
    }
    range.start_date = firstDayOf(shiftMonth(context.currentMonth, -1));
    range.end_date = firstDayOf(context.currentMonth);
    context.warn("current-month", `${key} fell in the current, incomplete month and was moved to the previous month`);
  }
}

export function separateCollidingRanges(parameters: ToolArguments, context: RuleContext): void {
  const baseline = rangeAt(parameters, "baseline_date_range");
  const comparison = rangeAt(parameters, "comparison_date_range");
  if (!baseline || !comparison) {
    return;
  }
  if (baseline.start_date !== comparison.start_date || baseline.end_date !== comparison.end_date) {
    return;
  }
  const start = parseYearMonth(comparison.start_date);
  if (!start) {
    return;
  }
  const previous = shiftMonth(start, -1);
  comparison.start_date = firstDayOf(previous);
  comparison.end_date = firstDayOf(start);
  context.warn("range-collision", "baseline and comparison ranges were identical, comparison moved back one month");
}
