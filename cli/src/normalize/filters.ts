import type {ToolArguments} from "../types/mcp.js";
import {isPlainObject} from "../utils/sanitize.js";
import aliasData from "./dimension-aliases.json" with {type: "json"};
import type {RuleContext} from "./types.js";

type FilterNode = Record<string, unknown>;

const LOGICAL_LIST_OPERATORS = ["And", "Or"] as const;

const DIMENSION_ALIASES: ReadonlyMap<string, ReadonlyMap<string, string>> = new Map(
  Object.entries(aliasData).map(([dimension, aliases]) => [
    dimension,
    new Map(Object.entries(aliases).map(([alias, name]) => [alias.toLowerCase(), name]))
  ])
);

export function rewriteFilterExpression(parameters: ToolArguments, context: RuleContext): void {
  const expression = parameters.filter_expression;
  if (!isPlainObject(expression)) {
    return;
  }
  rewriteNode(expression, context);
  if (Object.keys(expression).length === 0) {
    delete parameters.filter_expression;
  }
}

function rewriteNode(node: FilterNode, context: RuleContext): void {
  for (const operator of LOGICAL_LIST_OPERATORS) {
    const children: unknown = node[operator];
    if (!Array.isArray(children)) {
      continue;
    }
    const kept = children.filter((child: unknown) => {
      if (!isPlainObject(child)) {
        return true;
      }
      rewriteNode(child, context);
      return Object.keys(child).length > 0;
    });
    if (kept.length > 0) {
      node[operator] = kept;
    } else {
      delete node[operator];
    }
  }

  const negated = node.Not;
  if (isPlainObject(negated)) {
    rewriteNode(negated, context);
    if (Object.keys(negated).length === 0) {
      delete node.Not;
    }
  }

  const dimensions = node.Dimensions;
  if (!isPlainObject(dimensions)) {
    return;
  }
  if (dimensions.Key === "TAG") {
    rewriteTagDimension(node, dimensions, context);
  } else if (typeof dimensions.Key === "string") {
    applyDimensionAliases(dimensions.Key, dimensions, context);
  }
}

interface TagPair {
  key: string;
  value: string;
}

function splitTagValue(encoded: unknown): TagPair | undefined {
  if (typeof encoded !== "string") {
    return undefined;
  }
  const separator = encoded.indexOf(":");
  if (separator <= 0) {
    return undefined;
  }
  return {key: encoded.slice(0, separator), value: encoded.slice(separator + 1)};
}

/**
 * Dimensions {Key: "TAG", Values: ["key:a", "key:b"]} → Tags {Key: "key", Values: ["a", "b"]}.
 * Entries without a key, or naming a different key than the first, are dropped.
 */
function rewriteTagDimension(node: FilterNode, dimensions: FilterNode, context: RuleContext): void {
  const values: unknown[] = Array.isArray(dimensions.Values) ? dimensions.Values : [];
  delete node.Dimensions;

  if (values.length === 0) {
    context.warn("tag-dimension-filter", "Dropped TAG dimension filter without values");
    return;
  }
  let key: string | undefined;
  const tagValues: string[] = [];
  for (const value of values) {
    const pair = splitTagValue(value);
    if (!pair) {
      context.warn("tag-dimension-filter", `Dropped TAG dimension filter "${String(value)}": expected "key:value"`);
      continue;
    }
    if (key === undefined) {
      key = pair.key;
    }
    if (pair.key !== key) {
      context.warn("tag-dimension-filter", `Dropped TAG dimension filter "${pair.key}:${pair.value}": tag key is not "${key}"`);
      continue;
    }
    tagValues.push(pair.value);
  }
  if (key === undefined) {
    return;
  }
  node.Tags = {Key: key, Values: tagValues, MatchOptions: ["EQUALS"]};
}

function applyDimensionAliases(dimension: string, dimensions: FilterNode, context: RuleContext): void {
  const aliases = DIMENSION_ALIASES.get(dimension);
  const values = dimensions.Values;
  if (!aliases || !Array.isArray(values)) {
    return;
  }
  dimensions.Values = values.map((value: unknown) => {
    if (typeof value !== "string") {
      return value;
    }
    const name = aliases.get(value.toLowerCase());
    if (name === undefined) {
      return value;
    }
    context.warn("dimension-alias", `${dimension} value "${value}" rewritten to "${name}"`);
    return name;
  });
}
