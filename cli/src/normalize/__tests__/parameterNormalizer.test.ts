import {describe, expect, it} from "vitest";

import {normalizeParameters} from "../parameterNormalizer.js";

// 15 October 2025, local time
const now = () => new Date(2025, 9, 15, 9, 30);

function normalize(toolName: string, parameters: Record<string, unknown>) {
  return normalizeParameters(toolName, parameters, {now});
}

function rulesOf(result: ReturnType<typeof normalize>): string[] {
  return result.warnings.map((warning) => warning.rule);
}

describe("normalizeParameters", () => {
  describe("group_by", () => {
    it("collapses a list of dimension names to its first entry", () => {
      expect(normalize("get_cost_and_usage", {group_by: ["SERVICE"]}).parameters.group_by).toBe("SERVICE");
      expect(normalize("get_cost_and_usage", {group_by: ["REGION", "SERVICE"]}).parameters.group_by).toBe("REGION");
    });

    it("collapses a list of mappings to the first Key", () => {
      const result = normalize("get_cost_and_usage", {group_by: [{Type: "DIMENSION", Key: "LINKED_ACCOUNT"}]});

      expect(result.parameters.group_by).toBe("LINKED_ACCOUNT");
      expect(result.warnings).toEqual([]);
    });

    it("replaces tag groupings with SERVICE", () => {
      const result = normalize("get_cost_and_usage", {group_by: [{Type: "TAG", Key: "owner"}]});

      expect(result.parameters.group_by).toBe("SERVICE");
      expect(rulesOf(result)).toEqual(["group-by-tag"]);
    });

    it("turns an empty list into null", () => {
      expect(normalize("get_cost_and_usage", {group_by: []}).parameters.group_by).toBeNull();
    });

    it("leaves lists of other element types untouched", () => {
      expect(normalize("get_cost_and_usage", {group_by: [7, "SERVICE"]}).parameters.group_by).toEqual([7, "SERVICE"]);
    });

    it("replaces tag names posing as dimensions", () => {
      const result = normalize("get_cost_and_usage", {group_by: "Cost Center"});

      expect(result.parameters.group_by).toBe("SERVICE");
      expect(result.warnings).toEqual([
        {rule: "group-by-dimension", message: '"Cost Center" is not a valid dimension for group_by, grouping by SERVICE instead'}
      ]);
    });

    it("keeps real dimensions", () => {
      const result = normalize("get_cost_and_usage", {group_by: "USAGE_TYPE"});

      expect(result.parameters.group_by).toBe("USAGE_TYPE");
      expect(result.warnings).toEqual([]);
    });
  });

  describe("metrics", () => {
    it("spells metrics in PascalCase for cost and usage tools", () => {
      expect(normalize("get_cost_and_usage", {metric: "UNBLENDED_COST"}).parameters.metric).toBe("UnblendedCost");
      expect(normalize("get_cost_and_usage", {metric: "net amortized"}).parameters.metric).toBe("NetAmortizedCost");
      expect(normalize("get_cost_and_usage", {metric: "usage quantity"}).parameters.metric).toBe("UsageQuantity");
    });

    it("spells metrics in UPPER_SNAKE_CASE for forecast tools", () => {
      expect(normalize("get_cost_forecast", {metric: "UnblendedCost"}).parameters.metric).toBe("UNBLENDED_COST");
      expect(normalize("get_cost_forecast", {metric: "amortized"}).parameters.metric).toBe("AMORTIZED_COST");
    });

    it("passes unknown metrics through", () => {
      const result = normalize("get_cost_and_usage", {metric: "Carbon"});

      expect(result.parameters.metric).toBe("Carbon");
      expect(result.warnings).toEqual([]);
    });

    it("spells the comparison metric in PascalCase", () => {
      const result = normalize("get_cost_and_usage_comparisons", {metric_for_comparison: "NET_UNBLENDED_COST"});

      expect(result.parameters.metric_for_comparison).toBe("NetUnblendedCost");
    });

    it("replaces BOTH with the family default", () => {
      const usage = normalize("get_cost_and_usage", {metric: "BOTH"});
      const forecast = normalize("get_cost_forecast", {metric: "BOTH"});

      expect(usage.parameters.metric).toBe("AmortizedCost");
      expect(forecast.parameters.metric).toBe("UNBLENDED_COST");
      expect(rulesOf(usage)).toEqual(["metric-both"]);
      expect(rulesOf(forecast)).toEqual(["metric-both"]);
    });

    it("replaces a metric naming several cost bases", () => {
      const result = normalize("get_cost_and_usage", {metric: "AmortizedCost and BlendedCost"});

      expect(result.parameters.metric).toBe("AmortizedCost");
      expect(result.warnings).toEqual([
        {
          rule: "metric-composite",
          message:
            'Metric "AmortizedCost and BlendedCost" names several cost bases, using AmortizedCost. Request one call per metric instead.'
        }
      ]);
    });

    it("does not read unblended as blended", () => {
      const result = normalize("get_cost_and_usage", {metric: "unblended"});

      expect(result.parameters.metric).toBe("UnblendedCost");
      expect(result.warnings).toEqual([]);
    });
  });

  describe("dates", () => {
    it("moves a future forecast start back to today", () => {
      const result = normalize("get_cost_forecast", {
        date_range: {start_date: "2025-11-01", end_date: "2025-12-31"}
      });

      expect(result.parameters.date_range).toEqual({start_date: "2025-10-15", end_date: "2025-12-31"});
    });

    it("keeps a start date of today or earlier", () => {
      const range = {start_date: "2025-10-15", end_date: "2025-12-31"};

      expect(normalize("get_cost_forecast", {date_range: range}).parameters.date_range).toEqual(range);
    });

    it("aligns comparison ranges to whole months", () => {
      const result = normalize("get_cost_and_usage_comparisons", {
        baseline_date_range: {start_date: "2025-09-05", end_date: "2025-09-20"}
      });

      expect(result.parameters.baseline_date_range).toEqual({start_date: "2025-09-01", end_date: "2025-10-01"});
    });

    it("aligns a December range into January of the next year", () => {
      const result = normalize("get_cost_and_usage_comparisons", {
        comparison_date_range: {start_date: "2024-12-09", end_date: "2024-12-31"}
      });

      expect(result.parameters.comparison_date_range).toEqual({start_date: "2024-12-01", end_date: "2025-01-01"});
    });

    it("renames current and previous periods", () => {
      const result = normalize("get_cost_and_usage_comparisons", {
        current_period: {start_date: "2025-08-10", end_date: "2025-08-31"},
        previous_period: {start_date: "2025-07-03", end_date: "2025-07-30"}
      });

      expect(result.parameters).toEqual({
        baseline_date_range: {start_date: "2025-08-01", end_date: "2025-09-01"},
        comparison_date_range: {start_date: "2025-07-01", end_date: "2025-08-01"}
      });
    });

    it("does not overwrite an existing baseline range", () => {
      const result = normalize("get_cost_and_usage_comparisons", {
        current_period: {start_date: "2025-08-10", end_date: "2025-08-31"},
        baseline_date_range: {start_date: "2025-06-01", end_date: "2025-07-01"}
      });

      expect(result.parameters.current_period).toEqual({start_date: "2025-08-10", end_date: "2025-08-31"});
      expect(result.parameters.baseline_date_range).toEqual({start_date: "2025-06-01", end_date: "2025-07-01"});
    });

    it("moves ranges out of the current month and separates collisions", () => {
      const result = normalize("get_cost_and_usage_comparisons", {
        baseline_date_range: {start_date: "2025-10-02", end_date: "2025-10-14"},
        comparison_date_range: {start_date: "2025-09-03", end_date: "2025-09-29"}
      });

      expect(result.parameters.baseline_date_range).toEqual({start_date: "2025-09-01", end_date: "2025-10-01"});
      expect(result.parameters.comparison_date_range).toEqual({start_date: "2025-08-01", end_date: "2025-09-01"});
      expect(rulesOf(result)).toEqual(["current-month", "range-collision"]);
    });
  });

  describe("filter_expression", () => {
    it("turns a TAG dimension filter into a tag filter", () => {
      const result = normalize("get_cost_and_usage", {
        filter_expression: {Dimensions: {Key: "TAG", Values: ["team:alpha"]}}
      });

      expect(result.parameters.filter_expression).toEqual({
        Tags: {Key: "team", Values: ["alpha"], MatchOptions: ["EQUALS"]}
      });
    });

    it("splits the tag on the first colon only", () => {
      const result = normalize("get_cost_and_usage", {
        filter_expression: {Dimensions: {Key: "TAG", Values: ["aws:createdBy:alice"]}}
      });

      expect(result.parameters.filter_expression).toEqual({
        Tags: {Key: "aws", Values: ["createdBy:alice"], MatchOptions: ["EQUALS"]}
      });
    });

    it("keeps every value that shares the first tag key", () => {
      const result = normalize("get_cost_and_usage", {
        filter_expression: {Dimensions: {Key: "TAG", Values: ["team:alpha", "env:prod", "team:beta", "bad"]}}
      });

      expect(result.parameters.filter_expression).toEqual({
        Tags: {Key: "team", Values: ["alpha", "beta"], MatchOptions: ["EQUALS"]}
      });
      expect(result.warnings).toEqual([
        {rule: "tag-dimension-filter", message: 'Dropped TAG dimension filter "env:prod": tag key is not "team"'},
        {rule: "tag-dimension-filter", message: 'Dropped TAG dimension filter "bad": expected "key:value"'}
      ]);
    });

    it("drops a tag value with an empty key", () => {
      const result = normalize("get_cost_and_usage", {
        filter_expression: {Dimensions: {Key: "TAG", Values: [":alpha"]}}
      });

      expect("filter_expression" in result.parameters).toBe(false);
      expect(result.warnings).toEqual([
        {rule: "tag-dimension-filter", message: 'Dropped TAG dimension filter ":alpha": expected "key:value"'}
      ]);
    });

    it("walks nested operators and drops filters it cannot rewrite", () => {
      const result = normalize("get_cost_and_usage", {
        filter_expression: {
          And: [
            {Dimensions: {Key: "TAG", Values: ["untagged"]}},
            {Not: {Dimensions: {Key: "PURCHASE_TYPE", Values: ["Spot"]}}},
            {Dimensions: {Key: "SERVICE", Values: ["EC2", "Amazon Simple Storage Service"]}}
          ]
        }
      });

      expect(result.parameters.filter_expression).toEqual({
        And: [
          {Not: {Dimensions: {Key: "PURCHASE_TYPE", Values: ["Spot Instances"]}}},
          {Dimensions: {Key: "SERVICE", Values: ["Amazon Elastic Compute Cloud - Compute", "Amazon Simple Storage Service"]}}
        ]
      });
      expect(result.warnings).toEqual([
        {rule: "tag-dimension-filter", message: 'Dropped TAG dimension filter "untagged": expected "key:value"'},
        {rule: "dimension-alias", message: 'PURCHASE_TYPE value "Spot" rewritten to "Spot Instances"'},
        {rule: "dimension-alias", message: 'SERVICE value "EC2" rewritten to "Amazon Elastic Compute Cloud - Compute"'}
      ]);
    });

    it("removes a filter expression left empty", () => {
      const result = normalize("get_cost_and_usage", {
        filter_expression: {Dimensions: {Key: "TAG", Values: ["owner"]}}
      });

      expect("filter_expression" in result.parameters).toBe(false);
    });
  });

  it("does not modify its input", () => {
    const input = {group_by: [{Type: "TAG", Key: "owner"}], metric: "BOTH"};
    const snapshot = structuredClone(input);

    normalize("get_cost_and_usage", input);

    expect(input).toEqual(snapshot);
  });

  it("is idempotent", () => {
    const inputs: Array<[string, Record<string, unknown>]> = [
      [
        "get_cost_and_usage",
        {
          group_by: [{Type: "TAG", Key: "owner"}],
          metric: "blended and unblended",
          filter_expression: {Or: [{Dimensions: {Key: "TAG", Values: ["env:prod"]}}, {Dimensions: {Key: "SERVICE", Values: ["rds"]}}]}
        }
      ],
      ["get_cost_forecast", {metric: "BOTH", date_range: {start_date: "2026-01-01", end_date: "2026-03-01"}}],
      [
        "get_cost_and_usage_comparisons",
        {
          current_period: {start_date: "2025-10-01", end_date: "2025-10-15"},
          previous_period: {start_date: "2025-09-10", end_date: "2025-09-30"},
          metric_for_comparison: "amortized cost"
        }
      ]
    ];

    for (const [toolName, parameters] of inputs) {
      const once = normalize(toolName, parameters).parameters;
      const twice = normalize(toolName, once).parameters;
      expect(twice).toEqual(once);
    }
  });
});
