import { describe, it, expect } from "vitest";
import { evaluateRule } from "./rule-evaluator.js";
import { metricOk, notApplicable } from "./utils.js";

describe("evaluateRule", () => {
  it("applies each comparator to plain numbers", () => {
    expect(evaluateRule(1, 2, "lt")).toBe(true);
    expect(evaluateRule(2, 2, "lt")).toBe(false);
    expect(evaluateRule(2, 2, "lte")).toBe(true);
    expect(evaluateRule(3, 2, "gt")).toBe(true);
    expect(evaluateRule(2, 2, "gt")).toBe(false);
    expect(evaluateRule(2, 2, "gte")).toBe(true);
  });

  it("unwraps applicable metric values", () => {
    expect(evaluateRule(metricOk(80), 100, "lt")).toBe(true);
    expect(evaluateRule(metricOk(120), 100, "lt")).toBe(false);
  });

  it("never fires on a not-applicable metric", () => {
    const na = notApplicable("zero-duration segment");
    expect(evaluateRule(na, 100, "lt")).toBe(false);
    expect(evaluateRule(na, 100, "lte")).toBe(false);
    expect(evaluateRule(na, 0, "gt")).toBe(false);
    expect(evaluateRule(na, 0, "gte")).toBe(false);
  });
});
