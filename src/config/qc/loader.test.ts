/**
 * QC Policy Loader Tests
 *
 * Run with: npm test
 *
 * These tests verify:
 *   1. The default policy loads and is frozen
 *   2. Invalid weights, keys and LSI bounds fail with structured issues
 *   3. Issues format by path
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  loadQcPolicy,
  validateQcPolicy,
  QcPolicyError,
} from "./loader.js";
import { DEFAULT_QC_POLICY } from "./defaults.js";

// ═══════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════

test("default policy loads and is frozen", () => {
  const policy = loadQcPolicy(DEFAULT_QC_POLICY);

  assert.equal(policy.thresholds.approvedMin, 85);
  assert.equal(policy.lsi.targetCount, 8);
  assert.ok(Object.isFrozen(policy));
  assert.ok(Object.isFrozen(policy.weights));
});

test("loading does not freeze the input object", () => {
  const input = structuredClone(DEFAULT_QC_POLICY);
  loadQcPolicy(input);
  assert.equal(Object.isFrozen(input), false);
});

test("weights that do not sum to 1.0 are rejected", () => {
  const input = {
    ...DEFAULT_QC_POLICY,
    weights: { ...DEFAULT_QC_POLICY.weights, fit: 0.1 },
  };

  assert.throws(
    () => loadQcPolicy(input),
    (err: unknown) => {
      assert.ok(err instanceof QcPolicyError);
      assert.equal(err.issues.length, 1);
      assert.deepEqual(err.issues[0]?.path, ["weights"]);
      assert.equal(err.issues[0]?.message, "Category weights must sum to 1.0, got 1.0500");
      return true;
    }
  );
});

test("missing weight key is rejected", () => {
  const { fit: _fit, ...weights } = DEFAULT_QC_POLICY.weights;
  const result = validateQcPolicy({ ...DEFAULT_QC_POLICY, weights });

  assert.equal(result.success, false);
  assert.ok(result.errors?.some((issue) => issue.path.join(".") === "weights.fit"));
});

test("unknown keys are rejected", () => {
  const result = validateQcPolicy({ ...DEFAULT_QC_POLICY, extra: true });
  assert.equal(result.success, false);
  assert.equal(result.errors?.[0]?.code, "unrecognized_keys");
});

test("lsi target outside min/max is rejected", () => {
  const result = validateQcPolicy({
    ...DEFAULT_QC_POLICY,
    lsi: { ...DEFAULT_QC_POLICY.lsi, targetCount: 12 },
  });

  assert.equal(result.success, false);
  assert.deepEqual(result.errors?.[0]?.path, ["lsi", "targetCount"]);
});

test("format lists each issue by path", () => {
  const error = new QcPolicyError("bad", [
    { path: ["thresholds", "approvedMin"], message: "too big", code: "too_big" },
    { path: [], message: "broken", code: "custom" },
  ]);

  assert.equal(
    error.format(),
    [
      "QC policy validation failed:",
      "  - thresholds.approvedMin: too big",
      "  - (root): broken",
    ].join("\n")
  );
});
