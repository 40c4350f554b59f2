/**
 * Tests for the fixed gain node
 *
 * @module tests/unit/nodes/fixed_gain_test
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { PreconditionError, RuleNotFoundError } from "../../../src/errors/error-types.ts";
import { ELIDED } from "../../../src/graph/types.ts";
import { gaussian } from "../../../src/messages/gaussian.ts";
import { mvGaussian } from "../../../src/messages/mv-gaussian.ts";
import { FixedGainNode } from "../../../src/nodes/fixed-gain.ts";
import { asMvGaussian, assertGaussianFields } from "../../fixtures/test-helpers.ts";

test("FixedGainNode - forward scales the moments", () => {
  const node = new FixedGainNode(2);
  const inbound = [gaussian({ m: 1, V: 3 }), ELIDED];
  assertGaussianFields(node.resolveRule(1, ["gaussian", "elided"]).invoke(inbound), { m: 2, V: 12 });
});

test("FixedGainNode - backward scales the canonical parameters", () => {
  const node = new FixedGainNode(2);
  const rule = node.resolveRule(0, ["elided", "gaussian"]);

  assertGaussianFields(rule.invoke([ELIDED, gaussian({ xi: 1, W: 0.5 })]), { xi: 2, W: 2 });
  assertGaussianFields(rule.invoke([ELIDED, gaussian({ m: 4, V: 2 })]), { xi: 4, W: 2 });
});

test("FixedGainNode - matrix gain forward: A·m and A·V·Aᵀ", () => {
  const node = new FixedGainNode([[1, 1], [0, 1]]);
  const result = asMvGaussian(
    node.resolveRule(1, ["mv-gaussian", "elided"]).invoke([
      mvGaussian({ m: [1, 2], V: [[1, 0], [0, 1]] }),
      ELIDED,
    ]),
  );
  assert.deepEqual(result.m, [3, 2]);
  assert.deepEqual(result.V, [[2, 1], [1, 1]]);
});

test("FixedGainNode - matrix gain backward: Aᵀ·xi and Aᵀ·W·A", () => {
  const node = new FixedGainNode([[1, 1], [0, 1]]);
  const result = asMvGaussian(
    node.resolveRule(0, ["elided", "mv-gaussian"]).invoke([
      ELIDED,
      mvGaussian({ xi: [1, 1], W: [[1, 0], [0, 1]] }),
    ]),
  );
  assert.deepEqual(result.xi, [1, 2]);
  assert.deepEqual(result.W, [[1, 1], [1, 2]]);
});

test("FixedGainNode - a scalar gain has no multivariate rule", () => {
  assert.throws(() => new FixedGainNode(2).resolveRule(1, ["mv-gaussian", "elided"]), RuleNotFoundError);
});

test("FixedGainNode - gain and message dimensions must agree", () => {
  const node = new FixedGainNode([[1, 0], [0, 1]]);
  assert.throws(
    () =>
      node.resolveRule(1, ["mv-gaussian", "elided"]).invoke([
        mvGaussian({ m: [1], V: [[1]] }),
        ELIDED,
      ]),
    PreconditionError,
  );
});

test("FixedGainNode - rejects non-finite and non-square gains", () => {
  assert.throws(() => new FixedGainNode(Number.NaN), PreconditionError);
  assert.throws(() => new FixedGainNode([[1, 2]]), PreconditionError);
});

test("FixedGainNode - port template follows the gain", () => {
  assertGaussianFields(new FixedGainNode(3).portTemplate(0), { m: 0, V: 1 });
  const template = asMvGaussian(new FixedGainNode([[1, 0], [0, 1]]).portTemplate(1));
  assert.deepEqual(template.m, [0, 0]);
});
