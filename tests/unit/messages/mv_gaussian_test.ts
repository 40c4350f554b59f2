/**
 * Tests for multivariate Gaussian messages
 *
 * @module tests/unit/messages/mv_gaussian_test
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { PreconditionError } from "../../../src/errors/error-types.ts";
import {
  convertMvGaussian,
  mvGaussian,
  mvGaussianCanonical,
  mvGaussianDimension,
  mvGaussianMoments,
} from "../../../src/messages/mv-gaussian.ts";
import { messagesApproxEqual } from "../../../src/messages/compare.ts";
import { vagueMessage } from "../../../src/messages/vague.ts";
import { assertMatrixAlmostEquals, asMvGaussian } from "../../fixtures/test-helpers.ts";

const diagonal = mvGaussian({ m: [1, 2], V: [[2, 0], [0, 4]] });

test("mvGaussian - copies and freezes vectors and matrices", () => {
  const m = [1, 2];
  const message = mvGaussian({ m, V: [[1, 0], [0, 1]] });
  m[0] = 99;

  assert.deepEqual(message.m, [1, 2]);
  assert.ok(Object.isFrozen(message));
  assert.ok(Object.isFrozen(message.m));
  assert.ok(message.V !== undefined && Object.isFrozen(message.V[0]));
});

test("mvGaussian - rejects inconsistent dimensions", () => {
  assert.throws(() => mvGaussian({ m: [0, 0], V: [[1]] }), PreconditionError);
});

test("mvGaussian - rejects non-square and non-finite matrices", () => {
  assert.throws(() => mvGaussian({ m: [0], V: [[1, 2]] }), PreconditionError);
  assert.throws(() => mvGaussian({ xi: [0], W: [[Number.NaN]] }), PreconditionError);
});

test("mvGaussian - rejects parameter sets without a complete pair", () => {
  assert.throws(() => mvGaussian({ m: [0, 1] }), PreconditionError);
});

test("mvGaussianDimension - reads the dimension from any parameter", () => {
  assert.equal(mvGaussianDimension(diagonal), 2);
  assert.equal(mvGaussianDimension(mvGaussian({ xi: [1, 2, 3], W: [[1, 0, 0], [0, 1, 0], [0, 0, 1]] })), 3);
});

test("mvGaussianCanonical - inverts the covariance", () => {
  const { xi, W } = mvGaussianCanonical(diagonal);
  assertMatrixAlmostEquals(W, [[0.5, 0], [0, 0.25]]);
  assertMatrixAlmostEquals([xi], [[0.5, 0.5]]);
});

test("mvGaussianMoments - recovers the moment form from canonical parameters", () => {
  const { m, V } = mvGaussianMoments(mvGaussian({ xi: [0.5, 0.5], W: [[0.5, 0], [0, 0.25]] }));
  assertMatrixAlmostEquals(V, [[2, 0], [0, 4]]);
  assertMatrixAlmostEquals([m], [[1, 2]]);
});

test("mvGaussianCanonical - singular covariance gives a finite pseudo-inverse", () => {
  const { W } = mvGaussianCanonical(mvGaussian({ m: [0, 0], V: [[1, 0], [0, 0]] }));
  assertMatrixAlmostEquals(W, [[1, 0], [0, 0]]);
});

test("convertMvGaussian - produces exactly the requested form", () => {
  const canonical = convertMvGaussian(diagonal, "canonical");
  assert.deepEqual(Object.keys(canonical).sort(), ["W", "family", "xi"]);
  assert.ok(messagesApproxEqual(canonical, diagonal));
  assert.equal(convertMvGaussian(diagonal, "moment"), diagonal);
});

test("vagueMessage - zero mean and scaled identity covariance of the same dimension", () => {
  const vague = asMvGaussian(vagueMessage(diagonal));
  assert.deepEqual(vague.m, [0, 0]);
  assert.deepEqual(vague.V, [[1e8, 0], [0, 1e8]]);
});
