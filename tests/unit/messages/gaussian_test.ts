/**
 * Tests for univariate Gaussian messages
 *
 * @module tests/unit/messages/gaussian_test
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { PreconditionError } from "../../../src/errors/error-types.ts";
import {
  convertGaussian,
  gaussian,
  gaussianCanonical,
  gaussianMoments,
} from "../../../src/messages/gaussian.ts";
import { messagesApproxEqual } from "../../../src/messages/compare.ts";
import { gamma } from "../../../src/messages/families.ts";
import { messageMean, messageVariance } from "../../../src/messages/moments.ts";
import { vagueMessage } from "../../../src/messages/vague.ts";
import { assertGaussianFields } from "../../fixtures/test-helpers.ts";

test("gaussian - keeps only the given parameters and freezes the message", () => {
  const message = gaussian({ m: 1, V: 2 });

  assertGaussianFields(message, { m: 1, V: 2 });
  assert.ok(Object.isFrozen(message));
  assert.deepEqual(Object.keys(message).sort(), ["V", "family", "m"]);
});

test("gaussian - rejects NaN and infinite parameters", () => {
  assert.throws(() => gaussian({ m: Number.NaN, V: 1 }), PreconditionError);
  assert.throws(() => gaussian({ xi: 1, W: Number.POSITIVE_INFINITY }), PreconditionError);
});

test("gaussian - rejects parameter sets without a complete pair", () => {
  assert.throws(() => gaussian({ m: 1 }), PreconditionError);
  assert.throws(() => gaussian({ V: 1, W: 1 }), PreconditionError);
  assert.throws(() => gaussian({}), PreconditionError);
});

test("gaussianMoments - derives mean and variance from canonical form", () => {
  assert.deepEqual(gaussianMoments(gaussian({ xi: 4, W: 2 })), { m: 2, V: 0.5 });
});

test("gaussianCanonical - derives xi and W from moment form", () => {
  assert.deepEqual(gaussianCanonical(gaussian({ m: 2, V: 0.5 })), { xi: 4, W: 2 });
});

test("convertGaussian - produces exactly the requested form", () => {
  const moment = gaussian({ m: 2, V: 0.5 });

  assertGaussianFields(convertGaussian(moment, "canonical"), { xi: 4, W: 2 });
  assertGaussianFields(convertGaussian(moment, "mean-precision"), { m: 2, W: 2 });
  assertGaussianFields(convertGaussian(moment, "xi-covariance"), { xi: 4, V: 0.5 });
  assertGaussianFields(convertGaussian(gaussian({ xi: 4, W: 2 }), "moment"), { m: 2, V: 0.5 });
});

test("convertGaussian - returns the same message when it already holds only that form", () => {
  const message = gaussian({ xi: 1, W: 3 });
  assert.equal(convertGaussian(message, "canonical"), message);
});

test("convertGaussian - drops the extra pair of an over-specified message", () => {
  const message = gaussian({ m: 2, V: 0.5, W: 2 });
  assertGaussianFields(convertGaussian(message, "moment"), { m: 2, V: 0.5 });
});

test("convertGaussian - zero variance maps to zero precision", () => {
  assertGaussianFields(convertGaussian(gaussian({ m: 1, V: 0 }), "canonical"), { xi: 0, W: 0 });
});

test("messageMean/messageVariance - read moments from any form", () => {
  const message = gaussian({ xi: 4, W: 2 });
  assert.equal(messageMean(message), 2);
  assert.equal(messageVariance(message), 0.5);
});

test("messagesApproxEqual - compares Gaussians across parameterisations", () => {
  assert.ok(messagesApproxEqual(gaussian({ m: 2, V: 0.5 }), gaussian({ xi: 4, W: 2 })));
  assert.ok(!messagesApproxEqual(gaussian({ m: 2, V: 0.5 }), gaussian({ m: 2, V: 1 })));
  assert.ok(!messagesApproxEqual(gaussian({ m: 1, V: 1 }), gamma({ a: 1, b: 1 })));
});

test("vagueMessage - univariate Gaussian with zero mean and large variance", () => {
  assertGaussianFields(vagueMessage(gaussian({ m: 3, V: 1 })), { m: 0, V: 1e8 });
  assertGaussianFields(
    vagueMessage(gaussian({ m: 3, V: 1 }), { variance: 50, gammaShape: 1, gammaRate: 1 }),
    { m: 0, V: 50 },
  );
});
