/**
 * Tests for the depth budget and its fallback policy
 *
 * @module tests/unit/engine/fallback_test
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { calculateMessage } from "../../../src/engine/evaluator.ts";
import { defaultFallbackPolicy } from "../../../src/engine/fallback.ts";
import type { FallbackContext } from "../../../src/engine/types.ts";
import { FactorGraph } from "../../../src/graph/factor-graph.ts";
import { PreconditionError } from "../../../src/errors/error-types.ts";
import { gamma, general } from "../../../src/messages/families.ts";
import { gaussian } from "../../../src/messages/gaussian.ts";
import { mvGaussian } from "../../../src/messages/mv-gaussian.ts";
import type { Message } from "../../../src/messages/types.ts";
import { ConstantNode } from "../../../src/nodes/constant.ts";
import { EqualityNode } from "../../../src/nodes/equality.ts";
import { FixedGainNode } from "../../../src/nodes/fixed-gain.ts";
import { createEvaluationStats } from "../../../src/telemetry/evaluation-stats.ts";
import { silentLogger } from "../../../src/telemetry/logger.ts";
import {
  asGamma,
  asGeneral,
  asMvGaussian,
  assertGaussianFields,
  buildGainRing,
  createRecordingLogger,
} from "../../fixtures/test-helpers.ts";

test("depth budget - a cycle without messages terminates with the fallback", () => {
  const { graph, g1, g2 } = buildGainRing();
  const { logger, records } = createRecordingLogger();
  const stats = createEvaluationStats();
  let calls = 0;

  const result = calculateMessage(graph, g1.i("out"), {
    logger,
    stats,
    fallback: () => {
      calls++;
      return gaussian({ m: 5, V: 2 });
    },
  });

  assert.equal(calls, 1);
  assertGaussianFields(result, { m: 5, V: 2 });
  assert.ok(g1.i("out").valid);
  assert.ok(g2.i("out").valid);
  assert.deepEqual(stats, {
    computed: 10,
    reused: 0,
    fallbacks: 1,
    rules: { "sp-fixed-gain-gaussian": 10 },
  });
  assert.deepEqual(
    records.filter((record) => record.level === "warn").map((record) => record.msg),
    ["Depth budget exhausted at g1[1], storing gaussian fallback"],
  );
});

test("depth budget - the default fallback on a Gaussian cycle is a vague Gaussian", () => {
  const { graph, g1 } = buildGainRing();
  const result = calculateMessage(graph, g1.i("out"), { logger: silentLogger });
  assertGaussianFields(result, { m: 0, V: 1e8 });
});

test("depth budget - an exhausted budget on an acyclic chain stores the fallback upstream", () => {
  const graph = new FactorGraph();
  const prior = graph.addNode(new ConstantNode(gaussian({ m: 1, V: 2 }), { id: "prior" }));
  const gain = graph.addNode(new FixedGainNode(2, { id: "gain" }));
  graph.connect(prior.i("out"), gain.i("in"));

  const result = calculateMessage(graph, gain.i("out"), { depthBudget: 1, logger: silentLogger });

  assertGaussianFields(prior.i("out").message, { m: 0, V: 1e8 });
  assert.ok(prior.i("out").valid);
  assertGaussianFields(result, { m: 0, V: 4e8 });
});

test("depth budget - a zero budget stores the fallback on the target itself", () => {
  const graph = new FactorGraph();
  const prior = graph.addNode(new ConstantNode(general([1, 2]), { id: "prior" }));

  const result = calculateMessage(graph, prior.i("out"), { depthBudget: 0, logger: silentLogger });

  assert.deepEqual(asGeneral(result).value, [0, 0]);
  assert.ok(prior.i("out").valid);
});

/**
 * Two equality nodes joined by two parallel edges, each fed by a constant
 */
function buildEqualityRing(value: Message) {
  const graph = new FactorGraph();
  const c1 = graph.addNode(new ConstantNode(value, { id: "c1" }));
  const c2 = graph.addNode(new ConstantNode(value, { id: "c2" }));
  const eq1 = graph.addNode(new EqualityNode(3, { id: "eq1" }));
  const eq2 = graph.addNode(new EqualityNode(3, { id: "eq2" }));
  graph.connect(c1.i("out"), eq1.interfaces[0]);
  graph.connect(c2.i("out"), eq2.interfaces[0]);
  graph.connect(eq1.interfaces[1], eq2.interfaces[1]);
  graph.connect(eq1.interfaces[2], eq2.interfaces[2]);
  return { graph, eq1, eq2 };
}

test("depth budget - a General cycle through equality nodes falls back to a General message", () => {
  const { graph, eq1 } = buildEqualityRing(general(2));
  const stats = createEvaluationStats();

  const result = calculateMessage(graph, eq1.interfaces[1], { logger: silentLogger, stats });

  assert.equal(asGeneral(result).value, 0);
  assert.equal(stats.fallbacks, 1);
});

test("depth budget - a multivariate Gaussian cycle through equality nodes keeps its dimension", () => {
  const { graph, eq1, eq2 } = buildEqualityRing(mvGaussian({ m: [1, 2], V: [[1, 0], [0, 1]] }));

  const result = asMvGaussian(calculateMessage(graph, eq1.interfaces[1], { logger: silentLogger }));

  assert.equal(result.xi?.length ?? result.m?.length, 2);
  assert.equal(eq2.interfaces[2].message?.family, "mv-gaussian");
});

test("depth budget - budgets that are not non-negative integers are rejected", () => {
  const { graph, g1 } = buildGainRing();

  for (const depthBudget of [Number.NaN, -1, 2.5, Number.POSITIVE_INFINITY]) {
    assert.throws(
      () => calculateMessage(graph, g1.i("out"), { depthBudget, logger: silentLogger }),
      PreconditionError,
    );
  }
  assert.ok(!g1.i("out").valid);
});

// =============================================================================
// Default policy
// =============================================================================

function contextFor(): FallbackContext & { records: ReturnType<typeof createRecordingLogger>["records"] } {
  const graph = new FactorGraph();
  const node = graph.addNode(new EqualityNode(3, { id: "eq" }));
  const other = graph.addNode(new EqualityNode(3, { id: "other" }));
  graph.connect(node.interfaces[0], other.interfaces[0]);
  const { logger, records } = createRecordingLogger();
  return {
    graph,
    node,
    target: node.interfaces[0],
    partner: other.interfaces[0],
    logger,
    records,
  };
}

test("defaultFallbackPolicy - the target's stale message decides the family", () => {
  const context = contextFor();
  context.target.store(gamma({ a: 4, b: 2, inverted: true }));
  context.target.valid = false;
  context.partner?.store(general(3));

  assert.deepEqual(asGamma(defaultFallbackPolicy()(context)), {
    family: "gamma",
    a: 1,
    b: 1e-8,
    inverted: true,
  });
});

test("defaultFallbackPolicy - the partner's message is used when the target has none", () => {
  const context = contextFor();
  context.partner?.store(general([[1, 2], [3, 4]]));

  assert.deepEqual(asGeneral(defaultFallbackPolicy()(context)).value, [[0, 0], [0, 0]]);
});

test("defaultFallbackPolicy - the node's port template is used when neither side holds a message", () => {
  const graph = new FactorGraph();
  const node = graph.addNode(new FixedGainNode([[1, 0], [0, 1]], { id: "gain" }));
  const result = asMvGaussian(
    defaultFallbackPolicy({ variance: 10, gammaShape: 1, gammaRate: 1 })({
      graph,
      node,
      target: node.i("out"),
      partner: undefined,
      logger: silentLogger,
    }),
  );

  assert.deepEqual(result.m, [0, 0]);
  assert.deepEqual(result.V, [[10, 0], [0, 10]]);
});

test("defaultFallbackPolicy - without any template a univariate Gaussian is used, with a warning", () => {
  const context = contextFor();

  assertGaussianFields(defaultFallbackPolicy({ variance: 7, gammaShape: 1, gammaRate: 1 })(context), {
    m: 0,
    V: 7,
  });
  assert.equal(context.records.length, 1);
  assert.equal(context.records[0].level, "warn");
});

test("defaultFallbackPolicy - a message arriving on another interface of the node", () => {
  const graph = new FactorGraph();
  const eq = graph.addNode(new EqualityNode(3, { id: "eq" }));
  const source = graph.addNode(new ConstantNode(general([1, 2]), { id: "source" }));
  graph.connect(source.i("out"), eq.interfaces[2]);
  const { logger, records } = createRecordingLogger();

  const result = defaultFallbackPolicy()({
    graph,
    node: eq,
    target: eq.interfaces[0],
    partner: undefined,
    logger,
  });

  assert.deepEqual(asGeneral(result).value, [0, 0]);
  assert.equal(records.length, 0);
});

test("defaultFallbackPolicy - a message held on another interface of the node", () => {
  const graph = new FactorGraph();
  const eq = graph.addNode(new EqualityNode(3, { id: "eq" }));
  eq.interfaces[1].store(gamma({ a: 2, b: 3, inverted: true }));
  eq.interfaces[1].valid = false;

  const result = defaultFallbackPolicy({ variance: 1, gammaShape: 4, gammaRate: 5 })({
    graph,
    node: eq,
    target: eq.interfaces[0],
    partner: undefined,
    logger: silentLogger,
  });

  assert.deepEqual(asGamma(result), { family: "gamma", a: 4, b: 5, inverted: true });
});
