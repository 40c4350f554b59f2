/**
 * Factor-Graph Message-Passing Engine
 *
 * Build a graph from nodes, connect their interfaces, then ask for messages
 * or marginals:
 *
 * ```ts
 * const graph = new FactorGraph();
 * const prior = new ConstantNode(gaussian({ m: 0, V: 1 }));
 * const gain = new FixedGainNode(2);
 * const obs = new ConstantNode(gaussian({ m: 3, V: 1 }));
 * graph.addNodes(prior, gain, obs);
 * const edge = graph.connect(prior, gain.i("in"));
 * graph.connect(gain.i("out"), obs);
 * calculateForwardMessage(graph, edge);
 * calculateBackwardMessage(graph, edge);
 * const belief = calculateEdgeMarginal(graph, edge);
 * ```
 *
 * @module factorgraph-engine
 */

export * from "./errors/mod.ts";
export * from "./messages/mod.ts";
export * from "./graph/mod.ts";
export * from "./rules/mod.ts";
export * from "./nodes/mod.ts";
export * from "./engine/mod.ts";
export * from "./config/mod.ts";
export * from "./telemetry/mod.ts";
