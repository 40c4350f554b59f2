/**
 * Tests for update-rule resolution
 *
 * @module tests/unit/rules/dispatch_test
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  AmbiguousRuleError,
  PreconditionError,
  RuleNotFoundError,
} from "../../../src/errors/error-types.ts";
import { ELIDED, isElided, slotTags } from "../../../src/graph/types.ts";
import { gamma, general } from "../../../src/messages/families.ts";
import { gaussian } from "../../../src/messages/gaussian.ts";
import { EqualityNode } from "../../../src/nodes/equality.ts";
import {
  allInboundOf,
  elidedOnlyAt,
  inboundAt,
  inboundOfFamily,
  resolveRule,
  type UpdateRule,
} from "../../../src/rules/update-rule.ts";

const passFirst: UpdateRule<EqualityNode> = {
  name: "pass-first",
  isApplicable: (port, tags) => allInboundOf(tags, port, "general"),
  apply: (_node, _port, inbound) => inboundOfFamily(inbound, "general")[0],
};

const passLast: UpdateRule<EqualityNode> = {
  name: "pass-last",
  isApplicable: (port, tags) => allInboundOf(tags, port, "general"),
  apply: (_node, _port, inbound) => inboundOfFamily(inbound, "general")[1],
};

test("ELIDED - is a distinct slot value, not an absent message", () => {
  assert.ok(isElided(ELIDED));
  assert.ok(!isElided(general(0)));
  assert.deepEqual(slotTags([general(1), ELIDED, gaussian({ m: 0, V: 1 })]), [
    "general",
    "elided",
    "gaussian",
  ]);
});

test("elidedOnlyAt - exactly one elided slot, at the outbound port", () => {
  assert.ok(elidedOnlyAt(["general", "elided", "general"], 1));
  assert.ok(!elidedOnlyAt(["general", "elided", "general"], 0));
  assert.ok(!elidedOnlyAt(["elided", "elided", "general"], 0));
  assert.ok(!elidedOnlyAt(["general", "general", "general"], 2));
});

test("resolveRule - binds the single applicable rule to the node", () => {
  const node = new EqualityNode();
  const rule = resolveRule(node, [passFirst], 2, ["general", "general", "elided"]);

  assert.equal(rule.name, "pass-first");
  assert.deepEqual(rule.invoke([general(4), general(5), ELIDED]), general(4));
});

test("resolveRule - nothing applicable raises RuleNotFoundError with the tuple", () => {
  const node = new EqualityNode(3, { id: "eq" });
  const tags = ["gaussian", "gamma", "elided"] as const;

  assert.throws(
    () => resolveRule(node, [passFirst], 2, tags),
    (error: unknown) => {
      assert.ok(error instanceof RuleNotFoundError);
      assert.equal(error.nodeKind, "equality");
      assert.equal(error.outboundPort, 2);
      assert.deepEqual(error.tags, tags);
      assert.equal(error.code, "RULE_NOT_FOUND");
      return true;
    },
  );
});

test("resolveRule - several applicable rules raise AmbiguousRuleError", () => {
  const node = new EqualityNode();
  assert.throws(
    () => resolveRule(node, [passFirst, passLast], 0, ["elided", "general", "general"]),
    (error: unknown) => {
      assert.ok(error instanceof AmbiguousRuleError);
      assert.deepEqual(error.candidates, ["pass-first", "pass-last"]);
      return true;
    },
  );
});

test("EqualityNode.resolveRule - mixed families have no rule", () => {
  const node = new EqualityNode();
  assert.throws(() => node.resolveRule(2, ["gaussian", "gamma", "elided"]), RuleNotFoundError);
});

test("EqualityNode.resolveRule - a tuple without the outbound slot elided has no rule", () => {
  const node = new EqualityNode();
  assert.throws(() => node.resolveRule(2, ["gaussian", "gaussian", "gaussian"]), RuleNotFoundError);
  assert.throws(() => node.resolveRule(2, ["gaussian", "elided", "gaussian"]), RuleNotFoundError);
});

test("inboundAt - rejects a slot of the wrong family or the elided slot", () => {
  const inbound = [gamma({ a: 1, b: 1 }), ELIDED];
  assert.equal(inboundAt(inbound, 0, "gamma").a, 1);
  assert.throws(() => inboundAt(inbound, 0, "gaussian"), PreconditionError);
  assert.throws(() => inboundAt(inbound, 1, "gamma"), PreconditionError);
  assert.throws(() => inboundOfFamily(inbound, "general"), PreconditionError);
});
