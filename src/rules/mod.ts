/**
 * Update-Rule Dispatch
 *
 * @module rules
 */

export {
  allInboundOf,
  elidedOnlyAt,
  inboundAt,
  inboundOfFamily,
  isFamily,
  type ResolvedRule,
  resolveRule,
  type UpdateRule,
} from "./update-rule.ts";
