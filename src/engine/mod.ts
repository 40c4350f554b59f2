/**
 * Message-Passing Engine
 *
 * @module engine
 */

export {
  calculateBackwardMessage,
  calculateForwardMessage,
  calculateMessage,
  calculateMessages,
} from "./evaluator.ts";
export { defaultFallbackPolicy } from "./fallback.ts";
export { invalidate, pushMessageInvalidations } from "./invalidation.ts";
export { calculateEdgeMarginal, calculateMarginal } from "./marginal.ts";
export {
  DEFAULT_DEPTH_BUDGET,
  type EvaluatorOptions,
  type FallbackContext,
  type FallbackPolicy,
  type InvalidationOptions,
} from "./types.ts";
