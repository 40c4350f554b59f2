/**
 * Node Kinds
 *
 * @module nodes
 */

export {
  EQUALITY_RULES,
  EqualityNode,
  equalityGamma,
  equalityGaussianCanonicalSum,
  equalityGaussianPair,
  equalityGeneral,
  equalityMvGaussianCanonicalSum,
  equalityMvGaussianPair,
  SP_EQUALITY_GAMMA,
  SP_EQUALITY_GAUSSIAN,
  SP_EQUALITY_GAUSSIAN_NARY,
  SP_EQUALITY_GENERAL,
  SP_EQUALITY_MV_GAUSSIAN,
  SP_EQUALITY_MV_GAUSSIAN_NARY,
} from "./equality.ts";
export { CONSTANT_RULES, ConstantNode } from "./constant.ts";
export { ADDITION_RULES, AdditionNode } from "./addition.ts";
export {
  FIXED_GAIN_RULES,
  FixedGainNode,
  type Gain,
  gainBackwardGaussian,
  gainBackwardMvGaussian,
  gainForwardGaussian,
  gainForwardMvGaussian,
} from "./fixed-gain.ts";
export { GAIN_EQUALITY_RULES, GainEqualityNode } from "./gain-equality.ts";
