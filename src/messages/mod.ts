/**
 * Messages Module
 *
 * @module messages
 */

export type {
  BernoulliMessage,
  BetaMessage,
  GammaMessage,
  GaussianForm,
  GaussianMessage,
  GeneralMessage,
  GeneralValue,
  Message,
  MessageFamily,
  MessageOf,
  MvGaussianMessage,
  SquareMatrix,
  VagueSettings,
  Vector,
  WishartMessage,
} from "./types.ts";
export { DEFAULT_VAGUE_SETTINGS, GAUSSIAN_FORMS } from "./types.ts";
export {
  convertGaussian,
  gaussian,
  gaussianCanonical,
  gaussianMoments,
  type GaussianParams,
  hasGaussianForm,
} from "./gaussian.ts";
export {
  convertMvGaussian,
  hasMvGaussianForm,
  mvGaussian,
  mvGaussianCanonical,
  mvGaussianDimension,
  mvGaussianMoments,
  type MvGaussianParams,
} from "./mv-gaussian.ts";
export {
  bernoulli,
  beta,
  gamma,
  general,
  generalValuesEqual,
  sameShape,
  wishart,
  zerosLike,
} from "./families.ts";
export { messageMean, messageVariance } from "./moments.ts";
export { approxEqual, DEFAULT_TOLERANCE, messagesApproxEqual, valuesApproxEqual } from "./compare.ts";
export { vagueMessage } from "./vague.ts";
