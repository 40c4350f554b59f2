/**
 * Message Types
 *
 * A message is an immutable parameterisation of a probability distribution,
 * sent along an edge. The union is closed and discriminated on `family`.
 *
 * Gaussian messages may hold any subset of their parameters as long as one
 * complete pair is present; a parameter that is not held is an absent field,
 * never a numeric sentinel.
 *
 * @module messages/types
 */

export type Vector = readonly number[];
export type SquareMatrix = readonly (readonly number[])[];

/**
 * Scalar or (nested) numeric array carried by a general message
 */
export type GeneralValue = number | readonly GeneralValue[];

export interface GaussianMessage {
  readonly family: "gaussian";
  /** Mean */
  readonly m?: number;
  /** Variance */
  readonly V?: number;
  /** Precision-weighted mean */
  readonly xi?: number;
  /** Precision */
  readonly W?: number;
}

export interface MvGaussianMessage {
  readonly family: "mv-gaussian";
  readonly m?: Vector;
  readonly V?: SquareMatrix;
  readonly xi?: Vector;
  readonly W?: SquareMatrix;
}

export interface GammaMessage {
  readonly family: "gamma";
  /** Shape */
  readonly a: number;
  /** Rate */
  readonly b: number;
  readonly inverted: boolean;
}

export interface BetaMessage {
  readonly family: "beta";
  readonly a: number;
  readonly b: number;
}

export interface BernoulliMessage {
  readonly family: "bernoulli";
  readonly p: number;
}

export interface WishartMessage {
  readonly family: "wishart";
  /** Scale matrix */
  readonly V: SquareMatrix;
  /** Degrees of freedom */
  readonly nu: number;
}

export interface GeneralMessage {
  readonly family: "general";
  readonly value: GeneralValue;
}

export type Message =
  | GaussianMessage
  | MvGaussianMessage
  | GammaMessage
  | BetaMessage
  | BernoulliMessage
  | WishartMessage
  | GeneralMessage;

export type MessageFamily = Message["family"];

/**
 * Narrow a message union member by family
 */
export type MessageOf<F extends MessageFamily> = Extract<Message, { family: F }>;

/**
 * Parameterisations shared by the univariate and multivariate Gaussian
 *
 * - moment: (m, V)
 * - canonical: (xi, W)
 * - mean-precision: (m, W)
 * - xi-covariance: (xi, V)
 */
export type GaussianForm = "moment" | "canonical" | "mean-precision" | "xi-covariance";

export const GAUSSIAN_FORMS: readonly GaussianForm[] = [
  "moment",
  "canonical",
  "mean-precision",
  "xi-covariance",
];

export const GAUSSIAN_FORM_FIELDS: Readonly<
  Record<GaussianForm, readonly ["m" | "xi", "V" | "W"]>
> = {
  "moment": ["m", "V"],
  "canonical": ["xi", "W"],
  "mean-precision": ["m", "W"],
  "xi-covariance": ["xi", "V"],
};

/**
 * Settings for uninformative messages (depth-budget fallback)
 */
export interface VagueSettings {
  variance: number;
  gammaShape: number;
  gammaRate: number;
}

export const DEFAULT_VAGUE_SETTINGS: VagueSettings = {
  variance: 1e8,
  gammaShape: 1,
  gammaRate: 1e-8,
};
