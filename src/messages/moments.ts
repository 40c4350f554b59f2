/**
 * Message Moments
 *
 * Mean and variance of the distribution a message parameterises. Matrix
 * and vector results are returned as plain nested arrays. Inverted gamma
 * moments that do not exist are Infinity.
 *
 * @module messages/moments
 */

import { zerosLike } from "./families.ts";
import { gaussianMoments } from "./gaussian.ts";
import { mvGaussianMoments } from "./mv-gaussian.ts";
import type { GeneralValue, Message } from "./types.ts";

export function messageMean(message: Message): GeneralValue {
  switch (message.family) {
    case "gaussian":
      return gaussianMoments(message).m;
    case "mv-gaussian":
      return mvGaussianMoments(message).m;
    case "gamma":
      if (message.inverted) {
        return message.a > 1 ? message.b / (message.a - 1) : Infinity;
      }
      return message.a / message.b;
    case "beta":
      return message.a / (message.a + message.b);
    case "bernoulli":
      return message.p;
    case "wishart":
      return message.V.map((row) => row.map((v) => message.nu * v));
    case "general":
      return message.value;
  }
}

/**
 * Variance (covariance matrix for mv-gaussian, elementwise variance for wishart)
 */
export function messageVariance(message: Message): GeneralValue {
  switch (message.family) {
    case "gaussian":
      return gaussianMoments(message).V;
    case "mv-gaussian":
      return mvGaussianMoments(message).V;
    case "gamma": {
      const { a, b } = message;
      if (message.inverted) {
        return a > 2 ? (b * b) / ((a - 1) * (a - 1) * (a - 2)) : Infinity;
      }
      return a / (b * b);
    }
    case "beta": {
      const total = message.a + message.b;
      return (message.a * message.b) / (total * total * (total + 1));
    }
    case "bernoulli":
      return message.p * (1 - message.p);
    case "wishart": {
      const { V, nu } = message;
      return V.map((row, i) => row.map((v, j) => nu * (v * v + V[i][i] * V[j][j])));
    }
    case "general":
      return zerosLike(message.value);
  }
}
