/**
 * Vague Messages
 *
 * Uninformative message of a given family and shape. Used as the
 * depth-budget fallback, where the template is whatever message the
 * target interface is known to carry.
 *
 * @module messages/vague
 */

import { identity, zeros } from "../math/linear-algebra.ts";
import { bernoulli, beta, gamma, general, wishart, zerosLike } from "./families.ts";
import { gaussian } from "./gaussian.ts";
import { mvGaussian, mvGaussianDimension } from "./mv-gaussian.ts";
import { DEFAULT_VAGUE_SETTINGS, type Message, type VagueSettings } from "./types.ts";

export function vagueMessage(
  template: Message,
  settings: VagueSettings = DEFAULT_VAGUE_SETTINGS,
): Message {
  switch (template.family) {
    case "gaussian":
      return gaussian({ m: 0, V: settings.variance });
    case "mv-gaussian": {
      const d = mvGaussianDimension(template);
      return mvGaussian({ m: zeros(d), V: identity(d, settings.variance) });
    }
    case "gamma":
      return gamma({ a: settings.gammaShape, b: settings.gammaRate, inverted: template.inverted });
    case "beta":
      return beta({ a: 1, b: 1 });
    case "bernoulli":
      return bernoulli({ p: 0.5 });
    case "wishart": {
      const d = template.V.length;
      return wishart({ V: identity(d, settings.variance), nu: d });
    }
    case "general":
      return general(zerosLike(template.value));
  }
}
