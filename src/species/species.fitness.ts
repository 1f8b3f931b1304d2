import type { Individual } from './species.individual';

/**
 * Positive when `a` is fitter than `b`, negative when worse, 0 when tied.
 * The direction comes from `a`'s evaluator; NaN fitness ranks below everything.
 */
export function compareFitness(a: Individual, b: Individual): number {
  const fa = a.fitness;
  const fb = b.fitness;
  if (Number.isNaN(fa) || Number.isNaN(fb)) {
    return Number.isNaN(fa) ? (Number.isNaN(fb) ? 0 : -1) : 1;
  }
  if (fa === fb) return 0;
  const better = a.maximise ? fa > fb : fa < fb;
  return better ? 1 : -1;
}

export function isFitter(a: Individual, b: Individual): boolean {
  return compareFitness(a, b) > 0;
}

/** Stable copy ordered fittest first. */
export function rankByFitness(individuals: readonly Individual[]): Individual[] {
  return [...individuals].sort((a, b) => compareFitness(b, a));
}

/** Fittest member, or `undefined` for an empty list. Ties keep the earliest. */
export function fittest(individuals: readonly Individual[]): Individual | undefined {
  let best: Individual | undefined;
  for (const individual of individuals) {
    if (!best || isFitter(individual, best)) best = individual;
  }
  return best;
}
