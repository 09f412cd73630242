/**
 * Selector
 * Parent selection policies and prune planning over ranked programs
 */

export interface SelectionConfig {
  eliteFraction: number;       // Share of scored programs eligible for elite picks
  weightEpsilon: number;       // Floor added to shifted exploit weights
}

export const DEFAULT_SELECTION_CONFIG: SelectionConfig = {
  eliteFraction: 0.1,
  weightEpsilon: 1e-6,
};

export interface RankedEntry {
  id: string;
  fitness: number | null;      // null = pending
  createdAt: number;
}

export class Selector {
  private config: SelectionConfig;
  private random: () => number;

  constructor(config: Partial<SelectionConfig> = {}, random: () => number = Math.random) {
    this.config = { ...DEFAULT_SELECTION_CONFIG, ...config };
    this.random = random;
  }

  /**
   * Number of elite candidates out of `scoredCount`, minimum one
   */
  eliteSize(scoredCount: number): number {
    if (scoredCount <= 0) return 0;
    return Math.max(1, Math.floor(scoredCount * this.config.eliteFraction));
  }

  /**
   * Uniform pick from the elite prefix of a fitness-descending list
   */
  pickElite<T>(rankedDescending: T[]): T | null {
    const size = this.eliteSize(rankedDescending.length);
    if (size === 0) return null;
    return rankedDescending[this.index(size)];
  }

  /**
   * Fitness-proportional pick with weights w_i = f_i - min(f) + epsilon.
   * Every candidate keeps a strictly positive weight, negative fitness included.
   */
  pickWeighted<T>(candidates: T[], fitnessOf: (candidate: T) => number): T | null {
    if (candidates.length === 0) return null;

    const fitness = candidates.map(fitnessOf);
    if (fitness.some(f => !Number.isFinite(f))) {
      throw new RangeError('Selection fitness must be finite');
    }

    const weights = this.shiftedWeights(fitness);
    const total = weights.reduce((sum, w) => sum + w, 0);

    let threshold = this.random() * total;
    for (let i = 0; i < candidates.length; i++) {
      threshold -= weights[i];
      if (threshold < 0) return candidates[i];
    }
    return candidates[candidates.length - 1];
  }

  /**
   * w_i = f_i - min + epsilon. When the spread overflows a double, every term is
   * divided by the largest magnitude first, which keeps the proportions.
   */
  private shiftedWeights(fitness: number[]): number[] {
    const min = Math.min(...fitness);
    const epsilon = this.config.weightEpsilon;
    const weights = fitness.map(f => f - min + epsilon);
    if (Number.isFinite(weights.reduce((sum, w) => sum + w, 0))) {
      return weights;
    }

    const scale = Math.max(...fitness.map(Math.abs));
    return fitness.map(f => f / scale - min / scale + epsilon / scale);
  }

  /**
   * Uniform index in [0, length)
   */
  index(length: number): number {
    return Math.min(length - 1, Math.floor(this.random() * length));
  }

  /**
   * Ids to delete so that at most `populationSize` remain.
   * `ranked` must already be ordered best-first with pending entries last;
   * the first `archiveSize` entries are never returned.
   */
  planPrune(ranked: RankedEntry[], populationSize: number, archiveSize: number): string[] {
    const excess = ranked.length - populationSize;
    if (excess <= 0) return [];

    const deletable = ranked.slice(archiveSize);
    return deletable.slice(Math.max(0, deletable.length - excess)).map(entry => entry.id);
  }
}

/**
 * Best-first ordering: scored before pending, higher fitness first,
 * earlier creation breaks ties.
 */
export function compareRanked(a: RankedEntry, b: RankedEntry): number {
  if (a.fitness === null || b.fitness === null) {
    if (a.fitness !== b.fitness) return a.fitness === null ? 1 : -1;
  } else if (a.fitness !== b.fitness) {
    return b.fitness - a.fitness;
  }
  return a.createdAt - b.createdAt;
}
