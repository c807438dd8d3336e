/**
 * Search for the reaction conditions (substrate concentration, pH,
 * temperature) that maximise the simulated rate.
 *
 * Differential evolution, best/1/bin:
 *   mutant  = best + F * (x_r1 - x_r2)
 *   trial   = binomial crossover of target and mutant (rate CR, one gene forced)
 *   replace target when trial rate >= target rate
 * Trial vectors are clipped to the search bounds. The search stops when the
 * spread of population rates falls under atol + tol * |mean rate|, or after
 * maxGenerations.
 */

import { DEFAULT_SEARCH_BOUNDS } from '../../constants';
import type { EnzymeKineticParameters, OptimizationResult, ReactionConditions, SearchBounds } from '../../types';
import { logger } from '../logger';
import { InvalidParameterError } from './errors';
import { simulate } from './reactionRate';

export interface OptimizeOptions {
  bounds?: Partial<SearchBounds>;
  /** Population size is popSizeMultiplier * 3. */
  popSizeMultiplier?: number;
  maxGenerations?: number;
  mutation?: number;
  recombination?: number;
  tol?: number;
  atol?: number;
  seed?: number;
  /** Held fixed during the search. */
  inhibitor_conc?: number;
}

const DIMENSIONS = ['substrate_conc', 'pH', 'temp'] as const;

// ---- Seeded PRNG (mulberry32) ----
function mulberry32(seed: number) {
  return () => {
    seed |= 0;
    seed = (seed + 0x6d2b79f5) | 0;
    let t = Math.imul(seed ^ (seed >>> 15), 1 | seed);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function checkBounds(bounds: SearchBounds) {
  for (const dim of DIMENSIONS) {
    const [lo, hi] = bounds[dim];
    if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo > hi) {
      throw new InvalidParameterError(`bounds.${dim}`, lo, `lower bound must not exceed upper bound ${hi}`);
    }
  }
  if (bounds.substrate_conc[0] < 0) {
    throw new InvalidParameterError('bounds.substrate_conc', bounds.substrate_conc[0], 'must be >= 0');
  }
}

function toConditions(x: number[], inhibitorConc: number | undefined): ReactionConditions {
  const conditions: ReactionConditions = { substrate_conc: x[0], pH: x[1], temp: x[2] };
  if (inhibitorConc !== undefined) conditions.inhibitor_conc = inhibitorConc;
  return conditions;
}

function spread(values: number[]): { mean: number; std: number } {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
  return { mean, std: Math.sqrt(variance) };
}

export function optimizeReaction(params: EnzymeKineticParameters, options: OptimizeOptions = {}): OptimizationResult {
  const bounds: SearchBounds = {
    substrate_conc: options.bounds?.substrate_conc ?? DEFAULT_SEARCH_BOUNDS.substrate_conc,
    pH: options.bounds?.pH ?? DEFAULT_SEARCH_BOUNDS.pH,
    temp: options.bounds?.temp ?? DEFAULT_SEARCH_BOUNDS.temp,
  };
  checkBounds(bounds);

  const multiplier = options.popSizeMultiplier ?? 15;
  if (!Number.isFinite(multiplier) || multiplier <= 0) {
    throw new InvalidParameterError('popSizeMultiplier', multiplier, 'must be a finite number > 0');
  }
  const popSize = Math.max(5, Math.round(multiplier * DIMENSIONS.length));
  const maxGenerations = options.maxGenerations ?? 1000;
  const F = options.mutation ?? 0.8;
  const CR = options.recombination ?? 0.7;
  const tol = options.tol ?? 1e-10;
  const atol = options.atol ?? 0;
  const random = mulberry32(options.seed ?? 42);

  const lower = DIMENSIONS.map((dim) => bounds[dim][0]);
  const upper = DIMENSIONS.map((dim) => bounds[dim][1]);
  const clip = (value: number, d: number) => Math.min(upper[d], Math.max(lower[d], value));
  const rateAt = (x: number[]) => simulate(params, toConditions(x, options.inhibitor_conc));

  const population: number[][] = [];
  const rates: number[] = [];
  for (let i = 0; i < popSize; i++) {
    const x = DIMENSIONS.map((_, d) => lower[d] + random() * (upper[d] - lower[d]));
    population.push(x);
    rates.push(rateAt(x));
  }

  let best = rates.indexOf(Math.max(...rates));
  let generations = 0;
  let converged = false;

  while (generations < maxGenerations) {
    generations++;

    for (let i = 0; i < popSize; i++) {
      let r1 = i;
      let r2 = i;
      while (r1 === i) r1 = Math.floor(random() * popSize);
      while (r2 === i || r2 === r1) r2 = Math.floor(random() * popSize);

      const forced = Math.floor(random() * DIMENSIONS.length);
      const trial = population[i].map((value, d) => {
        if (d !== forced && random() >= CR) return value;
        return clip(population[best][d] + F * (population[r1][d] - population[r2][d]), d);
      });

      const trialRate = rateAt(trial);
      if (trialRate >= rates[i]) {
        population[i] = trial;
        rates[i] = trialRate;
        if (trialRate >= rates[best]) best = i;
      }
    }

    const { mean, std } = spread(rates);
    if (std <= atol + tol * Math.abs(mean)) {
      converged = true;
      break;
    }
  }

  logger.debug(
    'OPT001',
    `Differential evolution ${converged ? 'converged' : 'stopped'} after ${generations} generations, best rate ${rates[best]}`,
  );

  return {
    bestConditions: toConditions(population[best], options.inhibitor_conc),
    maxRate: rates[best],
    generations,
    converged,
  };
}
