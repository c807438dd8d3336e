/**
 * Shared types for the enzyme kinetics engine.
 *
 * Record fields keep the dataset spelling (optimal_pH, temp_sigma, ...) so a
 * record read from JSON and a record built in code have the same shape.
 */

export interface EnzymeKineticParameters {
  /** Maximum rate (amount/time, e.g. µmol/min). */
  vmax: number;
  /** Michaelis constant (mM). */
  km: number;
  optimal_pH: number;
  /** °C */
  optimal_temp: number;
  pH_sigma: number;
  temp_sigma: number;
  /** Competitive-inhibition constant (mM); only needed when an inhibitor is present. */
  ki?: number;
}

export interface ReactionConditions {
  /** [S] in mM */
  substrate_conc: number;
  pH: number;
  /** °C */
  temp: number;
  /** [I] in mM; absent or 0 means no inhibitor. */
  inhibitor_conc?: number;
}

export interface RateBreakdown {
  pHFactor: number;
  tempFactor: number;
  vmaxEff: number;
  kmEff: number;
  rate: number;
}

/** Per-call replacements for stored tolerances and inhibition constant. */
export type ParameterOverrides = Partial<Pick<EnzymeKineticParameters, 'pH_sigma' | 'temp_sigma' | 'ki'>>;

export interface EnzymeEntry {
  key: string;
  enzyme: string;
  organism: string;
  parameters: EnzymeKineticParameters;
}

export interface SimulationOutcome {
  rate: number;
  parameters: EnzymeKineticParameters;
}

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'silent';

export interface SearchBounds {
  substrate_conc: [number, number];
  pH: [number, number];
  temp: [number, number];
}

export interface OptimizationResult {
  bestConditions: ReactionConditions;
  maxRate: number;
  generations: number;
  converged: boolean;
}
