/**
 * Reaction-rate engine.
 *
 * Rate model:
 *   pHFactor   = exp(-(pH - optimal_pH)^2 / (2 pH_sigma^2))
 *   tempFactor = exp(-(temp - optimal_temp)^2 / (2 temp_sigma^2))
 *   vmaxEff    = vmax * pHFactor * tempFactor
 *   kmEff      = km * (1 + [I]/Ki)          competitive inhibition, [I] > 0 only
 *   rate       = vmaxEff * [S] / (kmEff + [S])
 *
 * The Gaussian falloff is symmetric around the optimum; asymmetric thermal
 * denaturation is not modelled.
 */

import {
  DEFAULT_OPTIMAL_PH,
  DEFAULT_OPTIMAL_TEMP,
  DEFAULT_PH_SIGMA,
  DEFAULT_TEMP_SIGMA,
} from '../../constants';
import type { EnzymeKineticParameters, RateBreakdown, ReactionConditions } from '../../types';
import { InvalidParameterError, MissingParameterError } from './errors';

function requireFinite(field: string, value: number) {
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(field, value, 'must be a finite number');
  }
}

function requirePositive(field: string, value: number) {
  requireFinite(field, value);
  if (value <= 0) throw new InvalidParameterError(field, value, 'must be > 0');
}

function requireNonNegative(field: string, value: number) {
  requireFinite(field, value);
  if (value < 0) throw new InvalidParameterError(field, value, 'must be >= 0');
}

/** Gaussian attenuation in (0, 1]; exactly 1 at the optimum. */
export function gaussianFactor(value: number, optimum: number, sigma: number): number {
  // scale before squaring: sigma * sigma underflows to 0 for very narrow tolerances
  const z = (value - optimum) / sigma;
  return Math.exp(-0.5 * z * z);
}

/**
 * Effective Km under competitive inhibition. No inhibitor (undefined or 0)
 * leaves Km unchanged and does not require Ki.
 */
export function effectiveKm(km: number, inhibitorConc: number | undefined, ki: number | undefined): number {
  if (inhibitorConc === undefined || inhibitorConc === 0) return km;
  if (ki === undefined) {
    throw new MissingParameterError('ki', `inhibitor_conc=${inhibitorConc} was supplied without an inhibition constant`);
  }
  requirePositive('ki', ki);
  return km * (1 + inhibitorConc / ki);
}

function validateInputs(params: EnzymeKineticParameters, conditions: ReactionConditions) {
  requirePositive('vmax', params.vmax);
  requirePositive('km', params.km);
  requireFinite('optimal_pH', params.optimal_pH);
  requireFinite('optimal_temp', params.optimal_temp);
  requirePositive('pH_sigma', params.pH_sigma);
  requirePositive('temp_sigma', params.temp_sigma);

  requireNonNegative('substrate_conc', conditions.substrate_conc);
  requireFinite('pH', conditions.pH);
  requireFinite('temp', conditions.temp);
  if (conditions.inhibitor_conc !== undefined) {
    requireNonNegative('inhibitor_conc', conditions.inhibitor_conc);
  }
}

/** Same computation as simulate(), with every intermediate term exposed. */
export function simulateDetailed(params: EnzymeKineticParameters, conditions: ReactionConditions): RateBreakdown {
  validateInputs(params, conditions);

  const pHFactor = gaussianFactor(conditions.pH, params.optimal_pH, params.pH_sigma);
  const tempFactor = gaussianFactor(conditions.temp, params.optimal_temp, params.temp_sigma);
  const vmaxEff = params.vmax * pHFactor * tempFactor;
  const kmEff = effectiveKm(params.km, conditions.inhibitor_conc, params.ki);
  // saturation fraction first, so the product never exceeds vmaxEff
  const rate = vmaxEff * (conditions.substrate_conc / (kmEff + conditions.substrate_conc));

  return { pHFactor, tempFactor, vmaxEff, kmEff, rate };
}

/** Simulated reaction rate, in the units of vmax. Pure and deterministic. */
export function simulate(params: EnzymeKineticParameters, conditions: ReactionConditions): number {
  return simulateDetailed(params, conditions).rate;
}

export interface ReactionRateArgs {
  substrate_conc: number;
  vmax: number;
  km: number;
  pH: number;
  temp: number;
  optimal_pH?: number;
  optimal_temp?: number;
  pH_sigma?: number;
  temp_sigma?: number;
  inhibitor_conc?: number;
  ki?: number;
}

/**
 * Flat-argument entry point. Optimum and tolerances default to
 * pH 7.0 / 37 °C / sigma 1.0 / sigma 5.0.
 */
export function simulateReactionRate(args: ReactionRateArgs): number {
  const params: EnzymeKineticParameters = {
    vmax: args.vmax,
    km: args.km,
    optimal_pH: args.optimal_pH ?? DEFAULT_OPTIMAL_PH,
    optimal_temp: args.optimal_temp ?? DEFAULT_OPTIMAL_TEMP,
    pH_sigma: args.pH_sigma ?? DEFAULT_PH_SIGMA,
    temp_sigma: args.temp_sigma ?? DEFAULT_TEMP_SIGMA,
    ki: args.ki,
  };
  return simulate(params, {
    substrate_conc: args.substrate_conc,
    pH: args.pH,
    temp: args.temp,
    inhibitor_conc: args.inhibitor_conc,
  });
}
