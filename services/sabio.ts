/**
 * SABIO-RK service
 * - fetchSabioKinetics(enzymeName, organism?) -> averaged kinetic values or null
 * - In-memory LRU-style cache (simple size-limited Map)
 * - Uses global fetch (Node 18+)
 */

import { DEFAULT_PH_SIGMA, DEFAULT_TEMP_SIGMA, loadConfig } from '../constants';
import type { EnzymeKineticParameters } from '../types';
import { MissingParameterError } from './kinetics/errors';
import { logger } from './logger';

export interface SabioKinetics {
  enzymeName: string;
  organism?: string;
  km?: number;
  vmax?: number;
  optimal_pH?: number;
  optimal_temp?: number;
  /** Number of kinetic-law entries that contributed a Km or Vmax value. */
  sampleCount: number;
}

const CACHE_LIMIT = 200;
const cache = new Map<string, SabioKinetics | null>();

function cacheSet(key: string, value: SabioKinetics | null) {
  if (cache.has(key)) cache.delete(key);
  cache.set(key, value);
  if (cache.size > CACHE_LIMIT) {
    const oldest = cache.keys().next();
    if (!oldest.done) cache.delete(oldest.value);
  }
}

export function buildSabioQuery(enzymeName: string, organism?: string): string {
  let query = `EnzymeName:"${enzymeName}"`;
  if (organism) query += ` AND Organism:"${organism}"`;
  return query;
}

const PATTERNS = {
  km: /Km\s*=\s*(\d+(?:\.\d+)?)/gi,
  vmax: /Vmax\s*=\s*(\d+(?:\.\d+)?)/gi,
  optimal_pH: /pH[- ]?optimum\s*=\s*(\d+(?:\.\d+)?)/gi,
  optimal_temp: /temperature[- ]?optimum\s*=\s*(\d+(?:\.\d+)?)/gi,
} as const;

function extractValues(text: string, pattern: RegExp): number[] {
  return Array.from(text.matchAll(pattern), (m) => Number(m[1])).filter(Number.isFinite);
}

function average(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Pull Km, Vmax and optima out of a SABIO-RK text export and average each. */
export function parseSabioText(text: string, enzymeName: string, organism?: string): SabioKinetics {
  const kmValues = extractValues(text, PATTERNS.km);
  const vmaxValues = extractValues(text, PATTERNS.vmax);
  return {
    enzymeName,
    organism,
    km: average(kmValues),
    vmax: average(vmaxValues),
    optimal_pH: average(extractValues(text, PATTERNS.optimal_pH)),
    optimal_temp: average(extractValues(text, PATTERNS.optimal_temp)),
    sampleCount: Math.max(kmValues.length, vmaxValues.length),
  };
}

export async function fetchSabioKinetics(
  enzymeName: string,
  organism?: string,
  opts: { signal?: AbortSignal; baseUrl?: string } = {},
): Promise<SabioKinetics | null> {
  const key = `${enzymeName.toLowerCase()}|${(organism ?? '').toLowerCase()}`;
  if (cache.has(key)) return cache.get(key) ?? null;

  const params = new URLSearchParams({ format: 'txt', query: buildSabioQuery(enzymeName, organism) });
  const url = `${opts.baseUrl ?? loadConfig().sabioBaseUrl}?${params.toString()}`;

  try {
    const res = await fetch(url, { method: 'GET', signal: opts.signal });
    if (!res.ok) {
      logger.warning('SABIO001', `SABIO-RK returned ${res.status} for ${enzymeName} (${organism ?? 'any organism'})`);
      cacheSet(key, null);
      return null;
    }

    const entry = parseSabioText(await res.text(), enzymeName, organism);
    cacheSet(key, entry);
    return entry;
  } catch (e) {
    // network error or abort; not cached so a later call can retry
    const msg = e instanceof Error ? e.message : String(e);
    logger.warning('SABIO002', `SABIO-RK request failed for ${enzymeName}: ${msg}`);
    return null;
  }
}

export function clearSabioCache() {
  cache.clear();
}

/**
 * Complete a SABIO-RK result into a parameter record. Tolerances are not in
 * SABIO-RK and default to sigma 1.0 (pH) and 5.0 (°C).
 */
export function sabioToParameters(
  result: SabioKinetics,
  tolerances: { pH_sigma?: number; temp_sigma?: number } = {},
): EnzymeKineticParameters {
  const { km, vmax, optimal_pH, optimal_temp } = result;
  if (vmax === undefined) throw new MissingParameterError('vmax', `no Vmax reported for ${result.enzymeName}`);
  if (km === undefined) throw new MissingParameterError('km', `no Km reported for ${result.enzymeName}`);
  if (optimal_pH === undefined) {
    throw new MissingParameterError('optimal_pH', `no pH optimum reported for ${result.enzymeName}`);
  }
  if (optimal_temp === undefined) {
    throw new MissingParameterError('optimal_temp', `no temperature optimum reported for ${result.enzymeName}`);
  }
  return {
    vmax,
    km,
    optimal_pH,
    optimal_temp,
    pH_sigma: tolerances.pH_sigma ?? DEFAULT_PH_SIGMA,
    temp_sigma: tolerances.temp_sigma ?? DEFAULT_TEMP_SIGMA,
  };
}
