/**
 * EnzymeStore - read-only catalogue of kinetic parameter records.
 *
 * Dataset shape: a JSON object keyed by "<enzyme name> (<organism>)", each
 * value a parameter record. Unit-tagged field names (km_mM, temp_sigma_C, ...)
 * are accepted and normalised on load.
 *
 * Usage:
 *   const store = EnzymeStore.fromFile('data/enzyme_data.json');
 *   const params = store.get('hexokinase', 'Saccharomyces cerevisiae');
 *   const rate = store.resolveAndSimulate('hexokinase', 'Saccharomyces cerevisiae', {
 *     substrate_conc: 1.0, pH: 7.2, temp: 30,
 *   });
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { loadConfig } from '../../constants';
import type {
  EnzymeEntry,
  EnzymeKineticParameters,
  ParameterOverrides,
  ReactionConditions,
  SimulationOutcome,
} from '../../types';
import { logger } from '../logger';
import { DatasetFormatError, DatasetSourceError, LookupError } from './errors';
import { simulate } from './reactionRate';

// ── Record schema ──────────────────────────────────────────────────

const positive = z.number().finite().positive();

export const EnzymeRecordSchema = z.object({
  vmax: positive,
  km: positive,
  optimal_pH: z.number().finite(),
  optimal_temp: z.number().finite(),
  pH_sigma: positive,
  temp_sigma: positive,
  ki: positive.optional(),
});

const UNIT_TAGGED_KEYS: Record<string, keyof EnzymeKineticParameters> = {
  km_mM: 'km',
  vmax_umol_per_min: 'vmax',
  optimal_temp_C: 'optimal_temp',
  temp_sigma_C: 'temp_sigma',
  ki_mM: 'ki',
  ph_sigma: 'pH_sigma',
};

/** Map unit-tagged field names onto record fields; other keys pass through. */
export function normalizeKeys(record: Record<string, unknown>): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    normalized[UNIT_TAGGED_KEYS[key] ?? key] = value;
  }
  return normalized;
}

export function compositeKey(name: string, organism: string): string {
  return `${name} (${organism})`;
}

/** Split "<name> (<organism>)" at the last " ("; null when the key has another shape. */
export function parseCompositeKey(key: string): { enzyme: string; organism: string } | null {
  const open = key.lastIndexOf(' (');
  if (open <= 0 || !key.endsWith(')')) return null;
  const organism = key.slice(open + 2, -1);
  if (!organism) return null;
  return { enzyme: key.slice(0, open), organism };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseRecord(key: string, raw: unknown): EnzymeEntry {
  const parts = parseCompositeKey(key);
  if (!parts) {
    throw new DatasetFormatError(key, ['key must have the form "<enzyme name> (<organism>)"']);
  }
  if (!isPlainObject(raw)) {
    throw new DatasetFormatError(key, ['record must be an object']);
  }

  const result = EnzymeRecordSchema.safeParse(normalizeKeys(raw));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`);
    throw new DatasetFormatError(key, issues);
  }

  const parameters: EnzymeKineticParameters = { ...result.data };
  if (parameters.ki === undefined) delete parameters.ki;
  return { key, ...parts, parameters: Object.freeze(parameters) };
}

// ── Store ──────────────────────────────────────────────────────────

export type DatasetSource = string | Record<string, unknown>;

export class EnzymeStore {
  private readonly entries: ReadonlyMap<string, EnzymeEntry>;

  private constructor(entries: Map<string, EnzymeEntry>) {
    this.entries = entries;
  }

  /**
   * Build a store from a keyed object, or from a JSON file when given a path.
   * Throws DatasetFormatError on the first malformed record.
   */
  static load(source: DatasetSource): EnzymeStore {
    if (typeof source === 'string') return EnzymeStore.fromFile(source);

    const entries = new Map<string, EnzymeEntry>();
    for (const [key, raw] of Object.entries(source)) {
      entries.set(key, parseRecord(key, raw));
    }
    return new EnzymeStore(entries);
  }

  static fromFile(filePath: string): EnzymeStore {
    if (!fs.existsSync(filePath)) {
      throw new DatasetSourceError(filePath, 'file does not exist');
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new DatasetSourceError(filePath, msg);
    }
    if (!isPlainObject(data)) {
      throw new DatasetSourceError(filePath, 'top-level value must be an object keyed by "<enzyme> (<organism>)"');
    }

    const store = EnzymeStore.load(data);
    logger.info('STORE001', `Loaded ${store.size} enzyme records from ${filePath}`);
    return store;
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  has(name: string, organism: string): boolean {
    return this.entries.has(compositeKey(name, organism));
  }

  /** Exact, case- and whitespace-sensitive lookup. */
  get(name: string, organism: string): EnzymeKineticParameters {
    const key = compositeKey(name, organism);
    const entry = this.entries.get(key);
    if (!entry) throw new LookupError(key);
    return entry.parameters;
  }

  /**
   * Case-insensitive search on the name and organism parts of each key.
   * Without an organism every organism matches.
   */
  find(name: string, organism?: string): EnzymeEntry[] {
    const wantedName = name.toLowerCase();
    const wantedOrganism = organism?.toLowerCase();
    return Array.from(this.entries.values()).filter(
      (entry) =>
        entry.enzyme.toLowerCase() === wantedName &&
        (wantedOrganism === undefined || entry.organism.toLowerCase() === wantedOrganism),
    );
  }

  /** get() followed by simulate(), with the returned record reflecting any overrides. */
  simulateFromDataset(
    name: string,
    organism: string,
    conditions: ReactionConditions,
    overrides: ParameterOverrides = {},
  ): SimulationOutcome {
    const stored = this.get(name, organism);
    const parameters: EnzymeKineticParameters = {
      ...stored,
      pH_sigma: overrides.pH_sigma ?? stored.pH_sigma,
      temp_sigma: overrides.temp_sigma ?? stored.temp_sigma,
    };
    const ki = overrides.ki ?? stored.ki;
    if (ki !== undefined) parameters.ki = ki;

    return { rate: simulate(parameters, conditions), parameters };
  }

  resolveAndSimulate(
    name: string,
    organism: string,
    conditions: ReactionConditions,
    overrides: ParameterOverrides = {},
  ): number {
    return this.simulateFromDataset(name, organism, conditions, overrides).rate;
  }
}

// ── Default dataset ────────────────────────────────────────────────

const storeCache = new Map<string, EnzymeStore>();

/** Store for a dataset file, loaded once per path. */
export function getStore(filePath: string = loadConfig().dataPath): EnzymeStore {
  let store = storeCache.get(filePath);
  if (!store) {
    store = EnzymeStore.fromFile(filePath);
    storeCache.set(filePath, store);
  }
  return store;
}

export function clearStoreCache() {
  storeCache.clear();
}

/** Lookup entry point over the configured dataset (ENZYME_DATA_PATH or the bundled file). */
export function getEnzymeKinetics(
  name: string,
  organism: string,
  opts: { filePath?: string } = {},
): EnzymeKineticParameters {
  return getStore(opts.filePath).get(name, organism);
}
