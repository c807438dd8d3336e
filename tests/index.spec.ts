/**
 * End-to-end checks through the package entry point: bundled dataset lookup
 * chained into the rate engine.
 */
import { describe, it, expect, afterEach } from 'vitest';
import {
  LookupError,
  clearStoreCache,
  getEnzymeKinetics,
  getStore,
  simulate,
  simulateReactionRate,
} from '../index';

describe('public entry points', () => {
  afterEach(() => {
    clearStoreCache();
  });

  it('resolves lactate dehydrogenase and simulates at its optimum', () => {
    const params = getEnzymeKinetics('lactate dehydrogenase', 'Homo sapiens');
    expect(params).toMatchObject({
      vmax: 100.0,
      km: 0.5,
      optimal_pH: 7.0,
      optimal_temp: 37.0,
      pH_sigma: 1.0,
      temp_sigma: 5.0,
    });

    const rate = simulate(params, { substrate_conc: 2.5, pH: 7.0, temp: 37.0 });
    expect(rate).toBeCloseTo(250 / 3, 12);
  });

  it('matches the flat entry point for the same inputs', () => {
    const params = getEnzymeKinetics('hexokinase', 'Saccharomyces cerevisiae');
    const viaRecord = simulate(params, { substrate_conc: 0.3, pH: 7.2, temp: 36.0 });
    const viaArgs = simulateReactionRate({
      substrate_conc: 0.3,
      vmax: params.vmax,
      km: params.km,
      pH: 7.2,
      temp: 36.0,
      optimal_pH: params.optimal_pH,
      optimal_temp: params.optimal_temp,
      pH_sigma: params.pH_sigma,
      temp_sigma: params.temp_sigma,
    });
    expect(viaArgs).toBe(viaRecord);
  });

  it('chains lookup and simulation with the stored Ki', () => {
    // km_eff = 0.5 * (1 + 0.1/0.05) = 1.5
    const rate = getStore().resolveAndSimulate('lactate dehydrogenase', 'Homo sapiens', {
      substrate_conc: 2.5,
      pH: 7.0,
      temp: 37.0,
      inhibitor_conc: 0.1,
    });
    expect(rate).toBeCloseTo(62.5, 12);
  });

  it('fails for an unregistered enzyme', () => {
    expect(() => getEnzymeKinetics('lactate dehydrogenase', 'Mus musculus')).toThrow(LookupError);
  });
});
