import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  buildSabioQuery,
  clearSabioCache,
  fetchSabioKinetics,
  parseSabioText,
  sabioToParameters,
} from '../../services/sabio';
import { MissingParameterError } from '../../services/kinetics/errors';

const SAMPLE_EXPORT = [
  'EntryID\tEnzymename\tOrganism\tParameter',
  '1001\thexokinase\tHomo sapiens\tKm = 0.1 mM; Vmax = 40 umol/min',
  '1002\thexokinase\tHomo sapiens\tKm = 0.3 mM; Vmax = 50 umol/min',
  '1003\thexokinase\tHomo sapiens\tpH-optimum = 7.5; temperature optimum = 37',
].join('\n');

describe('SABIO-RK service', () => {
  const originalFetch = globalThis.fetch;

  beforeEach(() => {
    clearSabioCache();
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it('builds the advanced-search query', () => {
    expect(buildSabioQuery('hexokinase')).toBe('EnzymeName:"hexokinase"');
    expect(buildSabioQuery('hexokinase', 'Homo sapiens')).toBe('EnzymeName:"hexokinase" AND Organism:"Homo sapiens"');
  });

  it('averages every reported value', () => {
    const res = parseSabioText(SAMPLE_EXPORT, 'hexokinase', 'Homo sapiens');
    expect(res.km).toBeCloseTo(0.2, 12);
    expect(res.vmax).toBe(45);
    expect(res.optimal_pH).toBe(7.5);
    expect(res.optimal_temp).toBe(37);
    expect(res.sampleCount).toBe(2);
  });

  it('leaves absent values undefined', () => {
    const res = parseSabioText('Km = 1.5', 'catalase');
    expect(res.km).toBe(1.5);
    expect(res.vmax).toBeUndefined();
    expect(res.optimal_pH).toBeUndefined();
    expect(res.organism).toBeUndefined();
  });

  it('requests the text export and parses it', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, status: 200, text: async () => SAMPLE_EXPORT });
    globalThis.fetch = mockFetch;

    const res = await fetchSabioKinetics('hexokinase', 'Homo sapiens', { baseUrl: 'https://sabio.test/kineticLaws' });
    expect(res?.vmax).toBe(45);

    const url = new URL(String(mockFetch.mock.calls[0][0]));
    expect(url.origin + url.pathname).toBe('https://sabio.test/kineticLaws');
    expect(url.searchParams.get('format')).toBe('txt');
    expect(url.searchParams.get('query')).toBe('EnzymeName:"hexokinase" AND Organism:"Homo sapiens"');
  });

  it('returns null on non-OK fetch', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue({ ok: false, status: 503 });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const res = await fetchSabioKinetics('NOPE');
    expect(res).toBeNull();
    expect(warn).toHaveBeenCalledWith('[WARNING] SABIO001: SABIO-RK returned 503 for NOPE (any organism)');
  });

  it('returns null on network errors without caching them', async () => {
    const mockFetch = vi
      .fn()
      .mockRejectedValueOnce(new Error('socket hang up'))
      .mockResolvedValueOnce({ ok: true, status: 200, text: async () => 'Km = 2' });
    globalThis.fetch = mockFetch;
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(await fetchSabioKinetics('urease')).toBeNull();
    expect((await fetchSabioKinetics('urease'))?.km).toBe(2);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('caches results', async () => {
    const mockFetch = vi.fn().mockResolvedValue({ ok: true, status: 200, text: async () => SAMPLE_EXPORT });
    globalThis.fetch = mockFetch;

    const r1 = await fetchSabioKinetics('hexokinase', 'Homo sapiens');
    const r2 = await fetchSabioKinetics('Hexokinase', 'homo sapiens');
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(r1?.km).toBeCloseTo(0.2, 12);
    expect(r2).toBe(r1);
  });
});

describe('sabioToParameters', () => {
  it('fills in default tolerances', () => {
    const params = sabioToParameters(parseSabioText(SAMPLE_EXPORT, 'hexokinase', 'Homo sapiens'));
    expect(params).toMatchObject({ vmax: 45, optimal_pH: 7.5, optimal_temp: 37, pH_sigma: 1.0, temp_sigma: 5.0 });
    expect('ki' in params).toBe(false);
    expect(params.km).toBeCloseTo(0.2, 12);
  });

  it('takes explicit tolerances', () => {
    const params = sabioToParameters(parseSabioText(SAMPLE_EXPORT, 'hexokinase'), { pH_sigma: 0.5, temp_sigma: 3 });
    expect(params.pH_sigma).toBe(0.5);
    expect(params.temp_sigma).toBe(3);
  });

  it('names the first missing value', () => {
    expect(() => sabioToParameters(parseSabioText('Km = 1.5', 'catalase'))).toThrow(MissingParameterError);
    expect(() => sabioToParameters(parseSabioText('Km = 1.5', 'catalase'))).toThrow(
      'Missing vmax: no Vmax reported for catalase',
    );
  });
});
