import { describe, it, expect } from 'vitest';
import { numberOption, parseArgs } from '../../scripts/cliArgs';

const USAGE = 'Usage: simulate <enzyme> <organism>';

describe('parseArgs', () => {
  it('splits positionals, options and flags', () => {
    const args = parseArgs(
      ['lactate dehydrogenase', 'Homo sapiens', '--ph', '7.2', '--json', '--temp', '36'],
      ['--ph', '--temp'],
      USAGE,
    );
    expect(args.enzyme).toBe('lactate dehydrogenase');
    expect(args.organism).toBe('Homo sapiens');
    expect(args.options.get('--ph')).toBe('7.2');
    expect(args.flags.has('--json')).toBe(true);
    expect(numberOption(args, '--temp')).toBe(36);
    expect(numberOption(args, '--substrate')).toBeUndefined();
  });

  it('requires enzyme and organism', () => {
    expect(() => parseArgs(['hexokinase'], [], USAGE)).toThrow(USAGE);
  });

  it('requires a value after an option', () => {
    expect(() => parseArgs(['hexokinase', 'Homo sapiens', '--ph'], ['--ph'], USAGE)).toThrow(/--ph needs a value/);
  });

  it('rejects non-numeric values', () => {
    const args = parseArgs(['hexokinase', 'Homo sapiens', '--ph', 'neutral'], ['--ph'], USAGE);
    expect(() => numberOption(args, '--ph')).toThrow("--ph expects a number, got 'neutral'");
  });
});
