/**
 * Simulate the rate of a catalogued enzyme under given conditions.
 *
 *   npx tsx scripts/simulate.ts "lactate dehydrogenase" "Homo sapiens" --substrate 0.3 --ph 7.2 --temp 36
 */

import { getStore } from '../services/kinetics/enzymeStore';
import { simulateDetailed } from '../services/kinetics/reactionRate';
import type { ReactionConditions } from '../types';
import { numberOption, parseArgs } from './cliArgs';

const USAGE =
  'Usage: npx tsx scripts/simulate.ts <enzyme> <organism> [--substrate 1.0] [--ph 7.0] [--temp 37] [--inhibitor n] [--data path] [--json]';

function main(): void {
  const args = parseArgs(process.argv.slice(2), ['--substrate', '--ph', '--temp', '--inhibitor', '--data'], USAGE);
  const store = getStore(args.options.get('--data'));
  const parameters = store.get(args.enzyme, args.organism);

  const conditions: ReactionConditions = {
    substrate_conc: numberOption(args, '--substrate') ?? 1.0,
    pH: numberOption(args, '--ph') ?? 7.0,
    temp: numberOption(args, '--temp') ?? 37.0,
    inhibitor_conc: numberOption(args, '--inhibitor'),
  };
  const breakdown = simulateDetailed(parameters, conditions);

  if (args.flags.has('--json')) {
    console.log(JSON.stringify({ enzyme: args.enzyme, organism: args.organism, conditions, parameters, ...breakdown }, null, 2));
    return;
  }

  console.log(`\nSimulated rate for ${args.enzyme} (${args.organism}): ${breakdown.rate.toFixed(2)} µmol/min`);
  console.log(`  pH factor:   ${breakdown.pHFactor.toFixed(4)}`);
  console.log(`  temp factor: ${breakdown.tempFactor.toFixed(4)}`);
  console.log(`  Km (eff):    ${breakdown.kmEff.toFixed(4)} mM`);
  console.log('  parameters: ', parameters);
}

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
