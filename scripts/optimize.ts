/**
 * Find the substrate concentration, pH and temperature that maximise the
 * simulated rate of a catalogued enzyme.
 *
 *   npx tsx scripts/optimize.ts "lactate dehydrogenase" "Homo sapiens" --seed 7
 */

import { getStore } from '../services/kinetics/enzymeStore';
import { optimizeReaction } from '../services/kinetics/optimizeReaction';
import { numberOption, parseArgs } from './cliArgs';

const USAGE = 'Usage: npx tsx scripts/optimize.ts <enzyme> <organism> [--inhibitor n] [--seed n] [--data path]';

function main(): void {
  const args = parseArgs(process.argv.slice(2), ['--inhibitor', '--seed', '--data'], USAGE);
  const parameters = getStore(args.options.get('--data')).get(args.enzyme, args.organism);

  const result = optimizeReaction(parameters, {
    inhibitor_conc: numberOption(args, '--inhibitor'),
    seed: numberOption(args, '--seed'),
  });
  const best = result.bestConditions;

  console.log('Optimal Conditions:');
  console.log(`Substrate Concentration: ${best.substrate_conc.toFixed(2)} mM`);
  console.log(`pH: ${best.pH.toFixed(2)}`);
  console.log(`Temperature: ${best.temp.toFixed(2)} °C`);
  console.log(`Maximum Reaction Rate: ${result.maxRate.toFixed(2)} µmol/min`);
  console.log(`(${result.generations} generations, ${result.converged ? 'converged' : 'generation limit reached'})`);
}

try {
  main();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
