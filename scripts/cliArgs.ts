export interface CliArgs {
  enzyme: string;
  organism: string;
  options: Map<string, string>;
  flags: Set<string>;
}

/** Two positionals (enzyme, organism), `--name value` options and bare `--flag`s. */
export function parseArgs(argv: string[], valueOptions: readonly string[], usage: string): CliArgs {
  const positionals: string[] = [];
  const options = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (valueOptions.includes(a)) {
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`${a} needs a value\n${usage}`);
      options.set(a, value);
      i++;
    } else if (a.startsWith('--')) {
      flags.add(a);
    } else {
      positionals.push(a);
    }
  }

  const [enzyme, organism] = positionals;
  if (!enzyme || !organism) throw new Error(usage);
  return { enzyme, organism, options, flags };
}

export function numberOption(args: CliArgs, name: string): number | undefined {
  const raw = args.options.get(name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`${name} expects a number, got '${raw}'`);
  return n;
}
