export interface ParsedArgs {
  positional: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

// Never take a value, so `--debug choose myExp` keeps its positionals
const BOOLEAN_FLAGS = new Set(["debug", "version", "help"]);

/**
 * `--name value` becomes an option, a bare `--name` or `-x` a flag
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = { positional: [], flags: {}, options: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith("--")) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith("--")) {
        result.options[key] = next;
        i++;
      } else {
        result.flags[key] = true;
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      result.flags[arg.slice(1)] = true;
    } else {
      result.positional.push(arg);
    }
  }

  return result;
}

export function getOption(args: ParsedArgs, ...names: string[]): string | undefined {
  for (const name of names) {
    if (args.options[name] !== undefined) return args.options[name];
  }
  return undefined;
}

export function getNumberOption(args: ParsedArgs, name: string): number | undefined {
  const value = getOption(args, name);
  if (value === undefined) return undefined;

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Option --${name} must be a number, got "${value}"`);
  }
  return parsed;
}
