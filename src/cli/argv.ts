import { UsageError } from "../errors.js";

/**
 * Declarative description of the flags a command accepts. Keys are every
 * spelling accepted on the command line (`-v`, `--verbose`), values the
 * canonical name the parsed result is keyed by.
 */
export interface FlagSpec {
  readonly valueFlags: Readonly<Record<string, string>>;
  readonly booleanFlags: Readonly<Record<string, string>>;
}

export interface ParsedArgv {
  readonly values: ReadonlyMap<string, string>;
  readonly switches: ReadonlySet<string>;
  readonly positionals: readonly string[];
}

function lookup(table: Readonly<Record<string, string>>, flag: string): string | undefined {
  return Object.prototype.hasOwnProperty.call(table, flag) ? table[flag] : undefined;
}

/**
 * Parses raw `process.argv.slice(2)` content. Value flags accept both
 * `--flag value` and `--flag=value`; the token after a value flag is always
 * its value, so `--FS-option "-3T"` works. Everything after `--` is
 * positional and repeated value flags keep the last occurrence.
 */
export function parseArgv(argv: readonly string[], spec: FlagSpec): ParsedArgv {
  const values = new Map<string, string>();
  const switches = new Set<string>();
  const positionals: string[] = [];

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];

    if (arg === "--") {
      positionals.push(...argv.slice(index + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      positionals.push(arg);
      continue;
    }

    const separator = arg.indexOf("=");
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const inlineValue = separator === -1 ? undefined : arg.slice(separator + 1);

    const valueName = lookup(spec.valueFlags, flag);
    if (valueName !== undefined) {
      let value = inlineValue;
      if (value === undefined) {
        const next = argv[index + 1];
        if (next === undefined) {
          throw new UsageError(`The flag ${flag} requires a value.`, { flag });
        }
        value = next;
        index += 1;
      }
      values.set(valueName, value);
      continue;
    }

    const switchName = lookup(spec.booleanFlags, flag);
    if (switchName !== undefined) {
      if (inlineValue !== undefined) {
        throw new UsageError(`The flag ${flag} does not take a value.`, { flag });
      }
      switches.add(switchName);
      continue;
    }

    throw new UsageError(`Unknown option '${flag}'.`, { flag });
  }

  return { values, switches, positionals };
}
