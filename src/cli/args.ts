/**
 * Command line parsing
 */

import { ValidationError } from "../core/errors.js";

export const COMMANDS = ["ask", "calc", "evaluate", "help"] as const;
export type Command = (typeof COMMANDS)[number];

const BOOLEAN_FLAGS: Record<string, string> = {
  "--json": "json",
  "--verbose": "verbose",
  "-v": "verbose",
  "--variable-income": "variableIncome",
  "--help": "help",
  "-h": "help",
};

const ALIASES: Record<string, string> = {
  "-k": "top-k",
  "-o": "output",
  "-p": "profile",
};

export interface ParsedArgs {
  command: Command;
  positionals: string[];
  /** Option name (without dashes) → every value given, in order */
  options: Map<string, string[]>;
  flags: Set<string>;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: "help",
    positionals: [],
    options: new Map(),
    flags: new Set(),
  };

  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const flag = BOOLEAN_FLAGS[arg];

    if (flag) {
      result.flags.add(flag);
    } else if (arg.startsWith("-") && arg.length > 1 && !/^-\d/.test(arg)) {
      const eq = arg.indexOf("=");
      const rawName = eq === -1 ? arg : arg.slice(0, eq);
      const inline = eq === -1 ? undefined : arg.slice(eq + 1);
      const name = ALIASES[rawName] ?? rawName.replace(/^-+/, "");
      const value = inline ?? argv[++i];
      if (value === undefined) {
        throw new ValidationError(`Option ${rawName} needs a value`, { field: name });
      }
      result.options.set(name, [...(result.options.get(name) ?? []), value]);
    } else if (!commandSeen && isCommand(arg)) {
      result.command = arg;
      commandSeen = true;
    } else {
      result.positionals.push(arg);
    }
  }

  if (result.flags.has("help")) result.command = "help";
  return result;
}

export function optionValue(args: ParsedArgs, name: string): string | undefined {
  const values = args.options.get(name);
  return values?.[values.length - 1];
}

/**
 * Comma-separated or repeated option values, flattened
 */
export function optionList(args: ParsedArgs, name: string): string[] {
  return (args.options.get(name) ?? [])
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

export function optionNumber(args: ParsedArgs, name: string): number | undefined {
  const raw = optionValue(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw.replace(/[$,_]/g, ""));
  if (raw.trim() === "" || !Number.isFinite(value)) {
    throw new ValidationError(`--${name} must be a number, got "${raw}"`, { field: name });
  }
  return value;
}
