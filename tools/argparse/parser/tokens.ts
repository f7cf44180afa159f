import { parseArgs, type ParseArgsConfig } from "util";
import { supplied } from "../fields/arguments.js";
import { UsageError } from "./errors.js";
import { Namespace } from "./namespace.js";
import type { ArgumentSpec, FlagSpec } from "./types.js";

export interface TokenTable {
  arguments: ArgumentSpec[];
  commands: string[];
  help: boolean;
  version: boolean;
}

export type ScanResult =
  | { kind: "help" }
  | { kind: "version" }
  | {
      kind: "parsed";
      namespace: Namespace;
      unrecognized: string[];
      command?: { name: string; args: string[] };
    };

interface FlagEntry {
  spec: ArgumentSpec;
  flag: FlagSpec;
}

const NEGATIVE_NUMBER = /^-\d+$|^-\d*\.\d+$/;

/**
 * Walks the tokens `util.parseArgs` produces. Options fill the namespace in
 * order, so a later flag for the same destination wins; a positional that
 * names a command hands the rest of the line to that command.
 */
export function scanTokens(args: string[], table: TokenTable): ScanResult {
  const options: NonNullable<ParseArgsConfig["options"]> = {};
  const byName = new Map<string, FlagEntry>();

  for (const spec of table.arguments) {
    for (const flag of spec.flags) {
      const name = flag.name.slice(2);
      options[name] = { type: spec.arity === "none" ? "boolean" : "string" };
      byName.set(name, { spec, flag });
    }
  }
  if (table.help) {
    options.help = { type: "boolean", short: "h" };
  }
  if (table.version) {
    options.version = { type: "boolean", short: "v" };
  }

  const { tokens } = parseArgs({
    args,
    options,
    strict: false,
    allowPositionals: true,
    tokens: true,
  });

  const commands = new Set(table.commands);
  const namespace = new Namespace();
  const unrecognized: string[] = [];
  let collecting: { dest: string; values: string[] } | null = null;
  let consumedIndex = -1;

  for (const token of tokens) {
    // a short-option group such as -2.5 arrives as several tokens of one arg
    if (token.index === consumedIndex) {
      continue;
    }
    if (token.kind === "option-terminator") {
      collecting = null;
      continue;
    }

    if (token.kind === "positional") {
      if (commands.has(token.value)) {
        return {
          kind: "parsed",
          namespace,
          unrecognized,
          command: { name: token.value, args: args.slice(token.index + 1) },
        };
      }
      if (collecting) {
        collecting.values.push(token.value);
        namespace.set(collecting.dest, supplied([...collecting.values]));
      } else {
        unrecognized.push(token.value);
      }
      continue;
    }

    const arg = args[token.index];
    if (collecting && arg !== undefined && NEGATIVE_NUMBER.test(arg)) {
      collecting.values.push(arg);
      namespace.set(collecting.dest, supplied([...collecting.values]));
      consumedIndex = token.index;
      continue;
    }

    collecting = null;
    if (table.help && token.name === "help") {
      return { kind: "help" };
    }
    if (table.version && token.name === "version") {
      return { kind: "version" };
    }

    const entry = token.rawName === `--${token.name}` ? byName.get(token.name) : undefined;
    if (!entry) {
      unrecognized.push(token.inlineValue ? `${token.rawName}=${token.value}` : token.rawName);
      continue;
    }

    const { spec, flag } = entry;
    if (spec.arity === "none") {
      if (token.inlineValue) {
        throw new UsageError(`argument ${flag.name}: ignored explicit argument '${token.value}'`);
      }
      namespace.set(spec.dest, flag.constant ?? supplied(true));
      continue;
    }

    const value = token.value;
    if (value === undefined || (!token.inlineValue && looksLikeOption(value))) {
      const expected = spec.arity === "single" ? "expected one argument" : "expected at least one argument";
      throw new UsageError(`argument ${flag.name}: ${expected}`);
    }

    if (spec.arity === "single") {
      namespace.set(spec.dest, supplied(value));
    } else {
      collecting = { dest: spec.dest, values: [value] };
      namespace.set(spec.dest, supplied([value]));
    }
  }

  return { kind: "parsed", namespace, unrecognized };
}

function looksLikeOption(value: string): boolean {
  return value.startsWith("-") && value !== "-" && !NEGATIVE_NUMBER.test(value);
}
