import { basename } from "path";
import type { z } from "zod";
import { supplied } from "../fields/arguments.js";
import { addField } from "../fields/index.js";
import { Logger } from "../lib/logger.js";
import { describeModel } from "../schema/descriptor.js";
import { ValidatedModel } from "../validators/model.js";
import { envVariableName, readEnvValue } from "./env.js";
import { ArgumentError, SchemaDefinitionError, UsageError } from "./errors.js";
import {
  commandEntries,
  commandsMetavar,
  formatHelpLayout,
  invocation,
  usageLine,
  usagePart,
  type CommandSummary,
  type HelpEntry,
} from "./help.js";
import type { Namespace } from "./namespace.js";
import { scanTokens, type ScanResult } from "./tokens.js";
import type {
  ArgumentParserOptions,
  ArgumentRegistry,
  ArgumentSpec,
  Classification,
  EnvSourceOptions,
  FieldDescriptor,
  FieldValidator,
  ParserIO,
  ParserState,
} from "./types.js";

export const EXIT_ERROR = 2;

const HELP_ENTRY: HelpEntry = { invocation: "-h, --help", help: "show this help message and exit" };
const VERSION_ENTRY: HelpEntry = {
  invocation: "-v, --version",
  help: "show program's version number and exit",
};

const processIO: ParserIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  exit: (status) => process.exit(status),
};

export interface CommandEntry {
  help?: string;
  parser: ArgumentParser<unknown>;
}

/**
 * Builds a command-line parser from a zod object schema and returns values
 * that have passed that schema. Construction walks every field once; after
 * that the parser only reads.
 */
export class ArgumentParser<T> implements ArgumentRegistry {
  readonly prog: string;
  readonly model: ValidatedModel<T>;
  readonly description?: string;
  readonly version?: string;
  readonly epilog?: string;

  private state: ParserState = "uninitialized";
  private readonly addHelp: boolean;
  private readonly exitOnError: boolean;
  private readonly env?: EnvSourceOptions;
  private readonly io: ParserIO;
  private readonly logger: Logger;
  private readonly specs: ArgumentSpec[] = [];
  private readonly flagNames = new Set<string>();
  private readonly classifications = new Map<string, Classification>();
  private commandGroup?: Map<string, CommandEntry>;

  constructor(options: ArgumentParserOptions<T>) {
    this.prog = options.prog ?? basename(process.argv[1] ?? "cli");
    this.description = options.description;
    this.version = options.version;
    this.epilog = options.epilog;
    this.addHelp = options.addHelp ?? true;
    this.exitOnError = options.exitOnError ?? true;
    this.env = options.env;
    this.io = options.io ?? processIO;
    this.logger = new Logger(this.prog);

    if (this.addHelp) {
      this.flagNames.add("--help");
    }
    if (this.version !== undefined) {
      this.flagNames.add("--version");
    }
    this.state = "groups-created";

    const fields = describeModel(options.model);
    this.model = new ValidatedModel(options.model, fields, options.name ?? "Arguments");

    const validators: (FieldValidator | undefined)[] = [];
    for (const field of fields) {
      const { classification, validator } = addField(this, field);
      this.classifications.set(field.name, classification);
      validators.push(validator);
      this.logger.debug(`registered ${field.name}`, {
        eventType: classification.kind === "nested-command" ? "schema.command" : "schema.field",
        field: field.name,
        classification: classification.kind,
      });
    }
    this.state = "fields-registered";

    for (const validator of validators) {
      this.model.addValidator(validator);
    }
    this.state = "finalized";
  }

  get lifecycle(): ParserState {
    return this.state;
  }

  addArgument(spec: ArgumentSpec): void {
    this.assertRegistering();
    for (const flag of spec.flags) {
      if (this.flagNames.has(flag.name)) {
        throw new SchemaDefinitionError(`Conflicting option string: ${flag.name}`);
      }
    }
    for (const flag of spec.flags) {
      this.flagNames.add(flag.name);
    }
    this.specs.push(spec);
  }

  addCommand(name: string, options: { help?: string; model: z.AnyZodObject }): void {
    this.assertRegistering();
    const group = this.commands();
    if (group.has(name)) {
      throw new SchemaDefinitionError(`Conflicting sub-command name: ${name}`);
    }
    const parser = new ArgumentParser<unknown>({
      model: options.model,
      name,
      prog: `${this.prog} ${name}`,
      description: options.help,
      addHelp: this.addHelp,
      exitOnError: false,
      io: this.io,
    });
    group.set(name, { help: options.help, parser });
  }

  /** The sub-command group, created on first use. */
  commands(): Map<string, CommandEntry> {
    this.commandGroup ??= new Map();
    return this.commandGroup;
  }

  parseTypedArgs(args: string[] = process.argv.slice(2)): T {
    return this.check(this.prepareArgs(args));
  }

  /**
   * Parses a sub-command's arguments. Errors are reported against this
   * parser, but the coerced input is returned rather than the schema output,
   * so the enclosing schema validates it exactly once.
   */
  parseCommandArgs(args: string[]): Record<string, unknown> {
    const input = this.prepareArgs(args);
    this.check(input);
    return input;
  }

  parseArgs(args: string[] = process.argv.slice(2)): Namespace {
    this.logger.debug("parsing", { eventType: "parse.start", argc: args.length });

    const scan = this.scan(args);
    if (scan.kind === "help") {
      this.printHelp();
      return this.exit(0);
    }
    if (scan.kind === "version") {
      this.io.stdout(`${this.version ?? ""}\n`);
      return this.exit(0);
    }

    const { namespace } = scan;
    if (scan.command) {
      const entry = this.commands().get(scan.command.name);
      if (entry) {
        namespace.set(scan.command.name, supplied(this.dispatch(entry, scan.command.args)));
      }
    }

    this.readEnv(namespace);

    const missing = this.specs
      .filter((spec) => spec.required && !namespace.has(spec.dest))
      .map((spec) => spec.flags.map((flag) => flag.name).join("/"));
    if (this.commandGroup && !scan.command) {
      missing.push(commandsMetavar(this.commandSummaries()));
    }
    if (missing.length > 0) {
      return this.error(`the following arguments are required: ${missing.join(", ")}`);
    }
    if (scan.unrecognized.length > 0) {
      return this.error(`unrecognized arguments: ${scan.unrecognized.join(" ")}`);
    }

    return namespace;
  }

  formatUsage(): string {
    const parts: string[] = [];
    if (this.addHelp) {
      parts.push("[-h]");
    }
    if (this.version !== undefined) {
      parts.push("[-v]");
    }
    parts.push(...this.specs.map(usagePart));
    if (this.commandGroup) {
      parts.push(`${commandsMetavar(this.commandSummaries())} ...`);
    }
    return usageLine(this.prog, parts);
  }

  formatHelp(): string {
    const helpEntries: HelpEntry[] = [];
    if (this.addHelp) {
      helpEntries.push(HELP_ENTRY);
    }
    if (this.version !== undefined) {
      helpEntries.push(VERSION_ENTRY);
    }

    return formatHelpLayout({
      usage: this.formatUsage(),
      description: this.description,
      sections: [
        {
          title: "commands",
          entries: this.commandGroup ? commandEntries(this.commandSummaries()) : [],
        },
        { title: "required arguments", entries: this.entriesFor("required") },
        { title: "optional arguments", entries: this.entriesFor("optional") },
        { title: "help", entries: helpEntries },
      ],
      epilog: this.epilog,
    });
  }

  printUsage(write: (text: string) => void = this.io.stdout): void {
    write(`${this.formatUsage()}\n`);
  }

  printHelp(write: (text: string) => void = this.io.stdout): void {
    write(this.formatHelp());
  }

  error(message: string): never {
    return this.report(new ArgumentError(this.prog, this.formatUsage(), message));
  }

  exit(status = 0, message?: string): never {
    if (message) {
      this.io.stderr(message);
    }
    return this.io.exit(status);
  }

  private prepareArgs(args: string[]): Record<string, unknown> {
    const namespace = this.parseArgs(args);
    return this.model.prepare(namespace.toRecord((dest) => this.absentValue(dest)));
  }

  private check(input: Record<string, unknown>): T {
    const result = this.model.validate(input);
    if (!result.ok) {
      this.logger.warn("validation failed", {
        eventType: "parse.fail",
        errorCode: "VALIDATION_ERROR",
        issues: result.error.issues.length,
      });
      return this.error(this.model.formatError(result.error));
    }
    this.logger.info("parsed", { eventType: "parse.end" });
    return result.value;
  }

  private report(error: ArgumentError): never {
    this.logger.warn(error.detail, { eventType: "parse.fail", errorCode: error.code });
    if (!this.exitOnError) {
      throw error;
    }
    this.io.stderr(`${error.usage}\n`);
    return this.exit(EXIT_ERROR, `${error.message}\n`);
  }

  private scan(args: string[]): ScanResult {
    try {
      return scanTokens(args, {
        arguments: this.specs,
        commands: this.commandGroup ? [...this.commandGroup.keys()] : [],
        help: this.addHelp,
        version: this.version !== undefined,
      });
    } catch (error) {
      if (error instanceof UsageError) {
        return this.error(error.message);
      }
      throw error;
    }
  }

  private dispatch(entry: CommandEntry, args: string[]): Record<string, unknown> {
    try {
      return entry.parser.parseCommandArgs(args);
    } catch (error) {
      if (error instanceof ArgumentError) {
        return this.report(error);
      }
      throw error;
    }
  }

  private readEnv(namespace: Namespace): void {
    const env = this.env;
    if (!env) {
      return;
    }
    for (const field of this.model.fields) {
      const classification = this.classifications.get(field.name);
      if (!classification || classification.kind === "nested-command" || namespace.has(field.alias)) {
        continue;
      }
      const value = readEnvValue(field, classification, env);
      if (value) {
        namespace.set(field.alias, value);
        this.logger.debug(`read ${field.name} from environment`, {
          eventType: "env.read",
          field: field.name,
          variable: envVariableName(env.prefix, field),
        });
      }
    }
  }

  private absentValue(dest: string): unknown {
    return this.fieldByAlias(dest)?.absentValue;
  }

  private fieldByAlias(alias: string): FieldDescriptor | undefined {
    return this.model.fields.find((field) => field.alias === alias);
  }

  private entriesFor(group: ArgumentSpec["group"]): HelpEntry[] {
    return this.specs
      .filter((spec) => spec.group === group)
      .map((spec) => ({ invocation: invocation(spec), help: spec.help || undefined }));
  }

  private commandSummaries(): CommandSummary[] {
    return [...this.commands()].map(([name, entry]) => ({ name, help: entry.help }));
  }

  private assertRegistering(): void {
    if (this.state !== "groups-created") {
      throw new SchemaDefinitionError(`Parser for ${this.prog} no longer accepts arguments`);
    }
  }
}
