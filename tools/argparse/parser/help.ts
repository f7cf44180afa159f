import type { ArgumentSpec } from "./types.js";

const INDENT = 2;
const SUBCOMMAND_INDENT = 4;
const MAX_HELP_POSITION = 24;

export interface HelpEntry {
  invocation: string;
  help?: string;
  indent?: number;
}

export interface HelpSection {
  title: string;
  entries: HelpEntry[];
}

export interface HelpLayout {
  usage: string;
  description?: string;
  sections: HelpSection[];
  epilog?: string;
}

export interface CommandSummary {
  name: string;
  help?: string;
}

export function usageLine(prog: string, parts: string[]): string {
  return ["usage:", prog, ...parts].join(" ");
}

export function usagePart(spec: ArgumentSpec): string {
  const text =
    spec.arity === "none"
      ? spec.flags.map((flag) => flag.name).join(" | ")
      : `${spec.flags.map((flag) => flag.name).join(" | ")} ${valueFormat(spec)}`;
  return spec.required ? text : `[${text}]`;
}

export function commandsMetavar(commands: CommandSummary[]): string {
  return `{${commands.map((command) => command.name).join(",")}}`;
}

export function invocation(spec: ArgumentSpec): string {
  if (spec.arity === "none") {
    return spec.flags.map((flag) => flag.name).join(", ");
  }
  return spec.flags.map((flag) => `${flag.name} ${valueFormat(spec)}`).join(", ");
}

export function commandEntries(commands: CommandSummary[]): HelpEntry[] {
  return [
    { invocation: commandsMetavar(commands) },
    ...commands.map((command) => ({
      invocation: command.name,
      help: command.help,
      indent: SUBCOMMAND_INDENT,
    })),
  ];
}

/**
 * Help text starts in one column for every entry: two past the widest
 * invocation, capped at 24. An invocation that does not fit puts its help on
 * the next line.
 */
export function formatHelpLayout(layout: HelpLayout): string {
  const sections = layout.sections.filter((section) => section.entries.length > 0);
  const widest = Math.max(
    0,
    ...sections.flatMap((section) =>
      section.entries.map((entry) => entry.invocation.length + (entry.indent ?? INDENT))
    )
  );
  const helpPosition = Math.min(widest + 2, MAX_HELP_POSITION);

  const blocks = [layout.usage];
  if (layout.description) {
    blocks.push(layout.description);
  }
  for (const section of sections) {
    const lines = [`${section.title}:`];
    for (const entry of section.entries) {
      lines.push(...formatEntry(entry, helpPosition));
    }
    blocks.push(lines.join("\n"));
  }
  if (layout.epilog) {
    blocks.push(layout.epilog);
  }
  return `${blocks.join("\n\n")}\n`;
}

function formatEntry(entry: HelpEntry, helpPosition: number): string[] {
  const indent = entry.indent ?? INDENT;
  const header = `${" ".repeat(indent)}${entry.invocation}`;
  if (!entry.help) {
    return [header];
  }
  const width = helpPosition - indent - 2;
  if (entry.invocation.length <= width) {
    return [`${header.padEnd(helpPosition)}${entry.help}`];
  }
  return [header, `${" ".repeat(helpPosition)}${entry.help}`];
}

function valueFormat(spec: ArgumentSpec): string {
  const metavar = spec.metavar ?? spec.dest.toUpperCase();
  return spec.arity === "one-or-more" ? `${metavar} [${metavar} ...]` : metavar;
}
