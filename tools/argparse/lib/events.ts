import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";

export type ParserEventType =
  | "schema.field"
  | "schema.command"
  | "parse.start"
  | "parse.end"
  | "parse.fail"
  | "env.read";

export interface ParserEvent {
  ts: string;
  level: LogLevel;
  eventType: ParserEventType;
  prog: string;
  message: string;
  field?: string;
  classification?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export interface LogRuntimeConfig {
  format: LogFormat;
  verbose: boolean;
  terminal: boolean;
  eventFilePath?: string;
}

export interface EmitInput {
  level: LogLevel;
  message: string;
  eventType: ParserEventType;
  prog: string;
  [key: string]: unknown;
}

class EventEmitter {
  constructor(private readonly config: LogRuntimeConfig) {}

  emit(input: EmitInput): void {
    const { level, message, eventType, prog, ...rest } = input;
    const event = redactEvent({
      ts: new Date().toISOString(),
      level,
      eventType,
      prog,
      message,
      ...rest,
    });

    if (this.config.terminal) {
      this.writeTerminal(event);
    }

    if (this.config.eventFilePath) {
      mkdirSync(dirname(this.config.eventFilePath), { recursive: true });
      appendFileSync(this.config.eventFilePath, `${JSON.stringify(event)}\n`);
    }
  }

  // stdout belongs to the program being parsed for; every level goes to stderr.
  private writeTerminal(event: ParserEvent): void {
    if (!shouldPrintToTerminal(event, this.config.verbose)) {
      return;
    }
    if (this.config.format === "json") {
      console.error(JSON.stringify(event));
      return;
    }
    console.error(this.renderPretty(event));
  }

  renderPretty(event: ParserEvent): string {
    const prefix = `${event.ts} [${event.prog}] [${event.eventType}]`;
    const extras = Object.entries(event)
      .filter(([key]) => !["ts", "level", "prog", "eventType", "message"].includes(key))
      .filter(([, value]) => value !== undefined && value !== null && value !== "")
      .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
      .join(" ");

    return `${prefix} ${event.message}${extras ? ` ${extras}` : ""}`;
  }
}

let globalEmitter: EventEmitter | null = null;

export function initializeEventEmitter(config: LogRuntimeConfig): void {
  globalEmitter = new EventEmitter(config);
}

export function resetEventEmitter(): void {
  globalEmitter = null;
}

export function emitParserEvent(input: EmitInput): void {
  if (!globalEmitter) {
    return;
  }
  globalEmitter.emit(input);
}

function redactEvent(event: ParserEvent): ParserEvent {
  const redacted: ParserEvent = { ...event };
  for (const [key, value] of Object.entries(event)) {
    redacted[key] = redactValue(key, value);
  }
  return redacted;
}

export function redactEventForTest(event: ParserEvent): ParserEvent {
  return redactEvent(event);
}

export function formatPrettyForTest(event: ParserEvent): string {
  const emitter = new EventEmitter({ format: "pretty", verbose: true, terminal: false });
  return emitter.renderPretty(event);
}

export function shouldPrintToTerminalForTest(event: ParserEvent, verbose: boolean): boolean {
  return shouldPrintToTerminal(event, verbose);
}

function redactValue(key: string, value: unknown): unknown {
  if (value == null) {
    return value;
  }

  if (isSensitiveKey(key.toLowerCase())) {
    return "[REDACTED]";
  }

  if (typeof value === "string") {
    return truncate(value, 240);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactValue(key, item));
  }

  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = redactValue(k, v);
    }
    return out;
  }

  return value;
}

function isSensitiveKey(key: string): boolean {
  return (
    key.includes("token") ||
    key.includes("apikey") ||
    key.includes("api_key") ||
    key.includes("api-key") ||
    key.includes("secret") ||
    key.includes("password") ||
    key.includes("authorization") ||
    key.includes("cookie")
  );
}

function truncate(value: string, max: number): string {
  if (value.length <= max) {
    return value;
  }
  return `${value.slice(0, max)}...[truncated]`;
}

function shouldPrintToTerminal(event: ParserEvent, verbose: boolean): boolean {
  if (verbose) {
    return true;
  }
  if (event.level === "error" || event.level === "warn") {
    return true;
  }
  if (event.level === "debug") {
    return false;
  }
  return event.eventType === "parse.fail";
}
