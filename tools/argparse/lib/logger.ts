import { emitParserEvent, type LogLevel, type ParserEventType } from "./events.js";

export interface LogMeta {
  eventType?: ParserEventType;
  field?: string;
  classification?: string;
  errorCode?: string;
  [key: string]: unknown;
}

export class Logger {
  constructor(private readonly prog: string) {}

  debug(message: string, meta: LogMeta = {}): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.emit("warn", message, meta);
  }

  private emit(level: LogLevel, message: string, meta: LogMeta): void {
    emitParserEvent({
      ...meta,
      level,
      message,
      prog: this.prog,
      eventType: meta.eventType ?? "parse.start",
    });
  }
}
