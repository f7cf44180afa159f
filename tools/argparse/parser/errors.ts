export class ArgParseError extends Error {
  public readonly code: string;

  constructor(message: string, options: { code: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
  }
}

/**
 * Raised by a parser that does not exit on error. `detail` is the bare message,
 * `message` the `<prog>: error: <detail>` line printed by an exiting parser.
 */
export class ArgumentError extends ArgParseError {
  constructor(
    public readonly prog: string,
    public readonly usage: string,
    public readonly detail: string,
    cause?: unknown
  ) {
    super(`${prog}: error: ${detail}`, { code: "ARGUMENT_ERROR", cause });
  }
}

export class SchemaDefinitionError extends ArgParseError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "SCHEMA_DEFINITION_ERROR", cause });
  }
}

export class LiteralSyntaxError extends ArgParseError {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(`${message} at position ${position}`, { code: "LITERAL_SYNTAX_ERROR" });
  }
}

export class ParserExit extends ArgParseError {
  constructor(public readonly status: number) {
    super(`Parser exited with status ${status}`, { code: "PARSER_EXIT" });
  }
}

/** A command-line mistake found while reading tokens, before a prog is attached. */
export class UsageError extends ArgParseError {
  constructor(message: string) {
    super(message, { code: "USAGE_ERROR" });
  }
}
