import { ABSENT, supplied } from "../fields/arguments.js";
import { parseLiteralExpression } from "../lib/literal-expression.js";
import { LiteralSyntaxError } from "./errors.js";
import type { Classification, EnvSourceOptions, FieldDescriptor, FieldValue } from "./types.js";

export function envVariableName(prefix: string, field: Pick<FieldDescriptor, "alias">): string {
  return `${prefix}${field.alias.replace(/-/g, "_").toUpperCase()}`;
}

/**
 * Reads the fallback value for a field the command line left unset. Empty
 * variables mean "absent"; containers and mappings are read as literal
 * expressions and everything else goes through the field's validator as text.
 */
export function readEnvValue(
  field: FieldDescriptor,
  classification: Classification,
  options: EnvSourceOptions
): FieldValue | undefined {
  const source = options.source ?? process.env;
  const raw = source[envVariableName(options.prefix, field)];
  if (raw === undefined) {
    return undefined;
  }
  if (raw === "") {
    return ABSENT;
  }
  if (classification.kind === "container" || classification.kind === "mapping") {
    return supplied(parseComplex(raw));
  }
  return supplied(raw);
}

function parseComplex(raw: string): unknown {
  try {
    return parseLiteralExpression(raw);
  } catch (error) {
    if (error instanceof LiteralSyntaxError) {
      return raw;
    }
    throw error;
  }
}
