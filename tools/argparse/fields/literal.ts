import type {
  ArgumentRegistry,
  FieldDescriptor,
  FieldValidator,
  LiteralValue,
} from "../parser/types.js";
import { asValidator, literalCaster } from "../validators/validator.js";
import {
  ABSENT,
  choicesMetavar,
  flagName,
  helpText,
  supplied,
  takesInverseFlag,
} from "./arguments.js";

export function addLiteralField(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  choices: LiteralValue[]
): FieldValidator {
  addChoiceArguments(registry, field, {
    names: choices.map(String),
    constant: choices[0],
    help: helpText(field),
  });
  return asValidator(field, literalCaster(choices));
}

/**
 * A single choice on an optional field needs no value, so it becomes a flag
 * storing that choice. Everything else takes one value from the choices.
 */
export function addChoiceArguments(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  options: { names: string[]; constant: unknown; help: string }
): void {
  const flagOnly = options.names.length === 1 && !field.required;
  const group = field.required ? "required" : "optional";

  registry.addArgument(
    flagOnly
      ? {
          dest: field.alias,
          flags: [{ name: flagName(field), constant: supplied(options.constant) }],
          arity: "none",
          help: options.help,
          required: false,
          group,
        }
      : {
          dest: field.alias,
          flags: [{ name: flagName(field) }],
          arity: "single",
          metavar: choicesMetavar(options.names),
          help: options.help,
          required: field.required,
          group,
        }
  );

  if (takesInverseFlag(field)) {
    registry.addArgument({
      dest: field.alias,
      flags: [{ name: flagName(field, true), constant: ABSENT }],
      arity: "none",
      help: options.help,
      required: false,
      group,
    });
  }
}
