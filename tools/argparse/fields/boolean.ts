import type { ArgumentRegistry, FieldDescriptor, FieldValidator } from "../parser/types.js";
import { asValidator, booleanCaster } from "../validators/validator.js";
import { ABSENT, defaultOf, flagName, helpText, supplied, takesInverseFlag } from "./arguments.js";

/**
 * Required booleans get a `--x/--no-x` pair. Optional ones get a single flag
 * that flips the default: `--x` when it is falsy, `--no-x` when it is truthy.
 */
export function addBooleanField(registry: ArgumentRegistry, field: FieldDescriptor): FieldValidator {
  const help = helpText(field);

  if (field.required) {
    registry.addArgument({
      dest: field.alias,
      flags: [
        { name: flagName(field), constant: supplied(true) },
        { name: flagName(field, true), constant: supplied(false) },
      ],
      arity: "none",
      help,
      required: true,
      group: "required",
    });
    return asValidator(field, booleanCaster);
  }

  const inverted = Boolean(defaultOf(field));
  registry.addArgument({
    dest: field.alias,
    flags: [{ name: flagName(field, inverted), constant: supplied(!inverted) }],
    arity: "none",
    help,
    required: false,
    group: "optional",
  });

  if (!inverted && takesInverseFlag(field)) {
    registry.addArgument({
      dest: field.alias,
      flags: [{ name: flagName(field, true), constant: ABSENT }],
      arity: "none",
      help,
      required: false,
      group: "optional",
    });
  }

  return asValidator(field, booleanCaster);
}
