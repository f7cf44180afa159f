import type {
  ArgumentRegistry,
  FieldDescriptor,
  FieldValidator,
  ScalarPrimitive,
} from "../parser/types.js";
import { asValidator, primitiveCaster } from "../validators/validator.js";
import { flagName, helpText, valueMetavar } from "./arguments.js";

export function addStandardField(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  primitive: ScalarPrimitive
): FieldValidator {
  registry.addArgument({
    dest: field.alias,
    flags: [{ name: flagName(field) }],
    arity: "single",
    metavar: valueMetavar(field),
    help: helpText(field),
    required: field.required,
    group: field.required ? "required" : "optional",
  });
  return asValidator(field, primitiveCaster(primitive));
}
