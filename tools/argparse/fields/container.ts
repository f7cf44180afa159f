import type {
  ArgumentRegistry,
  CollectionKind,
  FieldDescriptor,
  FieldValidator,
  ScalarPrimitive,
} from "../parser/types.js";
import { asContainerValidator, primitiveCaster } from "../validators/validator.js";
import { flagName, helpText, valueMetavar } from "./arguments.js";

export function addContainerField(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  collection: CollectionKind,
  element: ScalarPrimitive
): FieldValidator {
  registry.addArgument({
    dest: field.alias,
    flags: [{ name: flagName(field) }],
    arity: "one-or-more",
    metavar: valueMetavar(field),
    help: helpText(field),
    required: field.required,
    group: field.required ? "required" : "optional",
  });
  return asContainerValidator(field, primitiveCaster(element), collection);
}
