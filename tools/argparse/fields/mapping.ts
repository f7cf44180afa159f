import type {
  ArgumentRegistry,
  FieldDescriptor,
  FieldValidator,
  MappingKind,
} from "../parser/types.js";
import { asMappingValidator } from "../validators/validator.js";
import { flagName, helpText, valueMetavar } from "./arguments.js";

/** Takes one dict literal, e.g. `--headers "{'accept': 'json'}"`. */
export function addMappingField(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  target: MappingKind
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
  return asMappingValidator(field, target);
}
