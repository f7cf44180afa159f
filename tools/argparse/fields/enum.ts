import type {
  ArgumentRegistry,
  EnumMember,
  FieldDescriptor,
  FieldValidator,
} from "../parser/types.js";
import { asValidator, enumCaster } from "../validators/validator.js";
import { helpText } from "./arguments.js";
import { addChoiceArguments } from "./literal.js";

/** Members are chosen by name on the command line; the stored value is the member's value. */
export function addEnumField(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  members: EnumMember[]
): FieldValidator {
  addChoiceArguments(registry, field, {
    names: members.map((member) => member.name),
    constant: members[0]?.value,
    help: helpText(field, members),
  });
  return asValidator(field, enumCaster(members));
}
