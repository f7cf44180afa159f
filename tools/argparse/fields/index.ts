import type {
  ArgumentRegistry,
  Classification,
  FieldDescriptor,
  FieldValidator,
} from "../parser/types.js";
import { classifyField } from "../schema/classify.js";
import { addBooleanField } from "./boolean.js";
import { addCommandField } from "./command.js";
import { addContainerField } from "./container.js";
import { addEnumField } from "./enum.js";
import { addLiteralField } from "./literal.js";
import { addMappingField } from "./mapping.js";
import { addStandardField } from "./standard.js";

export interface AddedField {
  classification: Classification;
  validator?: FieldValidator;
}

export function addField(registry: ArgumentRegistry, field: FieldDescriptor): AddedField {
  const classification = classifyField(field);
  return { classification, validator: synthesize(registry, field, classification) };
}

function synthesize(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  classification: Classification
): FieldValidator | undefined {
  switch (classification.kind) {
    case "nested-command":
      return addCommandField(registry, field, classification.schema);
    case "literal-set":
      return addLiteralField(registry, field, classification.choices);
    case "boolean":
      return addBooleanField(registry, field);
    case "container":
      return addContainerField(registry, field, classification.collection, classification.element);
    case "mapping":
      return addMappingField(registry, field, classification.target);
    case "enumeration":
      return addEnumField(registry, field, classification.members);
    case "scalar":
      return addStandardField(registry, field, classification.primitive);
  }
}
