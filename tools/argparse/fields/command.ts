import type { z } from "zod";
import type { ArgumentRegistry, FieldDescriptor } from "../parser/types.js";

/**
 * Nested models become sub-commands named after the field alias. The
 * sub-parser validates its own values, so no validator is returned.
 */
export function addCommandField(
  registry: ArgumentRegistry,
  field: FieldDescriptor,
  schema: z.AnyZodObject
): undefined {
  registry.addCommand(field.alias, { help: field.description, model: schema });
  return undefined;
}
