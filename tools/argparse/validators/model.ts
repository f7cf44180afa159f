import type { z } from "zod";
import type { FieldDescriptor, FieldValidator } from "../parser/types.js";
import { validatorName } from "./validator.js";

export type ConstructResult<T> = { ok: true; value: T } | { ok: false; error: z.ZodError };

/**
 * The caller's schema plus the coercion hooks synthesized for its fields.
 * `construct` applies the hooks to raw values keyed by alias, then hands the
 * result to zod; the schema itself is never altered, so object-level
 * refinements still run.
 */
export class ValidatedModel<T> {
  private readonly validators = new Map<string, FieldValidator>();

  constructor(
    public readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    public readonly fields: FieldDescriptor[],
    public readonly name: string
  ) {}

  addValidator(validator: FieldValidator | undefined): void {
    if (validator) {
      this.validators.set(validator.name, validator);
    }
  }

  validatorFor(field: string): FieldValidator | undefined {
    return this.validators.get(validatorName(field));
  }

  get validatorCount(): number {
    return this.validators.size;
  }

  prepare(raw: Record<string, unknown>): Record<string, unknown> {
    const input: Record<string, unknown> = {};
    for (const field of this.fields) {
      if (!Object.hasOwn(raw, field.alias)) {
        continue;
      }
      const value = raw[field.alias];
      const validator = this.validatorFor(field.name);
      input[field.name] = validator ? validator.apply(value) : value;
    }
    return input;
  }

  construct(raw: Record<string, unknown>): ConstructResult<T> {
    return this.validate(this.prepare(raw));
  }

  /** Runs the schema over input that `prepare` has already coerced. */
  validate(input: Record<string, unknown>): ConstructResult<T> {
    const result = this.schema.safeParse(input);
    if (result.success) {
      return { ok: true, value: result.data };
    }
    return { ok: false, error: result.error };
  }

  formatError(error: z.ZodError): string {
    return formatValidationError(error, this.name, this.fields);
  }
}

export function formatValidationError(
  error: z.ZodError,
  modelName: string,
  fields: Pick<FieldDescriptor, "name" | "alias">[] = []
): string {
  const aliasByName = new Map(fields.map((field) => [field.name, field.alias]));
  const count = error.issues.length;
  const lines = [`${count} validation error${count === 1 ? "" : "s"} for ${modelName}`];

  for (const issue of error.issues) {
    const [head, ...rest] = issue.path.map(String);
    const path =
      head === undefined ? modelName : [aliasByName.get(head) ?? head, ...rest].join(".");
    lines.push(path, `  ${issue.message}`);
  }

  return lines.join("\n");
}
