import { z } from "zod";
import { SchemaDefinitionError } from "../parser/errors.js";
import type {
  EnumMember,
  FieldDescriptor,
  LiteralValue,
  ScalarPrimitive,
  TypeNode,
} from "../parser/types.js";

export interface ArgMetadata {
  alias?: string;
  description?: string;
}

const argMetadata = new WeakMap<z.ZodTypeAny, ArgMetadata>();

/**
 * Attaches command-line metadata to a field schema. The metadata is keyed by
 * the schema instance, so call `arg()` last, after `.describe()`, `.default()`
 * and friends.
 */
export function arg<T extends z.ZodTypeAny>(schema: T, metadata: ArgMetadata): T {
  argMetadata.set(schema, { ...argMetadata.get(schema), ...metadata });
  return schema;
}

interface WalkState {
  acceptsNull: boolean;
  acceptsUndefined: boolean;
}

export function describeField(name: string, schema: z.ZodTypeAny): FieldDescriptor {
  const state: WalkState = { acceptsNull: false, acceptsUndefined: false };
  const branches = collectBranches(schema, state);
  if (branches.length === 0) {
    throw new SchemaDefinitionError(
      `Field "${name}" has no concrete type once null/undefined branches are removed`
    );
  }

  const metadata = argMetadata.get(schema) ?? {};
  const required = !schema.isOptional();

  return {
    name,
    alias: metadata.alias ?? name.replace(/_/g, "-"),
    schema,
    branches,
    required,
    defaultValue: required ? undefined : () => defaultOf(schema),
    description: metadata.description ?? schema.description,
    allowsAbsentValue: state.acceptsNull || state.acceptsUndefined,
    absentValue: state.acceptsNull ? null : undefined,
  };
}

/**
 * The object whose keys become arguments. Refinements and pipelines around it
 * are looked through here and still applied when the result is validated.
 */
export function modelObject(model: z.ZodTypeAny): z.AnyZodObject {
  if (model instanceof z.ZodObject) {
    return model;
  }
  if (model instanceof z.ZodEffects) {
    return modelObject(model.innerType());
  }
  if (model instanceof z.ZodPipeline) {
    return modelObject(model._def.in);
  }
  throw new SchemaDefinitionError("Argument model must be a zod object schema");
}

export function describeModel(model: z.ZodTypeAny): FieldDescriptor[] {
  const shape: z.ZodRawShape = modelObject(model).shape;
  return Object.entries(shape).map(([name, schema]) => describeField(name, schema));
}

function defaultOf(schema: z.ZodTypeAny): unknown {
  const result = schema.safeParse(undefined);
  return result.success ? result.data : undefined;
}

function collectBranches(schema: z.ZodTypeAny, state: WalkState): TypeNode[] {
  if (schema instanceof z.ZodOptional) {
    state.acceptsUndefined = true;
    return collectBranches(schema.unwrap(), state);
  }
  if (schema instanceof z.ZodNullable) {
    state.acceptsNull = true;
    return collectBranches(schema.unwrap(), state);
  }
  if (schema instanceof z.ZodDefault) {
    return collectBranches(schema.removeDefault(), state);
  }
  if (schema instanceof z.ZodCatch) {
    return collectBranches(schema.removeCatch(), state);
  }
  if (schema instanceof z.ZodEffects) {
    return collectBranches(schema.innerType(), state);
  }
  if (schema instanceof z.ZodBranded) {
    return collectBranches(schema.unwrap(), state);
  }
  if (schema instanceof z.ZodReadonly) {
    return collectBranches(schema._def.innerType, state);
  }
  if (schema instanceof z.ZodPipeline) {
    return collectBranches(schema._def.in, state);
  }
  if (schema instanceof z.ZodLazy) {
    return collectBranches(schema.schema, state);
  }
  if (schema instanceof z.ZodUnion || schema instanceof z.ZodDiscriminatedUnion) {
    const options: z.ZodTypeAny[] = [...schema.options];
    return options.flatMap((option) => collectBranches(option, state));
  }
  if (schema instanceof z.ZodNull) {
    state.acceptsNull = true;
    return [];
  }
  if (schema instanceof z.ZodUndefined || schema instanceof z.ZodVoid) {
    state.acceptsUndefined = true;
    return [];
  }
  if (schema instanceof z.ZodLiteral) {
    const value: unknown = schema.value;
    if (value === null) {
      state.acceptsNull = true;
      return [];
    }
    if (value === undefined) {
      state.acceptsUndefined = true;
      return [];
    }
    return isLiteralValue(value) ? [{ kind: "literal", values: [value] }] : [scalar("unknown")];
  }
  return [describeConcrete(schema)];
}

function describeConcrete(schema: z.ZodTypeAny): TypeNode {
  if (schema instanceof z.ZodObject) {
    return { kind: "object", schema };
  }
  if (schema instanceof z.ZodEnum) {
    const options: string[] = [...schema.options];
    return { kind: "literal", values: options };
  }
  if (schema instanceof z.ZodNativeEnum) {
    return { kind: "enum", members: enumMembers(schema.enum) };
  }
  if (schema instanceof z.ZodBoolean) {
    return { kind: "boolean" };
  }
  if (schema instanceof z.ZodArray) {
    return { kind: "collection", collection: "array", element: elementNode(schema.element) };
  }
  if (schema instanceof z.ZodSet) {
    return { kind: "collection", collection: "set", element: elementNode(schema._def.valueType) };
  }
  if (schema instanceof z.ZodTuple) {
    const items: z.ZodTypeAny[] = [...schema.items];
    const first = items[0] ?? schema._def.rest;
    return {
      kind: "collection",
      collection: "tuple",
      element: first ? elementNode(first) : scalar("unknown"),
    };
  }
  if (schema instanceof z.ZodRecord) {
    return { kind: "record", target: "record" };
  }
  if (schema instanceof z.ZodMap) {
    return { kind: "record", target: "map" };
  }
  if (schema instanceof z.ZodString) {
    return scalar("string");
  }
  if (schema instanceof z.ZodNumber) {
    return scalar("number");
  }
  if (schema instanceof z.ZodBigInt) {
    return scalar("bigint");
  }
  if (schema instanceof z.ZodDate) {
    return scalar("date");
  }
  return scalar("unknown");
}

function elementNode(schema: z.ZodTypeAny): TypeNode {
  const branches = collectBranches(schema, { acceptsNull: false, acceptsUndefined: false });
  return branches[0] ?? scalar("unknown");
}

function scalar(primitive: ScalarPrimitive): TypeNode {
  return { kind: "scalar", primitive };
}

/**
 * Numeric TypeScript enums carry a reverse mapping (`{ A: 0, "0": "A" }`);
 * those reverse keys are not members.
 */
export function enumMembers(enumObject: Record<string, string | number>): EnumMember[] {
  return Object.keys(enumObject)
    .filter((key) => typeof enumObject[enumObject[key]] !== "number")
    .map((name) => ({ name, value: enumObject[name] }));
}

function isLiteralValue(value: unknown): value is LiteralValue {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean"
  );
}
