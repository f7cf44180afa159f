import { parseLiteralExpression } from "../lib/literal-expression.js";
import type {
  CollectionKind,
  EnumMember,
  FieldDescriptor,
  FieldValidator,
  LiteralValue,
  MappingKind,
  ScalarPrimitive,
} from "../parser/types.js";

export type Caster = (raw: string) => unknown;

const BOOLEAN_STRINGS: Record<string, boolean> = {
  true: true,
  false: false,
  "1": true,
  "0": false,
  yes: true,
  no: false,
  on: true,
  off: false,
};

/**
 * Strings are cast; anything else (defaults, flag constants, values already
 * typed by a sub-command) passes through. A failed cast hands the raw string
 * to the schema so it is reported alongside every other field error.
 */
export function asValidator(field: FieldDescriptor, caster: Caster): FieldValidator {
  return {
    field: field.name,
    name: validatorName(field.name),
    apply(value: unknown): unknown {
      if (typeof value !== "string") {
        return value;
      }
      if (value === "") {
        return field.absentValue;
      }
      return tryCast(caster, value);
    },
  };
}

export function asContainerValidator(
  field: FieldDescriptor,
  elementCaster: Caster,
  collection: CollectionKind = "array"
): FieldValidator {
  const single = asValidator(field, elementCaster);
  return {
    field: single.field,
    name: single.name,
    apply(value: unknown): unknown {
      if (!Array.isArray(value)) {
        return single.apply(value);
      }
      const items = value.map((item: unknown) =>
        typeof item === "string" ? tryCast(elementCaster, item) : item
      );
      return collection === "set" ? new Set(items) : items;
    },
  };
}

/** Dict literals become plain objects, or a `Map` when the schema wants one. */
export function asMappingValidator(field: FieldDescriptor, target: MappingKind): FieldValidator {
  const single = asValidator(field, mappingCaster);
  return {
    field: single.field,
    name: single.name,
    apply(value: unknown): unknown {
      const parsed = single.apply(value);
      if (target === "map" && isPlainRecord(parsed)) {
        return new Map(Object.entries(parsed));
      }
      return parsed;
    },
  };
}

export function validatorName(field: string): string {
  return `argparse:${field}`;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryCast(caster: Caster, raw: string): unknown {
  try {
    return caster(raw);
  } catch {
    return raw;
  }
}

export const identityCaster: Caster = (raw) => raw;

export function primitiveCaster(primitive: ScalarPrimitive): Caster {
  switch (primitive) {
    case "number":
      return (raw) => {
        const value = Number(raw);
        if (raw.trim() === "" || !Number.isFinite(value)) {
          throw new TypeError(`Not a number: ${raw}`);
        }
        return value;
      };
    case "bigint":
      return (raw) => BigInt(raw);
    case "date":
      return (raw) => {
        const value = new Date(raw);
        if (Number.isNaN(value.getTime())) {
          throw new TypeError(`Not a date: ${raw}`);
        }
        return value;
      };
    case "string":
    case "unknown":
      return identityCaster;
  }
}

export function literalCaster(choices: LiteralValue[]): Caster {
  const table = new Map(choices.map((choice) => [String(choice), choice]));
  return (raw) => {
    if (!table.has(raw)) {
      throw new RangeError(`Not a choice: ${raw}`);
    }
    return table.get(raw);
  };
}

export function enumCaster(members: EnumMember[]): Caster {
  const table = new Map(members.map((member) => [member.name, member.value]));
  return (raw) => {
    if (!table.has(raw)) {
      throw new RangeError(`Not a member: ${raw}`);
    }
    return table.get(raw);
  };
}

export const mappingCaster: Caster = (raw) => parseLiteralExpression(raw);

export const booleanCaster: Caster = (raw) => {
  const key = raw.trim().toLowerCase();
  if (!Object.hasOwn(BOOLEAN_STRINGS, key)) {
    throw new TypeError(`Not a boolean: ${raw}`);
  }
  return BOOLEAN_STRINGS[key];
};
