import type { EnumMember, FieldDescriptor, FieldValue } from "../parser/types.js";

export const ABSENT: FieldValue = { kind: "absent" };
export const USE_DEFAULT: FieldValue = { kind: "use-default" };

export function supplied(value: unknown): FieldValue {
  return { kind: "supplied", value };
}

/** `--<alias>` or `--no-<alias>`, with underscores spelled as hyphens. */
export function flagName(field: Pick<FieldDescriptor, "alias">, inverted = false): string {
  return `--${inverted ? "no-" : ""}${field.alias.replace(/_/g, "-")}`;
}

export function valueMetavar(field: Pick<FieldDescriptor, "alias">): string {
  return field.alias.replace(/-/g, "_").toUpperCase();
}

export function choicesMetavar(choices: string[]): string {
  return `{${choices.join(", ")}}`;
}

export function helpText(field: FieldDescriptor, members: EnumMember[] = []): string {
  const parts: string[] = [];
  if (field.description) {
    parts.push(field.description);
  }
  if (!field.required && field.defaultValue) {
    parts.push(`(default: ${renderDefault(field.defaultValue(), members)})`);
  }
  return parts.join(" ");
}

export function renderDefault(value: unknown, members: EnumMember[] = []): string {
  const member = members.find((candidate) => candidate.value === value);
  if (member) {
    return member.name;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Set || value instanceof Map) {
    return renderDefault([...value], members);
  }
  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value, (_key, item: unknown) =>
      typeof item === "bigint" ? item.toString() : item
    );
  }
  return String(value);
}

/** The stored default, or `undefined` for required fields and missing factories. */
export function defaultOf(field: FieldDescriptor): unknown {
  return field.required || !field.defaultValue ? undefined : field.defaultValue();
}

/** Optional fields with a concrete default that still accept an absent value get a `--no-` flag. */
export function takesInverseFlag(field: FieldDescriptor): boolean {
  const value = defaultOf(field);
  return !field.required && field.allowsAbsentValue && value !== null && value !== undefined;
}
