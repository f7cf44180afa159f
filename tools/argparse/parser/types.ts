import type { z } from "zod";

export type LiteralValue = string | number | bigint | boolean;
export type ScalarPrimitive = "string" | "number" | "bigint" | "date" | "unknown";
export type CollectionKind = "array" | "set" | "tuple";
export type MappingKind = "record" | "map";

export interface EnumMember {
  name: string;
  value: string | number;
}

export type TypeNode =
  | { kind: "object"; schema: z.AnyZodObject }
  | { kind: "literal"; values: LiteralValue[] }
  | { kind: "boolean" }
  | { kind: "collection"; collection: CollectionKind; element: TypeNode }
  | { kind: "record"; target: MappingKind }
  | { kind: "enum"; members: EnumMember[] }
  | { kind: "scalar"; primitive: ScalarPrimitive };

export interface FieldDescriptor {
  name: string;
  alias: string;
  schema: z.ZodTypeAny;
  branches: TypeNode[];
  required: boolean;
  defaultValue?: () => unknown;
  description?: string;
  allowsAbsentValue: boolean;
  absentValue: null | undefined;
}

export type Classification =
  | { kind: "boolean" }
  | { kind: "enumeration"; members: EnumMember[] }
  | { kind: "literal-set"; choices: LiteralValue[] }
  | { kind: "container"; collection: CollectionKind; element: ScalarPrimitive }
  | { kind: "mapping"; target: MappingKind }
  | { kind: "nested-command"; schema: z.AnyZodObject }
  | { kind: "scalar"; primitive: ScalarPrimitive };

export type FieldValue =
  | { kind: "supplied"; value: unknown }
  | { kind: "absent" }
  | { kind: "use-default" };

export type Arity = "none" | "single" | "one-or-more";
export type ArgumentGroupName = "required" | "optional";

export interface FlagSpec {
  name: string;
  constant?: FieldValue;
}

export interface ArgumentSpec {
  dest: string;
  flags: FlagSpec[];
  arity: Arity;
  metavar?: string;
  help: string;
  required: boolean;
  group: ArgumentGroupName;
}

export interface FieldValidator {
  field: string;
  name: string;
  apply(value: unknown): unknown;
}

export interface ParserIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  exit: (status: number) => never;
}

export interface EnvSourceOptions {
  prefix: string;
  source?: Record<string, string | undefined>;
}

export interface ArgumentRegistry {
  addArgument(spec: ArgumentSpec): void;
  addCommand(name: string, options: { help?: string; model: z.AnyZodObject }): void;
}

export interface ArgumentParserOptions<T> {
  model: z.ZodType<T, z.ZodTypeDef, unknown>;
  name?: string;
  prog?: string;
  description?: string;
  version?: string;
  epilog?: string;
  addHelp?: boolean;
  exitOnError?: boolean;
  env?: EnvSourceOptions;
  io?: ParserIO;
}

export type ParserState = "uninitialized" | "groups-created" | "fields-registered" | "finalized";
