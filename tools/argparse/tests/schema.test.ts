import { describe, expect, test } from "vitest";
import { z } from "zod";
import { SchemaDefinitionError } from "../parser/errors.js";
import { classifyField } from "../schema/classify.js";
import { arg, describeField, describeModel, enumMembers, modelObject } from "../schema/descriptor.js";

enum Shade {
  Light = 1,
  Dark = 2,
}

enum Mode {
  Fast = "fast",
  Thorough = "thorough",
}

function classify(schema: z.ZodTypeAny) {
  return classifyField(describeField("field", schema));
}

describe("field descriptors", () => {
  test("required fields have no default", () => {
    const field = describeField("name", z.string());
    expect(field.required).toBe(true);
    expect(field.defaultValue).toBeUndefined();
    expect(field.alias).toBe("name");
    expect(field.allowsAbsentValue).toBe(false);
  });

  test("defaults come from the schema", () => {
    const field = describeField("count", z.number().default(3));
    expect(field.required).toBe(false);
    expect(field.defaultValue?.()).toBe(3);
  });

  test("nullable fields store null for absent values", () => {
    const field = describeField("proxy", z.string().nullable().default("socks"));
    expect(field.allowsAbsentValue).toBe(true);
    expect(field.absentValue).toBeNull();
  });

  test("optional fields store undefined for absent values", () => {
    const field = describeField("proxy", z.string().optional());
    expect(field.required).toBe(false);
    expect(field.allowsAbsentValue).toBe(true);
    expect(field.absentValue).toBeUndefined();
  });

  test("union null branches are dropped", () => {
    const field = describeField("value", z.union([z.number(), z.null()]));
    expect(field.branches).toEqual([{ kind: "scalar", primitive: "number" }]);
    expect(field.absentValue).toBeNull();
  });

  test("default aliases turn underscores into hyphens", () => {
    expect(describeField("dry_run", z.boolean()).alias).toBe("dry-run");
  });

  test("arg() sets alias and description", () => {
    const field = describeField(
      "maxRetries",
      arg(z.number().describe("ignored"), { alias: "max_retries", description: "retry budget" })
    );
    expect(field.alias).toBe("max_retries");
    expect(field.description).toBe("retry budget");
  });

  test("describe() text is the description when arg() gives none", () => {
    expect(describeField("name", z.string().describe("your name")).description).toBe("your name");
  });

  test("a field with only null branches is rejected", () => {
    expect(() => describeField("nothing", z.null())).toThrow(SchemaDefinitionError);
  });

  test("models may be wrapped in refinements", () => {
    const model = z.object({ a: z.string(), b: z.number() }).refine((value) => value.a !== "");
    expect(describeModel(model).map((field) => field.name)).toEqual(["a", "b"]);
    expect(() => modelObject(z.string())).toThrow("Argument model must be a zod object schema");
  });

  test("numeric enums drop their reverse mapping", () => {
    expect(enumMembers(Shade)).toEqual([
      { name: "Light", value: 1 },
      { name: "Dark", value: 2 },
    ]);
  });
});

describe("classification", () => {
  test("objects are nested commands", () => {
    expect(classify(z.object({ x: z.string() }).optional()).kind).toBe("nested-command");
  });

  test("z.enum and literals are literal sets", () => {
    expect(classify(z.enum(["red", "green"]))).toEqual({
      kind: "literal-set",
      choices: ["red", "green"],
    });
    expect(classify(z.union([z.literal("a"), z.literal(2)]))).toEqual({
      kind: "literal-set",
      choices: ["a", 2],
    });
  });

  test("literal sets win over booleans", () => {
    expect(classify(z.union([z.literal("auto"), z.boolean()])).kind).toBe("literal-set");
  });

  test("booleans", () => {
    expect(classify(z.boolean().default(false))).toEqual({ kind: "boolean" });
  });

  test("containers carry their element primitive", () => {
    expect(classify(z.array(z.number()))).toEqual({
      kind: "container",
      collection: "array",
      element: "number",
    });
    expect(classify(z.set(z.string()))).toEqual({
      kind: "container",
      collection: "set",
      element: "string",
    });
    expect(classify(z.tuple([z.date(), z.date()]))).toEqual({
      kind: "container",
      collection: "tuple",
      element: "date",
    });
  });

  test("records and maps are mappings", () => {
    expect(classify(z.record(z.number()))).toEqual({ kind: "mapping", target: "record" });
    expect(classify(z.map(z.string(), z.number()))).toEqual({ kind: "mapping", target: "map" });
  });

  test("containers win over mappings", () => {
    expect(classify(z.union([z.record(z.string()), z.array(z.string())])).kind).toBe("container");
  });

  test("native enums are enumerations", () => {
    expect(classify(z.nativeEnum(Mode))).toEqual({
      kind: "enumeration",
      members: [
        { name: "Fast", value: "fast" },
        { name: "Thorough", value: "thorough" },
      ],
    });
  });

  test("everything else is a scalar", () => {
    expect(classify(z.string())).toEqual({ kind: "scalar", primitive: "string" });
    expect(classify(z.coerce.bigint())).toEqual({ kind: "scalar", primitive: "bigint" });
    expect(classify(z.string().transform((value) => value.length))).toEqual({
      kind: "scalar",
      primitive: "string",
    });
    expect(classify(z.unknown())).toEqual({ kind: "scalar", primitive: "unknown" });
  });
});
