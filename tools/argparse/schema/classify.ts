import type { Classification, FieldDescriptor, LiteralValue, ScalarPrimitive, TypeNode } from "../parser/types.js";

/**
 * Precedence is fixed: nested command, literal set, boolean, container,
 * mapping, enumeration, scalar. Each test looks at every branch.
 */
export function classifyField(field: Pick<FieldDescriptor, "branches">): Classification {
  const { branches } = field;

  const object = branches.find(isKind("object"));
  if (object) {
    return { kind: "nested-command", schema: object.schema };
  }

  const literals = branches.filter(isKind("literal"));
  if (literals.length > 0) {
    const choices: LiteralValue[] = literals.flatMap((branch) => branch.values);
    return { kind: "literal-set", choices };
  }

  if (branches.some(isKind("boolean"))) {
    return { kind: "boolean" };
  }

  const collection = branches.find(isKind("collection"));
  if (collection) {
    return {
      kind: "container",
      collection: collection.collection,
      element: primitiveOf(collection.element),
    };
  }

  const mapping = branches.find(isKind("record"));
  if (mapping) {
    return { kind: "mapping", target: mapping.target };
  }

  const enumeration = branches.find(isKind("enum"));
  if (enumeration) {
    return { kind: "enumeration", members: enumeration.members };
  }

  const scalar = branches.find(isKind("scalar"));
  return { kind: "scalar", primitive: scalar ? scalar.primitive : "unknown" };
}

function primitiveOf(node: TypeNode): ScalarPrimitive {
  return node.kind === "scalar" ? node.primitive : "unknown";
}

function isKind<K extends TypeNode["kind"]>(kind: K) {
  return (node: TypeNode): node is Extract<TypeNode, { kind: K }> => node.kind === kind;
}
