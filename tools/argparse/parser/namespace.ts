import type { FieldValue } from "./types.js";

/**
 * Parsed values keyed by destination. A missing key means the user said
 * nothing and the schema default applies.
 */
export class Namespace {
  private readonly values = new Map<string, FieldValue>();

  set(dest: string, value: FieldValue): void {
    this.values.set(dest, value);
  }

  get(dest: string): FieldValue {
    return this.values.get(dest) ?? { kind: "use-default" };
  }

  has(dest: string): boolean {
    return this.get(dest).kind !== "use-default";
  }

  keys(): string[] {
    return [...this.values.keys()].filter((dest) => this.has(dest));
  }

  /**
   * Supplied values are copied as-is; absent ones become whatever
   * `absentValue` says the field stores for "no value".
   */
  toRecord(absentValue: (dest: string) => unknown = () => undefined): Record<string, unknown> {
    const record: Record<string, unknown> = {};
    for (const [dest, value] of this.values) {
      if (value.kind === "supplied") {
        record[dest] = value.value;
      } else if (value.kind === "absent") {
        record[dest] = absentValue(dest);
      }
    }
    return record;
  }
}
