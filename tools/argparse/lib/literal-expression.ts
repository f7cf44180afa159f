import { LiteralSyntaxError } from "../parser/errors.js";

export type LiteralExpression =
  | null
  | boolean
  | number
  | string
  | LiteralExpression[]
  | { [key: string]: LiteralExpression };

const KEYWORDS: Record<string, LiteralExpression> = {
  True: true,
  False: false,
  None: null,
  true: true,
  false: false,
  null: null,
};

const MAX_DEPTH = 100;

const ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

/**
 * Parses a literal expression such as `{'retries': 3, "hosts": ["a", "b"]}`.
 * Accepts both dict-literal (single quotes, True/False/None, tuples, sets,
 * trailing commas) and JSON spellings. Sets and tuples become arrays; dict
 * keys are stringified.
 */
export function parseLiteralExpression(source: string): LiteralExpression {
  const reader = new LiteralReader(source);
  const value = reader.readValue();
  reader.skipWhitespace();
  if (!reader.done()) {
    throw new LiteralSyntaxError("Unexpected trailing input", reader.position);
  }
  return value;
}

class LiteralReader {
  public position = 0;
  private depth = 0;

  constructor(private readonly source: string) {}

  done(): boolean {
    return this.position >= this.source.length;
  }

  skipWhitespace(): void {
    while (!this.done() && /\s/.test(this.source[this.position])) {
      this.position += 1;
    }
  }

  readValue(): LiteralExpression {
    this.skipWhitespace();
    if (this.done()) {
      throw new LiteralSyntaxError("Unexpected end of input", this.position);
    }

    const char = this.source[this.position];
    if (char === "{") {
      return this.nested(() => this.readBraced());
    }
    if (char === "[") {
      return this.nested(() => this.readSequence("]"));
    }
    if (char === "(") {
      return this.nested(() => this.readParenthesized());
    }
    if (char === "'" || char === '"') {
      return this.readString(char);
    }
    if (/[-+0-9.]/.test(char)) {
      return this.readNumber();
    }
    if (/[A-Za-z_]/.test(char)) {
      return this.readKeyword();
    }
    throw new LiteralSyntaxError(`Unexpected character ${JSON.stringify(char)}`, this.position);
  }

  private nested(read: () => LiteralExpression): LiteralExpression {
    if (this.depth >= MAX_DEPTH) {
      throw new LiteralSyntaxError(`Nesting deeper than ${MAX_DEPTH} levels`, this.position);
    }
    this.depth += 1;
    try {
      return read();
    } finally {
      this.depth -= 1;
    }
  }

  private readBraced(): LiteralExpression {
    this.expect("{");
    this.skipWhitespace();
    if (this.consume("}")) {
      return {};
    }

    const first = this.readValue();
    this.skipWhitespace();
    if (!this.consume(":")) {
      return this.readSetRest(first);
    }

    const out: { [key: string]: LiteralExpression } = {};
    out[this.keyOf(first)] = this.readValue();
    while (this.readSeparator("}")) {
      const key = this.readValue();
      this.skipWhitespace();
      this.expect(":");
      out[this.keyOf(key)] = this.readValue();
    }
    return out;
  }

  private readSetRest(first: LiteralExpression): LiteralExpression[] {
    const items: LiteralExpression[] = [first];
    while (this.readSeparator("}")) {
      items.push(this.readValue());
    }
    const seen = new Set<string>();
    return items.filter((item) => {
      const key = JSON.stringify(item);
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }

  private readSequence(close: "]" | ")"): LiteralExpression[] {
    this.position += 1;
    this.skipWhitespace();
    const items: LiteralExpression[] = [];
    if (this.consume(close)) {
      return items;
    }
    items.push(this.readValue());
    while (this.readSeparator(close)) {
      items.push(this.readValue());
    }
    return items;
  }

  private readParenthesized(): LiteralExpression {
    const start = this.position;
    this.expect("(");
    this.skipWhitespace();
    if (this.consume(")")) {
      return [];
    }
    const first = this.readValue();
    this.skipWhitespace();
    if (this.consume(")")) {
      return first;
    }
    this.position = start;
    return this.readSequence(")");
  }

  /**
   * After an item: returns true when another item follows, false once the
   * closing bracket (optionally preceded by a trailing comma) is consumed.
   */
  private readSeparator(close: string): boolean {
    this.skipWhitespace();
    if (this.consume(close)) {
      return false;
    }
    this.expect(",");
    this.skipWhitespace();
    return !this.consume(close);
  }

  private readString(quote: string): string {
    this.position += 1;
    let out = "";
    while (!this.done()) {
      const char = this.source[this.position];
      if (char === quote) {
        this.position += 1;
        return out;
      }
      if (char === "\\") {
        out += this.readEscape();
        continue;
      }
      out += char;
      this.position += 1;
    }
    throw new LiteralSyntaxError("Unterminated string", this.position);
  }

  private readEscape(): string {
    const next = this.source[this.position + 1];
    if (next === undefined) {
      throw new LiteralSyntaxError("Unterminated escape", this.position);
    }
    if (next === "u" || next === "x") {
      const width = next === "u" ? 4 : 2;
      const hex = this.source.slice(this.position + 2, this.position + 2 + width);
      if (!new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) {
        throw new LiteralSyntaxError("Invalid escape sequence", this.position);
      }
      this.position += 2 + width;
      return String.fromCharCode(Number.parseInt(hex, 16));
    }
    this.position += 2;
    return ESCAPES[next] ?? `\\${next}`;
  }

  private readNumber(): number {
    const match = /^[-+]?(?:0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*)?\.?\d[\d_]*(?:[eE][-+]?\d+)?)/.exec(
      this.source.slice(this.position)
    );
    if (!match) {
      throw new LiteralSyntaxError("Invalid number", this.position);
    }
    const text = match[0].replace(/_/g, "");
    const sign = text.startsWith("-") ? -1 : 1;
    const unsigned = text.replace(/^[-+]/, "");
    const value = /^0[xXoObB]/.test(unsigned) ? sign * Number(unsigned) : Number(text);
    if (!Number.isFinite(value)) {
      throw new LiteralSyntaxError("Invalid number", this.position);
    }
    this.position += match[0].length;
    return value;
  }

  private readKeyword(): LiteralExpression {
    const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(this.source.slice(this.position));
    const word = match ? match[0] : "";
    if (!Object.hasOwn(KEYWORDS, word)) {
      throw new LiteralSyntaxError(`Unknown name ${JSON.stringify(word)}`, this.position);
    }
    this.position += word.length;
    return KEYWORDS[word];
  }

  private keyOf(value: LiteralExpression): string {
    if (typeof value === "object" && value !== null) {
      throw new LiteralSyntaxError("Unhashable mapping key", this.position);
    }
    return String(value);
  }

  private consume(char: string): boolean {
    if (this.source[this.position] === char) {
      this.position += 1;
      return true;
    }
    return false;
  }

  private expect(char: string): void {
    this.skipWhitespace();
    if (!this.consume(char)) {
      throw new LiteralSyntaxError(`Expected ${JSON.stringify(char)}`, this.position);
    }
  }
}
