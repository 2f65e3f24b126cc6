import type { Decoded, LiteralValue, ParameterSet, RawSection } from "../types/report.js";

export class LiteralSyntaxError extends Error {
  constructor(
    message: string,
    readonly offset: number,
  ) {
    super(`${message} at offset ${offset}`);
    this.name = "LiteralSyntaxError";
  }
}

const NUMBER = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const WORD = /[A-Za-z_]\w*/y;
const KEYWORDS = new Map<string, LiteralValue>([
  ["True", true],
  ["true", true],
  ["False", false],
  ["false", false],
  ["None", null],
  ["null", null],
]);
const ESCAPES = new Map([
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["b", "\b"],
  ["f", "\f"],
  ["0", "\0"],
]);

/**
 * Recursive-descent parser for the literal subset hyperopt prints:
 * `{ "key": value, ... }` blocks, `[...]`/`(...)` lists, quoted strings,
 * numbers, True/False/None. Trailing commas and `#` comments are allowed.
 * Nothing is ever evaluated.
 */
class LiteralParser {
  private pos = 0;

  constructor(private readonly src: string) {}

  parseDocument(): LiteralValue {
    const value = this.parseValue();
    this.skipTrivia();
    if (this.pos < this.src.length) this.fail(`Unexpected "${this.src[this.pos]}"`);
    return value;
  }

  private fail(message: string): never {
    throw new LiteralSyntaxError(message, this.pos);
  }

  private skipTrivia(): void {
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos];
      if (ch === "#") {
        const eol = this.src.indexOf("\n", this.pos);
        this.pos = eol === -1 ? this.src.length : eol + 1;
      } else if (/\s/.test(ch)) {
        this.pos++;
      } else {
        return;
      }
    }
  }

  private parseValue(): LiteralValue {
    this.skipTrivia();
    const ch = this.src[this.pos];
    if (ch === undefined) this.fail("Unexpected end of input");
    if (ch === "{") return this.parseBlock();
    if (ch === "[") return this.parseList("]");
    if (ch === "(") return this.parseList(")");
    if (ch === '"' || ch === "'") return this.parseString();

    NUMBER.lastIndex = this.pos;
    const num = NUMBER.exec(this.src);
    if (num) {
      this.pos += num[0].length;
      return Number(num[0]);
    }

    WORD.lastIndex = this.pos;
    const word = WORD.exec(this.src);
    const keyword = word ? KEYWORDS.get(word[0]) : undefined;
    if (word && keyword !== undefined) {
      this.pos += word[0].length;
      return keyword;
    }
    return this.fail(`Unexpected "${word ? word[0] : ch}"`);
  }

  private parseString(): string {
    const quote = this.src[this.pos++];
    let out = "";
    while (this.pos < this.src.length) {
      const ch = this.src[this.pos++];
      if (ch === quote) return out;
      if (ch === "\n") break;
      if (ch !== "\\") {
        out += ch;
        continue;
      }
      const esc = this.src[this.pos++];
      if (esc === "u") {
        const hex = this.src.slice(this.pos, this.pos + 4);
        if (!/^[0-9a-fA-F]{4}$/.test(hex)) this.fail("Bad unicode escape");
        out += String.fromCharCode(parseInt(hex, 16));
        this.pos += 4;
      } else {
        out += ESCAPES.get(esc) ?? esc;
      }
    }
    return this.fail("Unterminated string");
  }

  private parseList(close: "]" | ")"): LiteralValue[] {
    this.pos++;
    const items: LiteralValue[] = [];
    for (;;) {
      this.skipTrivia();
      if (this.src[this.pos] === close) {
        this.pos++;
        return items;
      }
      items.push(this.parseValue());
      this.skipTrivia();
      if (this.src[this.pos] === ",") this.pos++;
      else if (this.src[this.pos] !== close) this.fail(`Expected "," or "${close}"`);
    }
  }

  private parseBlock(): { [key: string]: LiteralValue } {
    this.pos++;
    const entries: [string, LiteralValue][] = [];
    for (;;) {
      this.skipTrivia();
      const ch = this.src[this.pos];
      if (ch === "}") {
        this.pos++;
        return Object.fromEntries(entries);
      }
      if (ch !== '"' && ch !== "'") this.fail("Expected a quoted key");
      const key = this.parseString();
      this.skipTrivia();
      if (this.src[this.pos] !== ":") this.fail('Expected ":"');
      this.pos++;
      entries.push([key, this.parseValue()]);
      this.skipTrivia();
      if (this.src[this.pos] === ",") this.pos++;
      else if (this.src[this.pos] !== "}") this.fail('Expected "," or "}"');
    }
  }
}

export function parseLiteral(src: string): LiteralValue {
  return new LiteralParser(src).parseDocument();
}

function isBlock(value: LiteralValue): value is { [key: string]: LiteralValue } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decodes the quoted-key lines of a parameter block into a ParameterSet with
 * lowercase keys. A block that does not parse yields `{}` and a warning.
 */
export function decodeParameterBlock(
  lines: RawSection,
  label = "parameter block",
): Decoded<ParameterSet> {
  if (!lines.length) return { value: {}, warnings: [] };

  try {
    const parsed = parseLiteral(`{\n${lines.join("\n")}\n}`);
    if (!isBlock(parsed)) {
      return { value: {}, warnings: [`${label}: expected a key/value block`] };
    }
    const value = Object.fromEntries(
      Object.entries(parsed).map(([k, v]) => [k.toLowerCase(), v]),
    );
    return { value, warnings: [] };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { value: {}, warnings: [`${label}: could not parse (${reason})`] };
  }
}

export function formatLiteral(value: LiteralValue): string {
  if (value === null) return "None";
  if (typeof value === "boolean") return value ? "True" : "False";
  if (typeof value === "number") return String(value);
  if (typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(formatLiteral).join(", ")}]`;
  const body = Object.entries(value)
    .map(([k, v]) => `${JSON.stringify(k)}: ${formatLiteral(v)}`)
    .join(", ");
  return `{${body}}`;
}

/** Inverse of decodeParameterBlock: one `"key": value,` line per entry. */
export function formatParameterBlock(params: ParameterSet): string[] {
  return Object.entries(params).map(([k, v]) => `    ${JSON.stringify(k)}: ${formatLiteral(v)},`);
}
