/**
 * JSON text codec that keeps object key order as written. Plain JS objects
 * move integer-like keys ("10") ahead of the others, so parsed objects come
 * back as `Map`s and `Map`s are written entry by entry.
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | Map<string, JsonValue>
  | { readonly [key: string]: JsonValue };

export type ParsedJson = null | boolean | number | string | ParsedJson[] | Map<string, ParsedJson>;

const NUMBER_PATTERN = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const STRING_PATTERN = /"(?:[^"\\\x00-\x1f]|\\(?:["\\/bfnrt]|u[0-9a-fA-F]{4}))*"/y;

/**
 * Same layout as `JSON.stringify(value, null, indent)`.
 */
export function stringifyJson(value: JsonValue, indent = 2): string {
  return writeValue(value, '', ' '.repeat(indent));
}

function writeValue(value: JsonValue, current: string, step: string): string {
  if (value instanceof Map) {
    return writeEntries([...value], current, step);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return '[]';
    const inner = current + step;
    const items = value.map(item => inner + writeValue(item, inner, step));
    return `[\n${items.join(',\n')}\n${current}]`;
  }
  if (typeof value === 'object' && value !== null) {
    return writeEntries(Object.entries(value), current, step);
  }
  return JSON.stringify(value);
}

function writeEntries(entries: Array<[string, JsonValue]>, current: string, step: string): string {
  if (entries.length === 0) return '{}';
  const inner = current + step;
  const body = entries.map(([key, item]) => `${inner}${JSON.stringify(key)}: ${writeValue(item, inner, step)}`);
  return `{\n${body.join(',\n')}\n${current}}`;
}

export function parseJson(text: string): ParsedJson {
  const reader = new JsonReader(text);
  const value = reader.readValue();
  reader.skipWhitespace();
  if (!reader.atEnd()) {
    throw reader.error('Unexpected content after JSON value');
  }
  return value;
}

class JsonReader {
  private readonly text: string;
  private pos = 0;

  constructor(text: string) {
    this.text = text;
  }

  atEnd(): boolean {
    return this.pos >= this.text.length;
  }

  error(message: string): SyntaxError {
    return new SyntaxError(`${message} at position ${this.pos}`);
  }

  skipWhitespace(): void {
    while (/[ \t\n\r]/.test(this.text.charAt(this.pos))) {
      this.pos++;
    }
  }

  readValue(): ParsedJson {
    this.skipWhitespace();
    switch (this.text.charAt(this.pos)) {
      case '{':
        return this.readObject();
      case '[':
        return this.readArray();
      case '"':
        return this.readString();
      case 't':
        return this.readLiteral('true', true);
      case 'f':
        return this.readLiteral('false', false);
      case 'n':
        return this.readLiteral('null', null);
      default:
        return this.readNumber();
    }
  }

  private readObject(): Map<string, ParsedJson> {
    const entries = new Map<string, ParsedJson>();
    this.pos++;
    this.skipWhitespace();
    if (this.text.charAt(this.pos) === '}') {
      this.pos++;
      return entries;
    }

    for (;;) {
      this.skipWhitespace();
      if (this.text.charAt(this.pos) !== '"') throw this.error('Expected property name');
      const key = this.readString();
      this.skipWhitespace();
      this.expect(':');
      entries.set(key, this.readValue());
      this.skipWhitespace();
      if (this.text.charAt(this.pos) === '}') {
        this.pos++;
        return entries;
      }
      this.expect(',');
    }
  }

  private readArray(): ParsedJson[] {
    const items: ParsedJson[] = [];
    this.pos++;
    this.skipWhitespace();
    if (this.text.charAt(this.pos) === ']') {
      this.pos++;
      return items;
    }

    for (;;) {
      items.push(this.readValue());
      this.skipWhitespace();
      if (this.text.charAt(this.pos) === ']') {
        this.pos++;
        return items;
      }
      this.expect(',');
    }
  }

  private readString(): string {
    const token = this.match(STRING_PATTERN, 'Unterminated or invalid string');
    const value: unknown = JSON.parse(token);
    if (typeof value !== 'string') throw this.error('Invalid string');
    return value;
  }

  private readNumber(): number {
    return Number(this.match(NUMBER_PATTERN, 'Unexpected token'));
  }

  private readLiteral<T extends boolean | null>(word: string, value: T): T {
    if (!this.text.startsWith(word, this.pos)) throw this.error('Unexpected token');
    this.pos += word.length;
    return value;
  }

  private match(pattern: RegExp, message: string): string {
    pattern.lastIndex = this.pos;
    const found = pattern.exec(this.text);
    if (!found) throw this.error(message);
    this.pos = pattern.lastIndex;
    return found[0];
  }

  private expect(char: string): void {
    if (this.text.charAt(this.pos) !== char) throw this.error(`Expected '${char}'`);
    this.pos++;
  }
}
