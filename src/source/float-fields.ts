/**
 * Finds the group fields whose value is written as a TOML float.
 *
 * The parsed document holds `30.0` and `30` as the same number, so integer
 * lookups need the lexical type. Only fields of top-level tables are
 * reported: a field set under `[group]`, as `group.field = ...` at the root,
 * or inside a root inline table `group = { field = ... }`. A field counts when
 * its value is a float literal or an array holding one.
 *
 * The text must already have parsed as TOML; the scanner does not validate.
 *
 * @packageDocumentation
 */

const FLOAT_SHAPE = /^[+-]?(?:inf|nan|[\d_]+(?:\.[\d_]+)?(?:[eE][+-]?[\d_]+)?)$/;
const FLOAT_MARKER = /inf|nan|[.eE]/;
const LOCAL_DATE = /^\d{4}-\d{2}-\d{2}$/;
const DIGIT = /\d/;
const BARE_KEY_CHAR = /[A-Za-z0-9_-]/;
const SCALAR_END = new Set([' ', '\t', '\n', '\r', ',', ']', '}', '#']);

const ESCAPES: Readonly<Record<string, string>> = {
  b: '\b',
  t: '\t',
  n: '\n',
  f: '\f',
  r: '\r',
  e: '\u001b',
  '"': '"',
  '\\': '\\',
};

/**
 * Key of a group field in the set returned by {@link findFloatFields}.
 */
export function floatFieldKey(group: string, field: string): string {
  return `${group}\u0000${field}`;
}

/**
 * Whether a bare value token is a float literal (`1.0`, `5e3`, `-inf`, `nan`).
 */
export function isFloatLiteral(token: string): boolean {
  return FLOAT_SHAPE.test(token) && FLOAT_MARKER.test(token);
}

class FloatFieldScanner {
  private readonly text: string;
  private index = 0;
  /** Current table path; undefined inside an array of tables. */
  private table: readonly string[] | undefined = [];
  private readonly found = new Set<string>();

  constructor(text: string) {
    this.text = text;
  }

  scan(): Set<string> {
    for (;;) {
      this.skipTrivia(true);
      if (this.atEnd()) {
        return this.found;
      }
      const start = this.index;
      if (this.peek() === '[') {
        this.readHeader();
      } else {
        this.readKeyValue();
      }
      if (this.index === start) {
        this.index++;
      }
    }
  }

  private atEnd(): boolean {
    return this.index >= this.text.length;
  }

  private peek(offset = 0): string {
    return this.text.charAt(this.index + offset);
  }

  private startsWith(token: string): boolean {
    return this.text.startsWith(token, this.index);
  }

  /** Skips blanks and comments, and line breaks when `newlines` is set. */
  private skipTrivia(newlines: boolean): void {
    while (!this.atEnd()) {
      const ch = this.peek();
      if (ch === ' ' || ch === '\t' || (newlines && (ch === '\n' || ch === '\r'))) {
        this.index++;
      } else if (ch === '#') {
        while (!this.atEnd() && this.peek() !== '\n') {
          this.index++;
        }
      } else {
        return;
      }
    }
  }

  private readHeader(): void {
    const arrayOfTables = this.startsWith('[[');
    this.index += arrayOfTables ? 2 : 1;
    const path = this.readKeyPath();
    this.index += arrayOfTables ? 2 : 1;
    this.table = arrayOfTables ? undefined : path;
  }

  private readKeyValue(): void {
    const key = this.readKeyPath();
    if (this.peek() === '=') {
      this.index++;
    }
    this.skipTrivia(false);
    const path = this.table === undefined ? undefined : [...this.table, ...key];
    if (this.readValue(path)) {
      this.record(path);
    }
  }

  private readKeyPath(): string[] {
    const path: string[] = [];
    for (;;) {
      this.skipTrivia(false);
      path.push(this.readKey());
      this.skipTrivia(false);
      if (this.peek() !== '.') {
        return path;
      }
      this.index++;
    }
  }

  private readKey(): string {
    const ch = this.peek();
    if (ch === '"' || ch === "'") {
      return this.readString();
    }
    const start = this.index;
    while (BARE_KEY_CHAR.test(this.peek())) {
      this.index++;
    }
    return this.text.slice(start, this.index);
  }

  /**
   * Reads a value and returns whether it is a float or an array holding one.
   * Members of an inline table are recorded under `path`.
   */
  private readValue(path: readonly string[] | undefined): boolean {
    const ch = this.peek();
    if (ch === '"' || ch === "'") {
      this.readString();
      return false;
    }
    if (ch === '[') {
      return this.readArray();
    }
    if (ch === '{') {
      this.readInlineTable(path);
      return false;
    }
    const token = this.readScalar();
    if (token.length === 0 && !this.atEnd()) {
      this.index++;
    }
    return isFloatLiteral(token);
  }

  private readArray(): boolean {
    this.index++;
    let holdsFloat = false;
    for (;;) {
      this.skipTrivia(true);
      if (this.atEnd() || this.peek() === ']') {
        this.index++;
        return holdsFloat;
      }
      if (this.peek() === ',') {
        this.index++;
        continue;
      }
      if (this.readValue(undefined)) {
        holdsFloat = true;
      }
    }
  }

  private readInlineTable(path: readonly string[] | undefined): void {
    this.index++;
    for (;;) {
      this.skipTrivia(true);
      if (this.atEnd() || this.peek() === '}') {
        this.index++;
        return;
      }
      if (this.peek() === ',') {
        this.index++;
        continue;
      }
      const key = this.readKeyPath();
      if (this.peek() === '=') {
        this.index++;
      }
      this.skipTrivia(false);
      const member = path === undefined ? undefined : [...path, ...key];
      if (this.readValue(member)) {
        this.record(member);
      }
    }
  }

  private readScalar(): string {
    const start = this.index;
    while (!this.atEnd() && !SCALAR_END.has(this.peek())) {
      this.index++;
    }
    const token = this.text.slice(start, this.index);
    // A date-time may separate its date and time with a space.
    if (LOCAL_DATE.test(token) && this.peek() === ' ' && DIGIT.test(this.peek(1))) {
      this.index++;
      this.readScalar();
    }
    return token;
  }

  /**
   * Reads a string at the current position. Returns the decoded text of a
   * single-line string; multi-line strings are skipped.
   */
  private readString(): string {
    const quote = this.peek();
    const delimiter = quote.repeat(3);
    if (this.startsWith(delimiter)) {
      this.index += 3;
      this.skipMultiline(delimiter, quote === '"');
      return '';
    }

    this.index++;
    let decoded = '';
    while (!this.atEnd()) {
      const ch = this.peek();
      this.index++;
      if (ch === quote) {
        return decoded;
      }
      decoded += quote === '"' && ch === '\\' ? this.readEscape() : ch;
    }
    return decoded;
  }

  private readEscape(): string {
    const ch = this.peek();
    this.index++;
    const width = ch === 'u' ? 4 : ch === 'U' ? 8 : 0;
    if (width > 0) {
      const hex = this.text.slice(this.index, this.index + width);
      this.index += width;
      return String.fromCodePoint(Number.parseInt(hex, 16));
    }
    return ESCAPES[ch] ?? ch;
  }

  private skipMultiline(delimiter: string, escapes: boolean): void {
    while (!this.atEnd()) {
      if (escapes && this.peek() === '\\') {
        this.index += 2;
        continue;
      }
      if (this.startsWith(delimiter)) {
        this.index += 3;
        // Up to two quotes may sit directly before the closing delimiter.
        for (let extra = 0; extra < 2 && this.peek() === delimiter.charAt(0); extra++) {
          this.index++;
        }
        return;
      }
      this.index++;
    }
  }

  private record(path: readonly string[] | undefined): void {
    if (path === undefined || path.length !== 2) {
      return;
    }
    const [group, field] = path;
    if (group !== undefined && field !== undefined) {
      this.found.add(floatFieldKey(group, field));
    }
  }
}

/**
 * Lists the group fields written as floats.
 *
 * @param text - A TOML document that parses.
 * @returns Keys built with {@link floatFieldKey}.
 *
 * @example
 * ```typescript
 * const floats = findFloatFields('["event a"]\nmax_timeout = 30.0\n');
 * floats.has(floatFieldKey('event a', 'max_timeout')); // true
 * ```
 */
export function findFloatFields(text: string): Set<string> {
  return new FloatFieldScanner(text).scan();
}
