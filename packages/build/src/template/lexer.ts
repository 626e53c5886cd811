/**
 * Tokenizer for `{{ }}` templates
 */

export enum ItemType {
  Error = 'error',
  EOF = 'eof',
  Text = 'text',
  LeftDelim = 'leftDelim',
  RightDelim = 'rightDelim',
  Field = 'field',
  Identifier = 'identifier',
  String = 'string',
  RawString = 'rawString',
  Number = 'number',
  Bool = 'bool',
  Dot = 'dot',
  Pipe = 'pipe',
  LeftParen = 'leftParen',
  RightParen = 'rightParen',
  Space = 'space',
  Char = 'char'
}

export interface Item {
  type: ItemType;
  /** Byte offset of the item in the input */
  pos: number;
  value: string;
  /** 1-based line the item starts on */
  line: number;
}

const LEFT_DELIM = '{{';
const RIGHT_DELIM = '}}';
const LEFT_COMMENT = '/*';
const RIGHT_COMMENT = '*/';
const TRIM_MARKER = '-';
const TRIM_MARKER_LENGTH = 2;

export function isSpace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isAlphaNumeric(ch: string | undefined): boolean {
  return ch !== undefined && (ch === '_' || /^[\p{L}\p{Nd}]$/u.test(ch));
}

function hasLeftTrimMarker(input: string, at: number): boolean {
  return input[at] === TRIM_MARKER && isSpace(input[at + 1]);
}

function hasRightTrimMarker(input: string, at: number): boolean {
  return isSpace(input[at]) && input[at + 1] === TRIM_MARKER;
}

function rightTrimLength(text: string): number {
  let length = 0;
  while (length < text.length && isSpace(text[text.length - 1 - length])) {
    length++;
  }
  return length;
}

function leftTrimLength(input: string, from: number): number {
  let length = 0;
  while (from + length < input.length && isSpace(input[from + length])) {
    length++;
  }
  return length;
}

/**
 * Describe a character as `U+007D '}'`
 */
export function describeChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')} '${ch}'`;
}

/**
 * Printable form of an item, used in parse errors
 */
export function describeItem(item: Item): string {
  if (item.type === ItemType.EOF) {
    return 'EOF';
  }
  if (item.type === ItemType.Error) {
    return item.value;
  }
  const chars = [...item.value];
  if (chars.length > 10) {
    return `${JSON.stringify(chars.slice(0, 10).join(''))}...`;
  }
  return JSON.stringify(item.value);
}

/** Thrown internally to stop lexing once an error item is produced */
class LexStop extends Error {}

/**
 * Split template text into items. The result always ends with an EOF or
 * an Error item.
 */
export function lex(input: string): Item[] {
  return new Lexer(input).run();
}

class Lexer {
  private readonly input: string;
  private readonly items: Item[] = [];
  private pos = 0;
  private start = 0;
  private parenDepth = 0;

  constructor(input: string) {
    this.input = input;
  }

  run(): Item[] {
    try {
      this.lexText();
    } catch (error) {
      if (!(error instanceof LexStop)) {
        throw error;
      }
    }
    return this.items;
  }

  private lineAt(offset: number): number {
    let line = 1;
    for (let i = 0; i < offset; i++) {
      if (this.input[i] === '\n') {
        line++;
      }
    }
    return line;
  }

  private emit(type: ItemType): void {
    this.items.push({
      type,
      pos: this.start,
      value: this.input.slice(this.start, this.pos),
      line: this.lineAt(this.start)
    });
    this.start = this.pos;
  }

  private ignore(): void {
    this.start = this.pos;
  }

  private peek(): string | undefined {
    return this.input[this.pos];
  }

  private next(): string | undefined {
    const ch = this.input[this.pos];
    if (ch !== undefined) {
      this.pos++;
    }
    return ch;
  }

  private fail(message: string): never {
    this.items.push({ type: ItemType.Error, pos: this.start, value: message, line: this.lineAt(this.start) });
    throw new LexStop(message);
  }

  private lexText(): void {
    for (;;) {
      const x = this.input.indexOf(LEFT_DELIM, this.pos);
      if (x < 0) {
        this.pos = this.input.length;
        if (this.pos > this.start) {
          this.emit(ItemType.Text);
        }
        this.emit(ItemType.EOF);
        return;
      }

      if (x > this.pos) {
        this.pos = x;
        const trim = hasLeftTrimMarker(this.input, x + LEFT_DELIM.length)
          ? rightTrimLength(this.input.slice(this.start, x))
          : 0;
        this.pos -= trim;
        if (this.pos > this.start) {
          this.emit(ItemType.Text);
        }
        this.pos += trim;
        this.ignore();
      }

      this.lexLeftDelim();
    }
  }

  private lexLeftDelim(): void {
    this.pos += LEFT_DELIM.length;
    const trimSpace = hasLeftTrimMarker(this.input, this.pos);
    const afterMarker = trimSpace ? TRIM_MARKER_LENGTH : 0;

    if (this.input.startsWith(LEFT_COMMENT, this.pos + afterMarker)) {
      this.pos += afterMarker;
      this.ignore();
      this.lexComment();
      return;
    }

    this.emit(ItemType.LeftDelim);
    this.pos += afterMarker;
    this.ignore();
    this.parenDepth = 0;
    this.lexInsideAction();
  }

  private lexComment(): void {
    this.pos += LEFT_COMMENT.length;
    const end = this.input.indexOf(RIGHT_COMMENT, this.pos);
    if (end < 0) {
      this.fail('unclosed comment');
    }
    this.pos = end + RIGHT_COMMENT.length;

    const [delim, trimSpace] = this.atRightDelim();
    if (!delim) {
      this.fail('comment ends before closing delimiter');
    }
    if (trimSpace) {
      this.pos += TRIM_MARKER_LENGTH;
    }
    this.pos += RIGHT_DELIM.length;
    if (trimSpace) {
      this.pos += leftTrimLength(this.input, this.pos);
    }
    this.ignore();
  }

  private atRightDelim(): [delim: boolean, trimSpace: boolean] {
    if (
      hasRightTrimMarker(this.input, this.pos) &&
      this.input.startsWith(RIGHT_DELIM, this.pos + TRIM_MARKER_LENGTH)
    ) {
      return [true, true];
    }
    if (this.input.startsWith(RIGHT_DELIM, this.pos)) {
      return [true, false];
    }
    return [false, false];
  }

  private lexRightDelim(trimSpace: boolean): void {
    if (trimSpace) {
      this.pos += TRIM_MARKER_LENGTH;
      this.ignore();
    }
    this.pos += RIGHT_DELIM.length;
    this.emit(ItemType.RightDelim);
    if (trimSpace) {
      this.pos += leftTrimLength(this.input, this.pos);
      this.ignore();
    }
  }

  private lexInsideAction(): void {
    for (;;) {
      const [delim, trimSpace] = this.atRightDelim();
      if (delim) {
        if (this.parenDepth === 0) {
          this.lexRightDelim(trimSpace);
          return;
        }
        this.fail('unclosed left paren');
      }

      const ch = this.next();
      if (ch === undefined) {
        this.fail('unclosed action');
      } else if (isSpace(ch)) {
        this.pos--;
        this.lexSpace();
      } else if (ch === '|') {
        this.emit(ItemType.Pipe);
      } else if (ch === '"') {
        this.lexQuote();
      } else if (ch === '`') {
        this.lexRawQuote();
      } else if (ch === '.') {
        if (isDigit(this.peek())) {
          this.pos--;
          this.lexNumber();
        } else {
          this.lexField();
        }
      } else if (ch === '+' || ch === '-' || isDigit(ch)) {
        this.pos--;
        this.lexNumber();
      } else if (isAlphaNumeric(ch)) {
        this.pos--;
        this.lexIdentifier();
      } else if (ch === '(') {
        this.emit(ItemType.LeftParen);
        this.parenDepth++;
      } else if (ch === ')') {
        this.emit(ItemType.RightParen);
        this.parenDepth--;
        if (this.parenDepth < 0) {
          this.fail('unexpected right paren');
        }
      } else if (ch >= ' ' && ch <= '~') {
        this.emit(ItemType.Char);
      } else {
        this.fail(`unrecognized character in action: ${describeChar(ch)}`);
      }
    }
  }

  private lexSpace(): void {
    let spaces = 0;
    while (isSpace(this.peek())) {
      this.pos++;
      spaces++;
    }
    // a space directly before `-}}` belongs to the delimiter
    if (
      hasRightTrimMarker(this.input, this.pos - 1) &&
      this.input.startsWith(RIGHT_DELIM, this.pos - 1 + TRIM_MARKER_LENGTH)
    ) {
      this.pos--;
      if (spaces === 1) {
        return;
      }
    }
    this.emit(ItemType.Space);
  }

  private atTerminator(): boolean {
    const ch = this.peek();
    if (ch === undefined || isSpace(ch)) {
      return true;
    }
    switch (ch) {
      case '.':
      case ',':
      case '|':
      case ':':
      case ')':
      case '(':
        return true;
    }
    return ch === RIGHT_DELIM[0];
  }

  private badCharacter(): never {
    const ch = this.peek() ?? '';
    return this.fail(`bad character ${describeChar(ch)}`);
  }

  private lexField(): void {
    if (this.atTerminator()) {
      this.emit(ItemType.Dot);
      return;
    }
    while (isAlphaNumeric(this.peek())) {
      this.pos++;
    }
    if (!this.atTerminator()) {
      this.badCharacter();
    }
    this.emit(ItemType.Field);
  }

  private lexIdentifier(): void {
    while (isAlphaNumeric(this.peek())) {
      this.pos++;
    }
    if (!this.atTerminator()) {
      this.badCharacter();
    }
    const word = this.input.slice(this.start, this.pos);
    this.emit(word === 'true' || word === 'false' ? ItemType.Bool : ItemType.Identifier);
  }

  private lexNumber(): void {
    const accept = (valid: (ch: string | undefined) => boolean): boolean => {
      let any = false;
      while (valid(this.peek())) {
        this.pos++;
        any = true;
      }
      return any;
    };

    if (this.peek() === '+' || this.peek() === '-') {
      this.pos++;
    }
    let digits = accept(isDigit);
    if (this.peek() === '.') {
      this.pos++;
      digits = accept(isDigit) || digits;
    }
    if (digits && (this.peek() === 'e' || this.peek() === 'E')) {
      this.pos++;
      if (this.peek() === '+' || this.peek() === '-') {
        this.pos++;
      }
      digits = accept(isDigit);
    }

    if (!digits || isAlphaNumeric(this.peek())) {
      this.pos++;
      this.fail(`bad number syntax: ${JSON.stringify(this.input.slice(this.start, this.pos))}`);
    }
    this.emit(ItemType.Number);
  }

  private lexQuote(): void {
    for (;;) {
      const ch = this.next();
      if (ch === '\\') {
        const escaped = this.next();
        if (escaped !== undefined && escaped !== '\n') {
          continue;
        }
        this.fail('unterminated quoted string');
      }
      if (ch === undefined || ch === '\n') {
        this.fail('unterminated quoted string');
      }
      if (ch === '"') {
        break;
      }
    }
    this.emit(ItemType.String);
  }

  private lexRawQuote(): void {
    const end = this.input.indexOf('`', this.pos);
    if (end < 0) {
      this.fail('unterminated raw quoted string');
    }
    this.pos = end + 1;
    this.emit(ItemType.RawString);
  }
}
