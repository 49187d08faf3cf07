import { LexError } from './lexer-error';
import type { Position, Token } from './token';
import { TokenType } from './token-types';

/**
 * Lexer states for template scanning
 */
const STATE_DATA = 0; // Scanning raw template text
const STATE_VARIABLE = 1; // Inside {{ ... }}
const STATE_BLOCK = 2; // Inside {% ... %}

type LexerState = typeof STATE_DATA | typeof STATE_VARIABLE | typeof STATE_BLOCK;

// Matches `{% raw %}` (with optional whitespace control) at the current index
const RAW_OPEN = /\{%([-+]?)\s*raw\s*(-?)%\}/y;
// Finds the matching `{% endraw %}`
const RAW_CLOSE = /\{%([-+]?)\s*endraw\s*(-?)%\}/g;

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const DIGIT = /[0-9]/;

const STRING_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

/**
 * Options that change how raw text around tags is emitted
 */
export interface LexerOptions {
  /** Remove the first newline after a block tag */
  trimBlocks?: boolean;
  /** Strip spaces and tabs from the start of a line up to a block tag */
  lstripBlocks?: boolean;
  /** Keep a single trailing newline at the end of the source */
  keepTrailingNewline?: boolean;
}

/**
 * Lexer for Jinja-compatible templates
 *
 * Produces tokens lazily through `lex()`. Whitespace control (`{{-`, `-%}`,
 * trimBlocks, lstripBlocks) is applied here, so TEXT tokens carry the text
 * exactly as it should be emitted.
 */
export class Lexer {
  // Multi-character operators come first so the longest match wins
  private static readonly OPERATORS = [
    { text: '**', type: TokenType.POWER },
    { text: '//', type: TokenType.FLOOR_DIV },
    { text: '==', type: TokenType.EQ },
    { text: '!=', type: TokenType.NE },
    { text: '<=', type: TokenType.LTE },
    { text: '>=', type: TokenType.GTE },
    { text: '+', type: TokenType.PLUS },
    { text: '-', type: TokenType.MINUS },
    { text: '*', type: TokenType.STAR },
    { text: '/', type: TokenType.SLASH },
    { text: '%', type: TokenType.PERCENT },
    { text: '~', type: TokenType.TILDE },
    { text: '<', type: TokenType.LT },
    { text: '>', type: TokenType.GT },
    { text: '=', type: TokenType.ASSIGN },
    { text: '|', type: TokenType.PIPE },
    { text: '.', type: TokenType.DOT },
    { text: ',', type: TokenType.COMMA },
    { text: ':', type: TokenType.COLON },
    { text: '(', type: TokenType.LPAREN },
    { text: ')', type: TokenType.RPAREN },
    { text: '[', type: TokenType.LBRACKET },
    { text: ']', type: TokenType.RBRACKET },
    { text: '{', type: TokenType.LBRACE },
    { text: '}', type: TokenType.RBRACE },
  ] as const;

  private readonly options: Required<LexerOptions>;
  private input: string = '';
  private index: number = 0;
  private line: number = 1;
  private column: number = 0;
  private state: LexerState = STATE_DATA;
  // Track last token type so `foo.0.bar` scans `0` as an integer, not `0.` as a float
  private lastTokenType: TokenType | null = null;
  // Opening delimiter of the tag being scanned, for unclosed-tag errors
  private tagStart: Position | null = null;
  // Unbalanced `{` inside the current tag (dict literals)
  private braceDepth: number = 0;
  // Whitespace handling owed to the next run of text
  private stripLeading: boolean = false;
  private trimNewline: boolean = false;

  constructor(options: LexerOptions = {}) {
    this.options = {
      trimBlocks: options.trimBlocks ?? false,
      lstripBlocks: options.lstripBlocks ?? false,
      keepTrailingNewline: options.keepTrailingNewline ?? false,
    };
  }

  /**
   * Initialize lexer with template source. Calling it again restarts the lexer.
   */
  setInput(source: string): void {
    let input = source;
    if (!this.options.keepTrailingNewline) {
      if (input.endsWith('\r\n')) {
        input = input.slice(0, -2);
      } else if (input.endsWith('\n')) {
        input = input.slice(0, -1);
      }
    }
    this.input = input;
    this.index = 0;
    this.line = 1;
    this.column = 0;
    this.state = STATE_DATA;
    this.lastTokenType = null;
    this.tagStart = null;
    this.braceDepth = 0;
    this.stripLeading = false;
    this.trimNewline = false;
  }

  /**
   * Extract next token from input
   * Returns EOF token when end of input is reached
   */
  lex(): Token {
    const token = this.lexInternal();
    this.lastTokenType = token.type;
    return token;
  }

  /**
   * Tokenize an entire template (including the trailing EOF token)
   */
  tokenize(source: string): Token[] {
    this.setInput(source);
    const tokens: Token[] = [];
    let token: Token;
    do {
      token = this.lex();
      tokens.push(token);
    } while (token.type !== TokenType.EOF);
    return tokens;
  }

  /**
   * Check if the lexer consumed all input
   */
  isEOF(): boolean {
    return this.index >= this.input.length && this.state === STATE_DATA;
  }

  private lexInternal(): Token {
    if (this.state !== STATE_DATA) {
      return this.scanTagToken();
    }

    // scanText returns null for empty text (adjacent tags)
    const text = this.scanText();
    if (text) {
      return text;
    }

    if (this.index >= this.input.length) {
      return this.createToken(TokenType.EOF, '', this.getPosition());
    }

    const raw = this.tryScanRaw();
    if (raw !== undefined) {
      // Empty raw blocks yield nothing, continue to next token
      return raw ?? this.lexInternal();
    }

    return this.scanOpeningTag();
  }

  // ---------------------------------------------------------------------------
  // Raw text
  // ---------------------------------------------------------------------------

  /**
   * Scan text up to the next tag, applying whitespace control from the tags
   * on either side.
   */
  private scanText(): Token | null {
    const start = this.getPosition();
    const end = this.findNextTag(this.index);
    let text = this.input.slice(this.index, end);

    if (this.stripLeading) {
      text = text.trimStart();
    } else if (this.trimNewline) {
      text = text.replace(/^\r?\n/, '');
    }
    this.stripLeading = false;
    this.trimNewline = false;

    if (end < this.input.length) {
      text = this.stripBeforeTag(text, end);
    }

    this.consumeChars(end - this.index);
    return text === '' ? null : this.createToken(TokenType.TEXT, text, start);
  }

  /**
   * Apply `{{-` / `{%-` / `{#-` and lstripBlocks to text ending at a tag
   */
  private stripBeforeTag(text: string, tagIndex: number): string {
    const marker = this.input[tagIndex + 2];
    if (marker === '-') {
      return text.trimEnd();
    }

    const kind = this.input[tagIndex + 1];
    if (!this.options.lstripBlocks || kind === '{' || marker === '+') {
      return text;
    }

    // Only strip when nothing but spaces/tabs sits between line start and the tag
    const lineBreak = text.lastIndexOf('\n');
    const tail = text.slice(lineBreak + 1);
    if (!/^[ \t]*$/.test(tail)) {
      return text;
    }
    const textStart = tagIndex - text.length;
    if (lineBreak === -1 && textStart > 0 && this.input[textStart - 1] !== '\n') {
      return text;
    }
    return text.slice(0, lineBreak + 1);
  }

  /**
   * Find the index of the next `{{`, `{%` or `{#` at or after `from`
   */
  private findNextTag(from: number): number {
    let i = this.input.indexOf('{', from);
    while (i !== -1) {
      const next = this.input[i + 1];
      if (next === '{' || next === '%' || next === '#') {
        return i;
      }
      i = this.input.indexOf('{', i + 1);
    }
    return this.input.length;
  }

  /**
   * Scan a `{% raw %}...{% endraw %}` section as a single TEXT token.
   * Returns undefined when the current tag is not a raw tag, and null for an
   * empty raw section.
   */
  private tryScanRaw(): Token | null | undefined {
    RAW_OPEN.lastIndex = this.index;
    const open = RAW_OPEN.exec(this.input);
    if (!open) {
      return undefined;
    }

    const start = this.getPosition();
    RAW_CLOSE.lastIndex = this.index + open[0].length;
    const close = RAW_CLOSE.exec(this.input);
    if (!close) {
      throw new LexError('Unclosed raw block, expected "{% endraw %}"', start);
    }

    let content = this.input.slice(this.index + open[0].length, close.index);
    if (open[2] === '-') {
      content = content.trimStart();
    } else if (this.options.trimBlocks) {
      content = content.replace(/^\r?\n/, '');
    }
    if (close[1] === '-') {
      content = content.trimEnd();
    }

    this.consumeChars(close.index + close[0].length - this.index);
    this.markTagClosed(close[2] === '-');

    return content === '' ? null : this.createToken(TokenType.TEXT, content, start);
  }

  // ---------------------------------------------------------------------------
  // Tags
  // ---------------------------------------------------------------------------

  /**
   * Scan an opening delimiter ({{, {%, {#) and switch state
   */
  private scanOpeningTag(): Token {
    const start = this.getPosition();
    const kind = this.input[this.index + 1];

    if (kind === '#') {
      return this.scanComment(start);
    }

    this.tagStart = start;
    this.braceDepth = 0;
    const marker = this.input[this.index + 2];
    const length = marker === '-' || (marker === '+' && kind === '%') ? 3 : 2;
    const value = this.input.slice(this.index, this.index + length);
    this.consumeChars(length);

    if (kind === '{') {
      this.state = STATE_VARIABLE;
      return this.createToken(TokenType.VARIABLE_START, value, start);
    }
    this.state = STATE_BLOCK;
    return this.createToken(TokenType.BLOCK_START, value, start);
  }

  /**
   * Scan a comment. The token value is the comment body without delimiters.
   */
  private scanComment(start: Position): Token {
    const close = this.input.indexOf('#}', this.index + 2);
    if (close === -1) {
      throw new LexError('Unclosed comment, expected "#}"', start);
    }

    const bodyStart = this.input[this.index + 2] === '-' ? this.index + 3 : this.index + 2;
    const stripAfter = close > bodyStart && this.input[close - 1] === '-';
    const body = this.input.slice(bodyStart, stripAfter ? close - 1 : close);

    this.consumeChars(close + 2 - this.index);
    this.markTagClosed(stripAfter);
    return this.createToken(TokenType.COMMENT, body, start);
  }

  /**
   * Record whitespace handling owed to the text following a block tag or comment
   */
  private markTagClosed(stripAfter: boolean): void {
    if (stripAfter) {
      this.stripLeading = true;
    } else if (this.options.trimBlocks) {
      this.trimNewline = true;
    }
  }

  /**
   * Scan one token inside {{ }} or {% %}
   */
  private scanTagToken(): Token {
    this.skipWhitespace();

    if (this.index >= this.input.length) {
      const expected = this.state === STATE_VARIABLE ? '}}' : '%}';
      const kind = this.state === STATE_VARIABLE ? 'variable' : 'block';
      throw new LexError(`Unclosed ${kind} tag, expected "${expected}"`, this.tagStartOrHere());
    }

    const closing = this.tryScanClosingTag();
    if (closing) {
      return closing;
    }

    const start = this.getPosition();
    const char = this.peek();

    if (char === '"' || char === "'") {
      return this.scanString(start, char);
    }
    if (DIGIT.test(char)) {
      return this.scanNumber(start);
    }
    if (NAME_START.test(char)) {
      return this.scanName(start);
    }
    return this.scanOperator(start);
  }

  /**
   * Try to scan `}}`, `-}}`, `%}` or `-%}` for the current tag
   */
  private tryScanClosingTag(): Token | null {
    // A `}` closes a dict literal while one is open
    if (this.braceDepth > 0) {
      return null;
    }

    const delimiter = this.state === STATE_VARIABLE ? '}}' : '%}';
    const strip = this.match('-' + delimiter);
    if (!strip && !this.match(delimiter)) {
      return null;
    }

    const start = this.getPosition();
    const value = strip ? '-' + delimiter : delimiter;
    const type = this.state === STATE_VARIABLE ? TokenType.VARIABLE_END : TokenType.BLOCK_END;
    this.consumeChars(value.length);

    if (this.state === STATE_BLOCK) {
      this.markTagClosed(strip);
    } else if (strip) {
      this.stripLeading = true;
    }
    this.state = STATE_DATA;
    this.tagStart = null;
    return this.createToken(type, value, start);
  }

  private scanString(start: Position, quote: string): Token {
    this.advance(); // opening quote
    let value = '';

    while (this.index < this.input.length) {
      const char = this.advance();
      if (char === quote) {
        return this.createToken(TokenType.STRING, value, start);
      }
      if (char === '\\' && this.index < this.input.length) {
        const escaped = this.advance();
        value += STRING_ESCAPES[escaped] ?? '\\' + escaped;
        continue;
      }
      value += char;
    }

    throw new LexError('Unterminated string literal', start);
  }

  private scanNumber(start: Position): Token {
    let value = this.consumeWhile(DIGIT);

    // After a dot only integers are valid (`items.0.name`)
    if (this.lastTokenType === TokenType.DOT) {
      return this.createToken(TokenType.INTEGER, value, start);
    }

    let isFloat = false;
    if (this.peek() === '.' && DIGIT.test(this.peekAt(1))) {
      value += this.advance();
      value += this.consumeWhile(DIGIT);
      isFloat = true;
    }

    const exponent = /[eE][+-]?[0-9]/y;
    exponent.lastIndex = this.index;
    if (exponent.test(this.input)) {
      value += this.advance();
      if (this.peek() === '+' || this.peek() === '-') {
        value += this.advance();
      }
      value += this.consumeWhile(DIGIT);
      isFloat = true;
    }

    return this.createToken(isFloat ? TokenType.FLOAT : TokenType.INTEGER, value, start);
  }

  private scanName(start: Position): Token {
    const value = this.consumeWhile(NAME_PART);
    return this.createToken(TokenType.NAME, value, start);
  }

  private scanOperator(start: Position): Token {
    for (const operator of Lexer.OPERATORS) {
      if (this.match(operator.text)) {
        this.consumeChars(operator.text.length);
        if (operator.type === TokenType.LBRACE) {
          this.braceDepth++;
        } else if (operator.type === TokenType.RBRACE && this.braceDepth > 0) {
          this.braceDepth--;
        }
        return this.createToken(operator.type, operator.text, start);
      }
    }

    throw new LexError(`Unexpected character '${this.peek()}'`, start);
  }

  // ---------------------------------------------------------------------------
  // Character helpers
  // ---------------------------------------------------------------------------

  private peek(): string {
    return this.input[this.index] ?? '';
  }

  private peekAt(offset: number): string {
    return this.input[this.index + offset] ?? '';
  }

  private match(text: string): boolean {
    return this.input.startsWith(text, this.index);
  }

  /**
   * Consume one character, tracking line and column
   */
  private advance(): string {
    const char = this.input[this.index] ?? '';
    this.index++;
    if (char === '\n') {
      this.line++;
      this.column = 0;
    } else {
      this.column++;
    }
    return char;
  }

  private consumeChars(count: number): void {
    for (let i = 0; i < count; i++) {
      this.advance();
    }
  }

  private consumeWhile(pattern: RegExp): string {
    let value = '';
    while (this.index < this.input.length && pattern.test(this.peek())) {
      value += this.advance();
    }
    return value;
  }

  private skipWhitespace(): void {
    while (this.index < this.input.length && /\s/.test(this.peek())) {
      this.advance();
    }
  }

  private getPosition(): Position {
    return { line: this.line, column: this.column, index: this.index };
  }

  private tagStartOrHere(): Position {
    return this.tagStart ?? this.getPosition();
  }

  private createToken(type: TokenType, value: string, start: Position): Token {
    return { type, value, loc: { start, end: this.getPosition() } };
  }
}
