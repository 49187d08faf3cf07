import type { SourceLocation, Token } from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import type {
  BinaryOperator,
  CallExpression,
  DictEntry,
  Expression,
  FilterCall,
  KeywordArgument,
  StringLiteral,
} from './ast-nodes';
import { makeInt } from '../runtime/values';
import { ParseError } from './parser-error';

// Names that can never be used as variables
const RESERVED = new Set(['and', 'or', 'not', 'in', 'is', 'if', 'else', 'elif']);

const COMPARISON_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map([
  [TokenType.EQ, '=='],
  [TokenType.NE, '!='],
  [TokenType.LT, '<'],
  [TokenType.LTE, '<='],
  [TokenType.GT, '>'],
  [TokenType.GTE, '>='],
]);

const MULTIPLICATIVE_OPERATORS: ReadonlyMap<TokenType, BinaryOperator> = new Map([
  [TokenType.STAR, '*'],
  [TokenType.SLASH, '/'],
  [TokenType.FLOOR_DIV, '//'],
  [TokenType.PERCENT, '%'],
]);

interface CallArguments {
  args: Expression[];
  kwargs: KeywordArgument[];
}

/**
 * Recursive descent parser for the expression sub-grammar
 *
 * Operator precedence (lowest to highest):
 * 1. Conditional (a if b else c)
 * 2. Logical OR (or)
 * 3. Logical AND (and)
 * 4. Logical NOT (not)
 * 5. Comparison (==, !=, <, <=, >, >=, in, not in) and tests (is)
 * 6. Concatenation (~)
 * 7. Additive (+, -)
 * 8. Multiplicative (*, /, //, %)
 * 9. Power (**)
 * 10. Unary (-, +), followed by the filter pipeline (|)
 * 11. Postfix (.attr, [index], [start:stop], call)
 * 12. Primary (literals, names, grouping, lists, dicts)
 *
 * Works over the token stream of a whole template; the statement parser
 * extends it.
 */
export class ExpressionParser {
  protected tokens: Token[] = [];
  protected position: number = 0;

  // Token navigation

  /**
   * Look at a token without consuming it. Past the end this keeps returning EOF.
   */
  protected peek(offset: number = 0): Token {
    const index = Math.min(this.position + offset, this.tokens.length - 1);
    const token = this.tokens[index];
    if (!token) {
      throw new ParseError('Parser has no input', null);
    }
    return token;
  }

  protected previous(): Token {
    return this.tokens[this.position - 1] ?? this.peek();
  }

  protected isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  protected advance(): Token {
    const token = this.peek();
    if (!this.isAtEnd()) {
      this.position++;
    }
    return token;
  }

  protected check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  protected match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  protected expect(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(message);
  }

  protected checkName(value: string, offset: number = 0): boolean {
    const token = this.peek(offset);
    return token.type === TokenType.NAME && token.value === value;
  }

  protected matchName(value: string): boolean {
    if (this.checkName(value)) {
      this.advance();
      return true;
    }
    return false;
  }

  protected expectName(value: string): Token {
    if (this.checkName(value)) return this.advance();
    throw this.error(`Expected '${value}' but found ${this.describe(this.peek())}`);
  }

  /**
   * Consume a NAME usable as a variable, macro or block name
   */
  protected expectIdentifier(what: string): string {
    const token = this.peek();
    if (token.type !== TokenType.NAME) {
      throw this.error(`Expected ${what} but found ${this.describe(token)}`);
    }
    if (RESERVED.has(token.value)) {
      throw this.error(`'${token.value}' is a reserved word and cannot be used as ${what}`);
    }
    this.advance();
    return token.value;
  }

  protected error(message: string, token: Token = this.peek()): ParseError {
    const start = Math.max(0, this.tokens.indexOf(token));
    return ParseError.fromToken(message, token, this.tokens.slice(start, start + 5));
  }

  protected describe(token: Token): string {
    switch (token.type) {
      case TokenType.EOF:
        return 'end of template';
      case TokenType.TEXT:
        return 'template text';
      default:
        return `'${token.value}'`;
    }
  }

  protected makeLoc(start: Token, end: Token = this.previous()): SourceLocation {
    return { start: start.loc.start, end: end.loc.end };
  }

  // Expression parsing - precedence climbing

  /**
   * Parse a full expression. `allowConditional` is false where a trailing `if`
   * belongs to the statement, as in `for x in items if x`.
   */
  protected parseExpression(allowConditional: boolean = true): Expression {
    return allowConditional ? this.parseConditional() : this.parseOr();
  }

  /**
   * Parse an expression, collecting a bare comma list into a tuple: `1, 2`
   */
  protected parseTupleOrExpression(): Expression {
    const startToken = this.peek();
    const first = this.parseExpression();
    if (!this.check(TokenType.COMMA)) {
      return first;
    }
    const elements = [first];
    while (this.match(TokenType.COMMA)) {
      if (this.check(TokenType.BLOCK_END) || this.check(TokenType.VARIABLE_END)) break;
      elements.push(this.parseExpression());
    }
    return { type: 'TupleExpression', elements, loc: this.makeLoc(startToken) };
  }

  private parseConditional(): Expression {
    const startToken = this.peek();
    let expr = this.parseOr();

    while (this.matchName('if')) {
      const test = this.parseOr();
      const alternate = this.matchName('else') ? this.parseConditional() : null;
      expr = {
        type: 'ConditionalExpression',
        test,
        consequent: expr,
        alternate,
        loc: this.makeLoc(startToken),
      };
    }

    return expr;
  }

  private parseOr(): Expression {
    const startToken = this.peek();
    let left = this.parseAnd();

    while (this.matchName('or')) {
      const right = this.parseAnd();
      left = { type: 'LogicalExpression', operator: 'or', left, right, loc: this.makeLoc(startToken) };
    }

    return left;
  }

  private parseAnd(): Expression {
    const startToken = this.peek();
    let left = this.parseNot();

    while (this.matchName('and')) {
      const right = this.parseNot();
      left = { type: 'LogicalExpression', operator: 'and', left, right, loc: this.makeLoc(startToken) };
    }

    return left;
  }

  private parseNot(): Expression {
    const startToken = this.peek();
    if (this.matchName('not')) {
      const argument = this.parseNot();
      return { type: 'UnaryExpression', operator: 'not', argument, loc: this.makeLoc(startToken) };
    }
    return this.parseComparison();
  }

  private parseComparison(): Expression {
    const startToken = this.peek();
    let left = this.parseConcat();

    while (true) {
      const operator = COMPARISON_OPERATORS.get(this.peek().type);
      if (operator) {
        this.advance();
        const right = this.parseConcat();
        left = { type: 'BinaryExpression', operator, left, right, loc: this.makeLoc(startToken) };
      } else if (this.matchName('in')) {
        const right = this.parseConcat();
        left = { type: 'BinaryExpression', operator: 'in', left, right, loc: this.makeLoc(startToken) };
      } else if (this.checkName('not') && this.checkName('in', 1)) {
        this.advance();
        this.advance();
        const right = this.parseConcat();
        left = {
          type: 'BinaryExpression',
          operator: 'not in',
          left,
          right,
          loc: this.makeLoc(startToken),
        };
      } else if (this.matchName('is')) {
        left = this.parseTest(left, startToken);
      } else {
        return left;
      }
    }
  }

  /**
   * Parse the rest of `value is [not] name(args)` / `value is name arg`
   */
  private parseTest(value: Expression, startToken: Token): Expression {
    const negated = this.matchName('not');
    const nameToken = this.peek();
    if (nameToken.type !== TokenType.NAME) {
      throw this.error(`Expected test name after 'is' but found ${this.describe(nameToken)}`);
    }
    this.advance();

    let args: Expression[] = [];
    if (this.check(TokenType.LPAREN)) {
      const parsed = this.parseCallArguments();
      if (parsed.kwargs.length > 0) {
        throw this.error(`Test '${nameToken.value}' does not take keyword arguments`);
      }
      args = parsed.args;
    } else if (this.startsBareTestArgument()) {
      args = [this.parseUnary(false)];
    }

    return {
      type: 'TestExpression',
      value,
      name: nameToken.value,
      args,
      negated,
      loc: this.makeLoc(startToken),
    };
  }

  /**
   * `x is divisibleby 3` and `x is sameas none` take a single argument without parentheses
   */
  private startsBareTestArgument(): boolean {
    const token = this.peek();
    switch (token.type) {
      case TokenType.STRING:
      case TokenType.INTEGER:
      case TokenType.FLOAT:
      case TokenType.LBRACKET:
      case TokenType.LBRACE:
        return true;
      case TokenType.NAME:
        return !RESERVED.has(token.value);
      default:
        return false;
    }
  }

  private parseConcat(): Expression {
    const startToken = this.peek();
    let left = this.parseAdditive();

    while (this.match(TokenType.TILDE)) {
      const right = this.parseAdditive();
      left = { type: 'BinaryExpression', operator: '~', left, right, loc: this.makeLoc(startToken) };
    }

    return left;
  }

  private parseAdditive(): Expression {
    const startToken = this.peek();
    let left = this.parseMultiplicative();

    while (this.check(TokenType.PLUS) || this.check(TokenType.MINUS)) {
      const operator = this.advance().type === TokenType.PLUS ? '+' : '-';
      const right = this.parseMultiplicative();
      left = { type: 'BinaryExpression', operator, left, right, loc: this.makeLoc(startToken) };
    }

    return left;
  }

  private parseMultiplicative(): Expression {
    const startToken = this.peek();
    let left = this.parsePower();

    let operator = MULTIPLICATIVE_OPERATORS.get(this.peek().type);
    while (operator) {
      this.advance();
      const right = this.parsePower();
      left = { type: 'BinaryExpression', operator, left, right, loc: this.makeLoc(startToken) };
      operator = MULTIPLICATIVE_OPERATORS.get(this.peek().type);
    }

    return left;
  }

  private parsePower(): Expression {
    const startToken = this.peek();
    const base = this.parseUnary();

    if (this.match(TokenType.POWER)) {
      // Right-associative: 2 ** 3 ** 2 == 2 ** 9
      const exponent = this.parsePower();
      return {
        type: 'BinaryExpression',
        operator: '**',
        left: base,
        right: exponent,
        loc: this.makeLoc(startToken),
      };
    }

    return base;
  }

  /**
   * Unary minus/plus, then the filter pipeline: `-x | abs` filters the negated value
   */
  protected parseUnary(withFilters: boolean = true): Expression {
    const startToken = this.peek();
    let node: Expression;

    if (this.check(TokenType.MINUS) || this.check(TokenType.PLUS)) {
      const operator = this.advance().type === TokenType.MINUS ? '-' : '+';
      const argument = this.parseUnary(false);
      node = { type: 'UnaryExpression', operator, argument, loc: this.makeLoc(startToken) };
    } else {
      node = this.parsePostfix(this.parsePrimary());
    }

    return withFilters ? this.parseFilters(node, startToken) : node;
  }

  private parseFilters(value: Expression, startToken: Token): Expression {
    let node = value;
    while (this.match(TokenType.PIPE)) {
      const filter = this.parseFilterCall();
      node = {
        type: 'FilterExpression',
        value: node,
        name: filter.name,
        args: filter.args,
        kwargs: filter.kwargs,
        loc: this.makeLoc(startToken),
      };
    }
    return node;
  }

  /**
   * Parse `name` or `name(args)` of a filter
   */
  protected parseFilterCall(): FilterCall {
    const nameToken = this.peek();
    if (nameToken.type !== TokenType.NAME) {
      throw this.error(`Expected filter name but found ${this.describe(nameToken)}`);
    }
    this.advance();
    const { args, kwargs } = this.check(TokenType.LPAREN)
      ? this.parseCallArguments()
      : { args: [], kwargs: [] };
    return { name: nameToken.value, args, kwargs, loc: this.makeLoc(nameToken) };
  }

  private parsePostfix(primary: Expression): Expression {
    let node = primary;
    const start = primary.loc ? primary.loc.start : this.previous().loc.start;
    const locFrom = (): SourceLocation => ({ start, end: this.previous().loc.end });

    while (true) {
      if (this.match(TokenType.DOT)) {
        const token = this.peek();
        if (token.type !== TokenType.NAME && token.type !== TokenType.INTEGER) {
          throw this.error(`Expected attribute name after '.' but found ${this.describe(token)}`);
        }
        this.advance();
        node = { type: 'AttributeExpression', object: node, name: token.value, loc: locFrom() };
      } else if (this.match(TokenType.LBRACKET)) {
        node = this.parseSubscript(node, locFrom);
      } else if (this.check(TokenType.LPAREN)) {
        const { args, kwargs } = this.parseCallArguments();
        node = { type: 'CallExpression', callee: node, args, kwargs, loc: locFrom() };
      } else {
        return node;
      }
    }
  }

  /**
   * Parse the inside of `[...]` after the opening bracket: an index or a slice
   */
  private parseSubscript(object: Expression, locFrom: () => SourceLocation): Expression {
    const start = this.check(TokenType.COLON) ? null : this.parseExpression();

    if (!this.match(TokenType.COLON)) {
      this.expect(TokenType.RBRACKET, `Expected ']' but found ${this.describe(this.peek())}`);
      if (!start) {
        throw this.error('Expected an index expression');
      }
      return { type: 'SubscriptExpression', object, index: start, loc: locFrom() };
    }

    const endsPart = (): boolean => this.check(TokenType.RBRACKET) || this.check(TokenType.COLON);
    const stop = endsPart() ? null : this.parseExpression();
    let step: Expression | null = null;
    if (this.match(TokenType.COLON) && !this.check(TokenType.RBRACKET)) {
      step = this.parseExpression();
    }
    this.expect(TokenType.RBRACKET, `Expected ']' but found ${this.describe(this.peek())}`);
    return { type: 'SliceExpression', object, start, stop, step, loc: locFrom() };
  }

  /**
   * Parse `(a, b, key=value)` starting at the opening parenthesis
   */
  protected parseCallArguments(): CallArguments {
    this.expect(TokenType.LPAREN, `Expected '(' but found ${this.describe(this.peek())}`);
    const args: Expression[] = [];
    const kwargs: KeywordArgument[] = [];

    while (!this.check(TokenType.RPAREN)) {
      if (this.peek().type === TokenType.NAME && this.peek(1).type === TokenType.ASSIGN) {
        const name = this.advance().value;
        this.advance(); // =
        kwargs.push({ name, value: this.parseExpression() });
      } else {
        if (kwargs.length > 0) {
          throw this.error('Positional argument follows keyword argument');
        }
        args.push(this.parseExpression());
      }

      if (!this.match(TokenType.COMMA)) break;
    }

    this.expect(TokenType.RPAREN, `Expected ')' but found ${this.describe(this.peek())}`);
    return { args, kwargs };
  }

  private parsePrimary(): Expression {
    const token = this.peek();

    switch (token.type) {
      case TokenType.STRING:
        return this.parseString();
      case TokenType.INTEGER:
      case TokenType.FLOAT:
        this.advance();
        return {
          type: 'NumberLiteral',
          value: token.type === TokenType.FLOAT ? Number(token.value) : makeInt(BigInt(token.value)),
          float: token.type === TokenType.FLOAT,
          original: token.value,
          loc: token.loc,
        };
      case TokenType.NAME:
        return this.parseName();
      case TokenType.LPAREN:
        return this.parseParenthesized();
      case TokenType.LBRACKET:
        return this.parseList();
      case TokenType.LBRACE:
        return this.parseDict();
      case TokenType.EOF:
      case TokenType.VARIABLE_END:
      case TokenType.BLOCK_END:
        throw this.error(`Unexpected end of expression, found ${this.describe(token)}`);
      default:
        throw this.error(`Unexpected token '${token.value}'`);
    }
  }

  /**
   * Adjacent string literals concatenate: "a" "b" == "ab"
   */
  private parseString(): StringLiteral {
    const startToken = this.advance();
    let value = startToken.value;
    while (this.check(TokenType.STRING)) {
      value += this.advance().value;
    }
    return { type: 'StringLiteral', value, loc: this.makeLoc(startToken) };
  }

  private parseName(): Expression {
    const token = this.peek();
    switch (token.value) {
      case 'true':
      case 'True':
        this.advance();
        return { type: 'BooleanLiteral', value: true, loc: token.loc };
      case 'false':
      case 'False':
        this.advance();
        return { type: 'BooleanLiteral', value: false, loc: token.loc };
      case 'none':
      case 'None':
        this.advance();
        return { type: 'NoneLiteral', value: null, loc: token.loc };
      default:
        if (RESERVED.has(token.value)) {
          throw this.error(`Unexpected keyword '${token.value}'`);
        }
        this.advance();
        return { type: 'Identifier', name: token.value, loc: token.loc };
    }
  }

  private parseParenthesized(): Expression {
    const startToken = this.advance(); // (

    if (this.match(TokenType.RPAREN)) {
      return { type: 'TupleExpression', elements: [], loc: this.makeLoc(startToken) };
    }

    const first = this.parseExpression();
    if (this.match(TokenType.RPAREN)) {
      return first;
    }

    const elements = [first];
    while (this.match(TokenType.COMMA)) {
      if (this.check(TokenType.RPAREN)) break;
      elements.push(this.parseExpression());
    }
    this.expect(TokenType.RPAREN, `Expected ')' but found ${this.describe(this.peek())}`);
    return { type: 'TupleExpression', elements, loc: this.makeLoc(startToken) };
  }

  private parseList(): Expression {
    const startToken = this.advance(); // [
    const elements: Expression[] = [];

    while (!this.check(TokenType.RBRACKET)) {
      elements.push(this.parseExpression());
      if (!this.match(TokenType.COMMA)) break;
    }

    this.expect(TokenType.RBRACKET, `Expected ']' but found ${this.describe(this.peek())}`);
    return { type: 'ListExpression', elements, loc: this.makeLoc(startToken) };
  }

  private parseDict(): Expression {
    const startToken = this.advance(); // {
    const entries: DictEntry[] = [];

    while (!this.check(TokenType.RBRACE)) {
      const key = this.parseExpression();
      this.expect(TokenType.COLON, `Expected ':' after dict key but found ${this.describe(this.peek())}`);
      const value = this.parseExpression();
      entries.push({ key, value });
      if (!this.match(TokenType.COMMA)) break;
    }

    this.expect(TokenType.RBRACE, `Expected '}' but found ${this.describe(this.peek())}`);
    return { type: 'DictExpression', entries, loc: this.makeLoc(startToken) };
  }

  /**
   * Narrow an expression to a call, for `{% call %}` blocks
   */
  protected asCall(expr: Expression, token: Token): CallExpression {
    if (expr.type !== 'CallExpression') {
      throw this.error('Expected a macro call', token);
    }
    return expr;
  }
}
