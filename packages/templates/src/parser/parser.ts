import { Lexer } from '../lexer/lexer';
import type { Token } from '../lexer/token';
import { TokenType } from '../lexer/token-types';
import type {
  AssignTarget,
  BlockStatement,
  CallBlockStatement,
  ConditionalBranch,
  ExtendsStatement,
  FilterBlockStatement,
  FilterCall,
  ForStatement,
  FromImportStatement,
  IfStatement,
  ImportName,
  ImportStatement,
  IncludeStatement,
  MacroParam,
  MacroStatement,
  OutputStatement,
  Program,
  SetBlockStatement,
  SetStatement,
  Statement,
  Template,
  WithAssignment,
  WithStatement,
} from './ast-nodes';
import { ExpressionParser } from './expression-parser';
import { ParseError } from './parser-error';

/**
 * An open block tag awaiting its closing tag
 */
interface OpenBlock {
  tag: string; // e.g. "for"
  token: Token; // BLOCK_START of the opening tag
}

// Tags that continue or close an enclosing construct; never valid on their own
const CONTINUATION_TAGS = new Set(['elif', 'else']);

/**
 * Parser for Jinja-compatible templates
 *
 * Transforms the lexer's token stream into an Abstract Syntax Tree (AST).
 * Statements are parsed by recursive descent; the open-block stack tracks
 * which `end*` tag is expected so mismatches can name the unclosed construct.
 */
export class Parser extends ExpressionParser {
  private lexer: Lexer;
  private openBlocks: OpenBlock[] = [];
  private blocks: Map<string, BlockStatement> = new Map();
  private parent: string | null = null;

  /**
   * Initialize parser with lexer instance
   *
   * @param lexer - Lexer instance to read tokens from
   */
  constructor(lexer: Lexer) {
    super();
    this.lexer = lexer;
  }

  /**
   * Get the current lexer instance
   */
  getLexer(): Lexer {
    return this.lexer;
  }

  /**
   * Initialize parser with tokens from template
   *
   * @param source - Template source to parse
   */
  setInput(source: string): void {
    this.tokens = this.lexer.tokenize(source);
    this.position = 0;
    this.openBlocks = [];
    this.blocks = new Map();
    this.parent = null;
  }

  /**
   * Parse the current input into a Program
   */
  parse(): Program {
    const startToken = this.peek();
    const body = this.parseBody([]);
    return { type: 'Program', body, loc: this.makeLoc(startToken, this.peek()) };
  }

  /**
   * Parse a named template, collecting its blocks and parent
   */
  parseTemplate(name: string, source: string): Template {
    this.setInput(source);
    const ast = this.parse();
    return { name, source, ast, blocks: new Map(this.blocks), parent: this.parent };
  }

  // ===========================================================================
  // Bodies
  // ===========================================================================

  /**
   * Parse statements until a block tag named in `terminators` (left unconsumed)
   * or the end of input.
   */
  private parseBody(terminators: readonly string[]): Statement[] {
    const body: Statement[] = [];

    while (true) {
      const token = this.peek();

      switch (token.type) {
        case TokenType.EOF:
          if (terminators.length > 0) {
            throw this.unclosedBlockError();
          }
          return body;

        case TokenType.TEXT:
          this.advance();
          body.push({ type: 'ContentStatement', value: token.value, loc: token.loc });
          break;

        case TokenType.COMMENT:
          this.advance();
          break;

        case TokenType.VARIABLE_START:
          body.push(this.parseOutput());
          break;

        case TokenType.BLOCK_START: {
          const keyword = this.peek(1);
          if (keyword.type === TokenType.NAME && terminators.includes(keyword.value)) {
            return body;
          }
          body.push(this.parseStatement());
          break;
        }

        default:
          throw this.error(`Unexpected token '${token.value}'`);
      }
    }
  }

  private parseOutput(): OutputStatement {
    const startToken = this.advance(); // {{
    const expression = this.parseExpression();
    this.expect(TokenType.VARIABLE_END, `Expected '}}' but found ${this.describe(this.peek())}`);
    return { type: 'OutputStatement', expression, loc: this.makeLoc(startToken) };
  }

  /**
   * Dispatch on the keyword of a `{% ... %}` tag
   */
  private parseStatement(): Statement {
    const startToken = this.advance(); // {%
    const keyword = this.peek();
    if (keyword.type !== TokenType.NAME) {
      throw this.error(`Expected statement keyword but found ${this.describe(keyword)}`);
    }

    switch (keyword.value) {
      case 'if':
        return this.parseIf(startToken);
      case 'for':
        return this.parseFor(startToken);
      case 'block':
        return this.parseBlock(startToken);
      case 'extends':
        return this.parseExtends(startToken);
      case 'include':
        return this.parseInclude(startToken);
      case 'import':
        return this.parseImport(startToken);
      case 'from':
        return this.parseFromImport(startToken);
      case 'set':
        return this.parseSet(startToken);
      case 'macro':
        return this.parseMacro(startToken);
      case 'call':
        return this.parseCallBlock(startToken);
      case 'filter':
        return this.parseFilterBlock(startToken);
      case 'with':
        return this.parseWith(startToken);
      default:
        throw this.strayTagError(keyword);
    }
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  private parseIf(startToken: Token): IfStatement {
    this.advance(); // if
    this.openBlocks.push({ tag: 'if', token: startToken });

    const branches: ConditionalBranch[] = [];
    let alternate: Statement[] | null = null;
    let branchStart = startToken;

    let test = this.parseExpression();
    this.expectBlockEnd();

    while (true) {
      const body = this.parseBody(['elif', 'else', 'endif']);
      branches.push({ test, body, loc: this.makeLoc(branchStart) });

      branchStart = this.advance(); // {%
      const tag = this.advance().value;
      if (tag === 'elif') {
        test = this.parseExpression();
        this.expectBlockEnd();
        continue;
      }
      if (tag === 'else') {
        this.expectBlockEnd();
        alternate = this.parseBody(['endif']);
        this.closeBlock('endif');
      } else {
        this.expectBlockEnd();
      }
      break;
    }

    this.openBlocks.pop();
    return { type: 'IfStatement', branches, alternate, loc: this.makeLoc(startToken) };
  }

  private parseFor(startToken: Token): ForStatement {
    this.advance(); // for
    this.openBlocks.push({ tag: 'for', token: startToken });

    const target = this.parseAssignTarget(false);
    this.expectName('in');
    const iter = this.parseExpression(false);
    const filter = this.matchName('if') ? this.parseExpression(false) : null;
    const recursive = this.matchName('recursive');
    this.expectBlockEnd();

    const body = this.parseBody(['else', 'endfor']);
    let alternate: Statement[] | null = null;
    if (this.checkName('else', 1)) {
      this.advance(); // {%
      this.advance(); // else
      this.expectBlockEnd();
      alternate = this.parseBody(['endfor']);
    }
    this.closeBlock('endfor');

    this.openBlocks.pop();
    return {
      type: 'ForStatement',
      target,
      iter,
      filter,
      recursive,
      body,
      alternate,
      loc: this.makeLoc(startToken),
    };
  }

  private parseBlock(startToken: Token): BlockStatement {
    this.advance(); // block
    const nameToken = this.peek();
    const name = this.expectIdentifier('block name');
    if (this.blocks.has(name)) {
      throw this.error(`Duplicate block '${name}'`, nameToken);
    }
    const scoped = this.matchName('scoped');
    this.expectBlockEnd();

    this.openBlocks.push({ tag: 'block', token: startToken });
    const body = this.parseBody(['endblock']);
    this.closeBlock('endblock', name);
    this.openBlocks.pop();

    if (this.blocks.has(name)) {
      throw this.error(`Duplicate block '${name}'`, nameToken);
    }
    const block: BlockStatement = {
      type: 'BlockStatement',
      name,
      scoped,
      body,
      loc: this.makeLoc(startToken),
    };
    this.blocks.set(name, block);
    return block;
  }

  private parseExtends(startToken: Token): ExtendsStatement {
    const keyword = this.advance(); // extends
    if (this.openBlocks.length > 0) {
      throw this.error("'extends' must be used at the top level of a template", keyword);
    }
    if (this.parent !== null) {
      throw this.error('A template can only extend one parent', keyword);
    }

    const nameToken = this.expect(
      TokenType.STRING,
      `Expected parent template name string but found ${this.describe(this.peek())}`,
    );
    this.expectBlockEnd();

    this.parent = nameToken.value;
    return { type: 'ExtendsStatement', parent: nameToken.value, loc: this.makeLoc(startToken) };
  }

  private parseInclude(startToken: Token): IncludeStatement {
    this.advance(); // include
    const template = this.parseExpression();

    let ignoreMissing = false;
    if (this.matchName('ignore')) {
      this.expectName('missing');
      ignoreMissing = true;
    }
    const withContext = this.parseContextModifier(true);
    this.expectBlockEnd();

    return {
      type: 'IncludeStatement',
      template,
      ignoreMissing,
      withContext,
      loc: this.makeLoc(startToken),
    };
  }

  private parseImport(startToken: Token): ImportStatement {
    this.advance(); // import
    const template = this.parseExpression();
    this.expectName('as');
    const alias = this.expectIdentifier('import alias');
    this.expectBlockEnd();
    return { type: 'ImportStatement', template, alias, loc: this.makeLoc(startToken) };
  }

  private parseFromImport(startToken: Token): FromImportStatement {
    this.advance(); // from
    const template = this.parseExpression();
    this.expectName('import');

    const names: ImportName[] = [];
    do {
      if (this.check(TokenType.BLOCK_END)) break; // trailing comma
      const name = this.expectIdentifier('imported name');
      const alias = this.matchName('as') ? this.expectIdentifier('import alias') : name;
      names.push({ name, alias });
    } while (this.match(TokenType.COMMA));

    if (names.length === 0) {
      throw this.error('Expected at least one name to import');
    }
    this.expectBlockEnd();
    return { type: 'FromImportStatement', template, names, loc: this.makeLoc(startToken) };
  }

  private parseSet(startToken: Token): SetStatement | SetBlockStatement {
    this.advance(); // set
    const target = this.parseAssignTarget(true);

    if (this.match(TokenType.ASSIGN)) {
      const value = this.parseTupleOrExpression();
      this.expectBlockEnd();
      return { type: 'SetStatement', target, value, loc: this.makeLoc(startToken) };
    }

    // Block form: {% set name | filter %}...{% endset %}
    const filters: FilterCall[] = [];
    while (this.match(TokenType.PIPE)) {
      filters.push(this.parseFilterCall());
    }
    this.expectBlockEnd();

    this.openBlocks.push({ tag: 'set', token: startToken });
    const body = this.parseBody(['endset']);
    this.closeBlock('endset');
    this.openBlocks.pop();

    return { type: 'SetBlockStatement', target, filters, body, loc: this.makeLoc(startToken) };
  }

  private parseMacro(startToken: Token): MacroStatement {
    this.advance(); // macro
    const name = this.expectIdentifier('macro name');
    const params = this.parseParams();
    this.expectBlockEnd();

    this.openBlocks.push({ tag: 'macro', token: startToken });
    const body = this.parseBody(['endmacro']);
    this.closeBlock('endmacro', name);
    this.openBlocks.pop();

    return { type: 'MacroStatement', name, params, body, loc: this.makeLoc(startToken) };
  }

  private parseCallBlock(startToken: Token): CallBlockStatement {
    this.advance(); // call
    const params = this.check(TokenType.LPAREN) ? this.parseParams() : [];
    const callToken = this.peek();
    const call = this.asCall(this.parseExpression(), callToken);
    this.expectBlockEnd();

    this.openBlocks.push({ tag: 'call', token: startToken });
    const body = this.parseBody(['endcall']);
    this.closeBlock('endcall');
    this.openBlocks.pop();

    return { type: 'CallBlockStatement', call, params, body, loc: this.makeLoc(startToken) };
  }

  private parseFilterBlock(startToken: Token): FilterBlockStatement {
    this.advance(); // filter
    const filters: FilterCall[] = [this.parseFilterCall()];
    while (this.match(TokenType.PIPE)) {
      filters.push(this.parseFilterCall());
    }
    this.expectBlockEnd();

    this.openBlocks.push({ tag: 'filter', token: startToken });
    const body = this.parseBody(['endfilter']);
    this.closeBlock('endfilter');
    this.openBlocks.pop();

    return { type: 'FilterBlockStatement', filters, body, loc: this.makeLoc(startToken) };
  }

  private parseWith(startToken: Token): WithStatement {
    this.advance(); // with
    const assignments: WithAssignment[] = [];

    while (!this.check(TokenType.BLOCK_END)) {
      const target = this.parseAssignTarget(false);
      this.expect(TokenType.ASSIGN, `Expected '=' but found ${this.describe(this.peek())}`);
      assignments.push({ target, value: this.parseExpression() });
      if (!this.match(TokenType.COMMA)) break;
    }
    this.expectBlockEnd();

    this.openBlocks.push({ tag: 'with', token: startToken });
    const body = this.parseBody(['endwith']);
    this.closeBlock('endwith');
    this.openBlocks.pop();

    return { type: 'WithStatement', assignments, body, loc: this.makeLoc(startToken) };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Parse `name`, `a, b`, `(a, b)` or (for set) `ns.attr`
   */
  private parseAssignTarget(allowAttribute: boolean): AssignTarget {
    const parenthesized = this.match(TokenType.LPAREN);
    const first = this.expectIdentifier('variable name');

    if (!parenthesized && allowAttribute && this.match(TokenType.DOT)) {
      const name = this.expectIdentifier('attribute name');
      return { kind: 'attribute', object: first, name };
    }

    const names = [first];
    while (this.match(TokenType.COMMA)) {
      if (parenthesized && this.check(TokenType.RPAREN)) break;
      names.push(this.expectIdentifier('variable name'));
    }
    if (parenthesized) {
      this.expect(TokenType.RPAREN, `Expected ')' but found ${this.describe(this.peek())}`);
    }

    return names.length === 1 && !parenthesized
      ? { kind: 'name', name: first }
      : { kind: 'tuple', names };
  }

  /**
   * Parse `(a, b=1)` parameter lists of macros and call blocks
   */
  private parseParams(): MacroParam[] {
    this.expect(TokenType.LPAREN, `Expected '(' but found ${this.describe(this.peek())}`);
    const params: MacroParam[] = [];

    while (!this.check(TokenType.RPAREN)) {
      const nameToken = this.peek();
      const name = this.expectIdentifier('parameter name');
      if (params.some((param) => param.name === name)) {
        throw this.error(`Duplicate parameter '${name}'`, nameToken);
      }

      if (this.match(TokenType.ASSIGN)) {
        params.push({ name, default: this.parseExpression() });
      } else {
        if (params.some((param) => param.default !== null)) {
          throw this.error(`Parameter '${name}' without default follows a parameter with default`, nameToken);
        }
        params.push({ name, default: null });
      }

      if (!this.match(TokenType.COMMA)) break;
    }

    this.expect(TokenType.RPAREN, `Expected ')' but found ${this.describe(this.peek())}`);
    return params;
  }

  /**
   * Parse an optional `with context` / `without context` suffix
   */
  private parseContextModifier(defaultValue: boolean): boolean {
    if (this.matchName('with')) {
      this.expectName('context');
      return true;
    }
    if (this.matchName('without')) {
      this.expectName('context');
      return false;
    }
    return defaultValue;
  }

  private expectBlockEnd(): void {
    this.expect(
      TokenType.BLOCK_END,
      `Expected end of statement '%}' but found ${this.describe(this.peek())}`,
    );
  }

  /**
   * Consume `{% endtag [name] %}`. parseBody has already stopped at it.
   */
  private closeBlock(endTag: string, name?: string): void {
    this.advance(); // {%
    const tagToken = this.peek();
    if (tagToken.type !== TokenType.NAME || tagToken.value !== endTag) {
      throw this.error(
        `Block closing tag mismatch: expected ${endTag} but found ${tagToken.value}`,
        tagToken,
      );
    }
    this.advance();

    if (name !== undefined && this.check(TokenType.NAME)) {
      const closingName = this.advance();
      if (closingName.value !== name) {
        throw this.error(
          `Block closing tag mismatch: expected ${endTag} ${name} but found ${endTag} ${closingName.value}`,
          closingName,
        );
      }
    }

    this.expectBlockEnd();
  }

  /**
   * Error for `end*`, `elif` or `else` where no open construct accepts it, or
   * for an unknown keyword
   */
  private strayTagError(keyword: Token): ParseError {
    const tag = keyword.value;
    const isClosing = tag.startsWith('end') || CONTINUATION_TAGS.has(tag);
    if (!isClosing) {
      return this.error(`Unknown statement '${tag}'`, keyword);
    }

    const open = this.openBlocks[this.openBlocks.length - 1];
    if (!open) {
      return this.error(`Unexpected '${tag}' without a matching opening tag`, keyword);
    }
    return this.error(`Block closing tag mismatch: expected end${open.tag} but found ${tag}`, keyword);
  }

  private unclosedBlockError(): ParseError {
    const open = this.openBlocks[this.openBlocks.length - 1];
    if (!open) {
      return this.error('Unexpected end of template');
    }
    return this.error(
      `Unclosed block: ${open.tag} opened at line ${open.token.loc.start.line} was never closed`,
      open.token,
    );
  }
}

/**
 * Parse template source into a Program in one step
 */
export function parse(source: string, lexer: Lexer = new Lexer()): Program {
  const parser = new Parser(lexer);
  parser.setInput(source);
  return parser.parse();
}
