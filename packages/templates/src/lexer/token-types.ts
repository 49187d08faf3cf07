/**
 * Token types for the Jinja-compatible template lexer
 */

export const TokenType = {
  // Raw text between tags
  TEXT: 'TEXT',

  // Delimiters
  VARIABLE_START: 'VARIABLE_START', // {{
  VARIABLE_END: 'VARIABLE_END', // }}
  BLOCK_START: 'BLOCK_START', // {%
  BLOCK_END: 'BLOCK_END', // %}
  COMMENT: 'COMMENT', // {# ... #}

  // Identifiers and literals
  NAME: 'NAME', // foo, endfor, true
  STRING: 'STRING', // 'text' or "text"
  INTEGER: 'INTEGER', // 42
  FLOAT: 'FLOAT', // 4.2, 1e3

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  FLOOR_DIV: 'FLOOR_DIV', // //
  PERCENT: 'PERCENT', // %
  POWER: 'POWER', // **
  TILDE: 'TILDE', // ~

  // Comparison operators
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  LTE: 'LTE', // <=
  GT: 'GT', // >
  GTE: 'GTE', // >=

  // Punctuation
  ASSIGN: 'ASSIGN', // =
  PIPE: 'PIPE', // |
  DOT: 'DOT', // .
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }

  // End of input
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];
