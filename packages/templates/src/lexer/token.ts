import type { TokenType } from './token-types';

/**
 * Position in template source
 */
export interface Position {
  line: number; // Line number (1-based)
  column: number; // Column number (0-based)
  index: number; // Character index (0-based)
}

/**
 * Source location with start and end positions
 */
export interface SourceLocation {
  start: Position; // Starting position
  end: Position; // Ending position
}

/**
 * Token produced by lexer
 */
export interface Token {
  readonly type: TokenType; // The token type
  readonly value: string; // The lexeme (decoded for strings)
  readonly loc: SourceLocation; // Where the lexeme sits in the source
}
