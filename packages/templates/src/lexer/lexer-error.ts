import { TemplateError } from '../errors';
import type { Position } from './token';

/**
 * Error thrown by the lexer when encountering invalid syntax
 * Includes position information for debugging
 */
export class LexError extends TemplateError {
  constructor(message: string, position: Position) {
    super(message, { position });
  }
}
