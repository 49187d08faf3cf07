import { TemplateError } from '../errors';
import type { Token } from '../lexer/token';

const CONTEXT_LIMIT = 50;

/**
 * Error thrown by the parser when encountering invalid syntax
 * Includes position information and context for debugging
 */
export class ParseError extends TemplateError {
  readonly context: string | null;

  constructor(message: string, token: Token | null, context?: string | null) {
    super(message, { position: token?.loc.start ?? null });
    this.context = context ?? null;
  }

  /**
   * Create a ParseError with automatic context extraction from token
   */
  static fromToken(message: string, token: Token | null, contextTokens?: Token[]): ParseError {
    let context: string | null = null;

    if (contextTokens && contextTokens.length > 0) {
      // Build context from surrounding tokens
      context = contextTokens
        .map((t) => t.value || `[${t.type}]`)
        .join(' ')
        .slice(0, CONTEXT_LIMIT);

      if (context.length === CONTEXT_LIMIT) {
        context += '...';
      }
    } else if (token && token.value !== '') {
      context = token.value.slice(0, CONTEXT_LIMIT);
      if (token.value.length > CONTEXT_LIMIT) {
        context += '...';
      }
    }

    return new ParseError(message, token, context);
  }
}
