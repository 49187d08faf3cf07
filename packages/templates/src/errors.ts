/**
 * Error types for templates
 *
 * Every failure raised by the engine extends TemplateError and carries the
 * source position where it happened (when one is known).
 */

import type { Position } from './lexer/token';

export interface TemplateErrorOptions {
  position?: Position | null;
  templateName?: string | null;
  cause?: unknown;
  /** Full message; defaults to the detail prefixed with the position */
  message?: string;
}

function formatMessage(detail: string, position: Position | null): string {
  // Display 1-indexed column for user-facing error messages (editors show 1-indexed)
  return position
    ? `Error at line ${position.line}, column ${position.column + 1}: ${detail}`
    : detail;
}

/**
 * Base class for template errors
 */
export abstract class TemplateError extends Error {
  /** Message without the position prefix */
  readonly detail: string;
  /** Position where the error occurred (if available) */
  readonly position: Position | null;
  /** Template the error belongs to (if known) */
  readonly templateName: string | null;

  constructor(detail: string, options: TemplateErrorOptions = {}) {
    const position = options.position ?? null;
    super(
      options.message ?? formatMessage(detail, position),
      options.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = new.target.name;
    this.detail = detail;
    this.position = position;
    this.templateName = options.templateName ?? null;

    // Maintains proper stack trace for where error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get line(): number {
    return this.position?.line ?? 0;
  }

  get column(): number {
    return this.position?.column ?? 0;
  }

  get index(): number {
    return this.position?.index ?? 0;
  }
}

/**
 * Thrown when a template name cannot be resolved or an `extends` chain loops
 */
export class ResolveError extends TemplateError {
  /** Template names visited before the failure, in walk order */
  readonly chain: readonly string[];

  constructor(detail: string, templateName: string, chain: readonly string[] = []) {
    super(detail, { templateName });
    this.chain = chain;
  }
}

/**
 * Thrown while evaluating expressions: undefined variables in strict mode,
 * type mismatches, unknown filters and the like
 */
export class EvalError extends TemplateError {
  constructor(detail: string, position: Position | null = null, cause?: unknown) {
    super(detail, { position, cause });
  }
}

/**
 * Wraps the first failure of a render call with the template name and the
 * position of the innermost node being rendered
 */
export class RenderError extends TemplateError {
  constructor(templateName: string, position: Position | null, cause: unknown) {
    const detail = cause instanceof TemplateError ? cause.detail : describeCause(cause);
    const where = position ? ` (line ${position.line}, column ${position.column + 1})` : '';
    super(detail, {
      position,
      templateName,
      cause,
      message: `Failed to render '${templateName}'${where}: ${detail}`,
    });
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
