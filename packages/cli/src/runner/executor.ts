/**
 * Case runner - renders fixture cases through the template engine
 *
 * 1. Load the case directory (templates, context, expected output)
 * 2. Register every template in a fresh Environment
 * 3. Render the entry template
 * 4. Compare with the expected output, when the case has one
 */

import type { Logger } from '@tessera/logger';
import { Environment, type UndefinedBehavior } from '@tessera/templates';
import { ENTRY_TEMPLATE, loadCase, type CaseDefinition } from '../cases/loader';

// =============================================================================
// Types
// =============================================================================

/**
 * Result of a single case
 */
export interface CaseResult {
  id: string;
  /** `rendered` means the case has no expected output to compare against */
  status: 'passed' | 'failed' | 'error' | 'rendered';
  durationMs: number;
  output?: string;
  expected?: string;
  error?: Error;
}

/**
 * Options for running cases
 */
export interface CaseRunOptions {
  undefinedBehavior?: UndefinedBehavior;
  autoescape?: boolean;
  logger?: Logger;
  failFast?: boolean;
}

// =============================================================================
// Running
// =============================================================================

/**
 * Render a loaded case
 */
export function renderCase(definition: CaseDefinition, options: CaseRunOptions = {}): CaseResult {
  const start = Date.now();
  const logger = options.logger;

  try {
    const environment = new Environment({
      undefinedBehavior: options.undefinedBehavior,
      autoescape: options.autoescape,
      logger,
    });
    for (const [name, source] of Object.entries(definition.templates)) {
      environment.registerTemplate(name, source);
    }

    const output = environment.render(ENTRY_TEMPLATE, definition.context);
    const durationMs = Date.now() - start;

    if (definition.expected === null) {
      return { id: definition.id, status: 'rendered', durationMs, output };
    }
    return {
      id: definition.id,
      status: output === definition.expected ? 'passed' : 'failed',
      durationMs,
      output,
      expected: definition.expected,
    };
  } catch (error) {
    logger?.error('case_failed', { case: definition.id, error });
    return {
      id: definition.id,
      status: 'error',
      durationMs: Date.now() - start,
      expected: definition.expected ?? undefined,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

/**
 * Load and render cases in order. Load failures become `error` results.
 */
export async function runCases(
  casesDir: string,
  ids: string[],
  options: CaseRunOptions = {},
): Promise<CaseResult[]> {
  const results: CaseResult[] = [];

  for (const id of ids) {
    let result: CaseResult;
    try {
      result = renderCase(await loadCase(casesDir, id), options);
    } catch (error) {
      options.logger?.error('case_load_failed', { case: id, error });
      result = {
        id,
        status: 'error',
        durationMs: 0,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
    results.push(result);

    if (options.failFast && (result.status === 'failed' || result.status === 'error')) {
      break;
    }
  }

  return results;
}
