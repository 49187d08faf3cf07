/**
 * Case result reporter
 */

import chalk from 'chalk';
import type { CaseResult } from './executor';

export interface ReporterOptions {
  format: 'pretty' | 'json';
  verbose?: boolean;
  noColor?: boolean;
}

type Colors = Record<'green' | 'red' | 'yellow' | 'gray' | 'cyan' | 'bold', (s: string) => string>;

const plain: Colors = {
  green: (s) => s,
  red: (s) => s,
  yellow: (s) => s,
  gray: (s) => s,
  cyan: (s) => s,
  bold: (s) => s,
};

export function colors(noColor?: boolean): Colors {
  return noColor ? plain : chalk;
}

/**
 * Format duration in human readable form
 */
function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}

function getStatusIcon(status: CaseResult['status'], c: Colors): string {
  switch (status) {
    case 'passed':
      return c.green('✓');
    case 'failed':
      return c.red('✗');
    case 'error':
      return c.red('!');
    case 'rendered':
      return c.yellow('○');
  }
}

/**
 * First line where two texts differ, 1-indexed
 */
export function firstDifference(expected: string, actual: string): { line: number; expected: string; actual: string } | null {
  const expectedLines = expected.split('\n');
  const actualLines = actual.split('\n');
  const length = Math.max(expectedLines.length, actualLines.length);
  for (let i = 0; i < length; i++) {
    if (expectedLines[i] !== actualLines[i]) {
      return { line: i + 1, expected: expectedLines[i] ?? '<end of output>', actual: actualLines[i] ?? '<end of output>' };
    }
  }
  return null;
}

/**
 * Report case results in pretty format
 */
function reportPretty(results: CaseResult[], options: ReporterOptions): void {
  const c = colors(options.noColor);
  const count = (status: CaseResult['status']) => results.filter((r) => r.status === status).length;
  const totalDuration = results.reduce((sum, r) => sum + r.durationMs, 0);

  console.log();

  for (const result of results) {
    console.log(`  ${getStatusIcon(result.status, c)} ${result.id} ${c.gray(`(${formatDuration(result.durationMs)})`)}`);

    if (result.status === 'failed' && result.output !== undefined && result.expected !== undefined) {
      const diff = firstDifference(result.expected, result.output);
      if (diff) {
        console.log(c.red(`      ✗ line ${diff.line} differs`));
        console.log(c.gray(`        Expected: ${JSON.stringify(diff.expected)}`));
        console.log(c.gray(`        Actual:   ${JSON.stringify(diff.actual)}`));
      }
      if (options.verbose) {
        console.log(c.gray(result.output.split('\n').map((l) => `        | ${l}`).join('\n')));
      }
    }

    if (result.status === 'error' && result.error) {
      console.log(c.red(`      Error: ${result.error.message}`));
      if (options.verbose && result.error.stack) {
        console.log(c.gray(result.error.stack.split('\n').map((l) => `        ${l}`).join('\n')));
      }
    }
  }

  console.log();
  console.log(`  ${c.bold(c.green(`${count('passed')} passing`))} ${c.gray(`(${formatDuration(totalDuration)})`)}`);

  if (count('failed') > 0) {
    console.log(`  ${c.bold(c.red(`${count('failed')} failing`))}`);
  }

  if (count('rendered') > 0) {
    console.log(`  ${c.yellow(`${count('rendered')} without expected output`)}`);
  }

  if (count('error') > 0) {
    console.log(`  ${c.red(`${count('error')} errors`)}`);
  }

  console.log();
}

/**
 * Report case results in JSON format
 */
function reportJson(results: CaseResult[]): void {
  const output = {
    summary: {
      cases: results.length,
      passed: results.filter((r) => r.status === 'passed').length,
      failed: results.filter((r) => r.status === 'failed').length,
      errors: results.filter((r) => r.status === 'error').length,
      rendered: results.filter((r) => r.status === 'rendered').length,
      durationMs: results.reduce((sum, r) => sum + r.durationMs, 0),
    },
    cases: results.map((result) => ({
      id: result.id,
      status: result.status,
      durationMs: result.durationMs,
      output: result.output,
      expected: result.expected,
      error: result.error ? { name: result.error.name, message: result.error.message } : undefined,
    })),
  };

  console.log(JSON.stringify(output, null, 2));
}

/**
 * Report case results
 */
export function reportResults(results: CaseResult[], options: ReporterOptions): void {
  if (options.format === 'json') {
    reportJson(results);
  } else {
    reportPretty(results, options);
  }
}

/**
 * Get exit code based on results
 */
export function getExitCode(results: CaseResult[]): number {
  const hasFailures = results.some((r) => r.status === 'failed' || r.status === 'error');
  return hasFailures ? 1 : 0;
}
