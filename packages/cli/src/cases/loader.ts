/**
 * Fixture case loading
 *
 * A case is a directory under the cases root:
 *
 *   cases/<id>/template.txt   entry template
 *   cases/<id>/*.txt, *.html  further templates, registered by file name
 *   cases/<id>/context.yaml   render context (optional)
 *   cases/<id>/expected.txt   expected output (optional)
 */

import type { ValueMap } from '@tessera/templates';
import { glob } from 'glob';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

export const ENTRY_TEMPLATE = 'template.txt';
const CONTEXT_FILE = 'context.yaml';
const EXPECTED_FILE = 'expected.txt';

export interface CaseDefinition {
  id: string;
  dir: string;
  /** Template sources by file name, the entry template included */
  templates: Record<string, string>;
  context: ValueMap;
  /** Expected output with one trailing newline removed, or null */
  expected: string | null;
}

/**
 * Raised when a case directory is missing or malformed
 */
export class CaseLoadError extends Error {
  constructor(
    message: string,
    readonly caseId: string,
  ) {
    super(message);
    this.name = 'CaseLoadError';
  }
}

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

const jsonSchema: z.ZodType<Json> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonSchema), z.record(jsonSchema)]),
);

const contextSchema = z.record(jsonSchema);

/**
 * Case ids under a cases root, sorted
 */
export async function listCases(casesDir: string): Promise<string[]> {
  const entries = await glob(`*/${ENTRY_TEMPLATE}`, {
    cwd: casesDir,
    posix: true,
  });
  return entries.map((entry) => entry.split('/')[0]).sort();
}

export async function loadCase(casesDir: string, id: string): Promise<CaseDefinition> {
  const dir = path.resolve(casesDir, id);
  const relative = path.relative(path.resolve(casesDir), dir);
  if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new CaseLoadError(`Invalid case id '${id}'`, id);
  }

  const files = await glob('*.{txt,html}', { cwd: dir, nodir: true });
  if (!files.includes(ENTRY_TEMPLATE)) {
    throw new CaseLoadError(`Case '${id}' has no ${ENTRY_TEMPLATE} in ${dir}`, id);
  }

  const templates: Record<string, string> = {};
  for (const file of files.sort()) {
    if (file === EXPECTED_FILE) continue;
    templates[file] = await fs.readFile(path.join(dir, file), 'utf-8');
  }

  return {
    id,
    dir,
    templates,
    context: await readContext(dir, id),
    expected: await readExpected(dir),
  };
}

async function readContext(dir: string, id: string): Promise<ValueMap> {
  const source = await readOptional(path.join(dir, CONTEXT_FILE));
  if (source === null || source.trim() === '') {
    return {};
  }

  let data: unknown;
  try {
    data = parseYaml(source);
  } catch (error) {
    throw new CaseLoadError(
      `Case '${id}': ${CONTEXT_FILE} is not valid YAML: ${error instanceof Error ? error.message : String(error)}`,
      id,
    );
  }

  const parsed = contextSchema.safeParse(data);
  if (!parsed.success) {
    throw new CaseLoadError(`Case '${id}': ${CONTEXT_FILE} must be a mapping of JSON values`, id);
  }
  return parsed.data;
}

async function readExpected(dir: string): Promise<string | null> {
  const expected = await readOptional(path.join(dir, EXPECTED_FILE));
  if (expected === null) {
    return null;
  }
  return expected.endsWith('\n') ? expected.slice(0, -1) : expected;
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}
