import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/** Files of one case directory by file name */
export type CaseFiles = Record<string, string>;

/**
 * Write case directories into a fresh temporary directory and return its path
 */
export async function createCasesDir(cases: Record<string, CaseFiles>): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), 'tessera-cases-'));
  await writeCases(root, cases);
  return root;
}

export async function writeCases(root: string, cases: Record<string, CaseFiles>): Promise<void> {
  for (const [id, files] of Object.entries(cases)) {
    await mkdir(join(root, id), { recursive: true });
    for (const [name, content] of Object.entries(files)) {
      await writeFile(join(root, id, name), content, 'utf8');
    }
  }
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
