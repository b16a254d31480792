import { readFile } from 'fs/promises';
import { glob } from 'fast-glob';
import type { ZodIssue } from 'zod';
import { ContentError } from '../errors';
import { spellListSchema, spellSchema } from './schema';
import type { Spell } from './types';

/**
 * Read one content file holding a spell or an array of spells.
 */
export async function loadSpellFile(path: string): Promise<Spell[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    throw new ContentError(`Unable to read spell file ${path}`, error);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ContentError(`Spell file ${path} is not valid JSON`, error);
  }

  // A file holds one spell or an array of spells.
  const result = Array.isArray(json) ? spellListSchema.safeParse(json) : spellSchema.safeParse(json);
  if (!result.success) {
    throw new ContentError(`Invalid spell in ${path}: ${formatIssue(result.error.issues[0])}`, result.error.issues);
  }
  return Array.isArray(result.data) ? result.data : [result.data];
}

/**
 * Read every `*.json` file directly inside `dir`, in file name order.
 */
export async function loadSpellFolder(dir: string): Promise<Spell[]> {
  const files = await glob('*.json', { cwd: dir, absolute: true, onlyFiles: true });
  files.sort();

  const spells: Spell[] = [];
  for (const file of files) {
    spells.push(...(await loadSpellFile(file)));
  }
  return spells;
}

function formatIssue(issue: ZodIssue | undefined): string {
  if (!issue) {
    return 'does not match the spell schema';
  }
  const path = issue.path.join('.');
  return path ? `${path} ${issue.message}` : issue.message;
}
