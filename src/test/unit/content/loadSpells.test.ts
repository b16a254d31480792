/**
 * Unit tests for spell content loading
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { loadSpellFile, loadSpellFolder } from '../../../lib/content/loadSpells';
import { spellSchema } from '../../../lib/content/schema';
import { ContentError, LayoutErrorCode } from '../../../lib/errors';

function spellJson(name: string, extra: Record<string, unknown> = {}) {
  return {
    name,
    level: 1,
    school: 'abjuration',
    castingTime: { kind: 'action', amount: 1 },
    range: { kind: 'self' },
    components: { verbal: true, somatic: true },
    duration: { kind: 'time', amount: 1, unit: 'round' },
    description: 'A test spell.',
    ...extra
  };
}

describe('spellSchema', () => {
  it('should fill in defaults for ritual and tables', () => {
    const spell = spellSchema.parse(spellJson('Ward'));

    expect(spell.ritual).toBe(false);
    expect(spell.tables).toEqual([]);
  });

  it('should accept plain strings for controlled fields', () => {
    const spell = spellSchema.parse(spellJson('Ward', { range: 'Sight', duration: 'Until your next turn' }));

    expect(spell.range).toBe('Sight');
    expect(spell.duration).toBe('Until your next turn');
  });

  it('should reject levels outside 0..9', () => {
    expect(spellSchema.safeParse(spellJson('Ward', { level: 10 })).success).toBe(false);
    expect(spellSchema.safeParse(spellJson('Ward', { level: 2.5 })).success).toBe(false);
  });

  it('should reject unknown schools', () => {
    expect(spellSchema.safeParse(spellJson('Ward', { school: 'chronomancy' })).success).toBe(false);
  });
});

describe('loading spell files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'spellbook-content-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read a single spell', async () => {
    const path = join(dir, 'ward.json');
    await writeFile(path, JSON.stringify(spellJson('Ward')));

    const spells = await loadSpellFile(path);

    expect(spells.map((s) => s.name)).toEqual(['Ward']);
  });

  it('should read an array of spells', async () => {
    const path = join(dir, 'many.json');
    await writeFile(path, JSON.stringify([spellJson('One'), spellJson('Two')]));

    expect((await loadSpellFile(path)).map((s) => s.name)).toEqual(['One', 'Two']);
  });

  it('should name the offending field', async () => {
    const path = join(dir, 'bad.json');
    await writeFile(path, JSON.stringify([spellJson('One'), spellJson('Two', { level: 12 })]));

    await expect(loadSpellFile(path)).rejects.toThrow(
      `Invalid spell in ${path}: 1.level must be a whole number from 0 to 9`
    );
  });

  it('should report files that are not JSON', async () => {
    const path = join(dir, 'notes.json');
    await writeFile(path, 'not json');

    let caught: unknown;
    try {
      await loadSpellFile(path);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ContentError);
    expect(caught).toMatchObject({
      code: LayoutErrorCode.INVALID_CONTENT,
      message: `Spell file ${path} is not valid JSON`
    });
  });

  it('should read every JSON file of a folder in name order', async () => {
    await writeFile(join(dir, 'b.json'), JSON.stringify([spellJson('Bravo'), spellJson('Charlie')]));
    await writeFile(join(dir, 'a.json'), JSON.stringify(spellJson('Alpha')));
    await writeFile(join(dir, 'readme.txt'), 'ignored');

    const spells = await loadSpellFolder(dir);

    expect(spells.map((s) => s.name)).toEqual(['Alpha', 'Bravo', 'Charlie']);
  });
});
