/**
 * End-to-end test: spells in, PDF bytes out
 */
import { describe, it, expect, vi } from 'vitest';
import { PDFDict, PDFDocument, PDFName, PDFNumber } from 'pdf-lib';
import { createLayoutConfig } from '../../../lib/config/loadConfig';
import type { Spell } from '../../../lib/content/types';
import { createSpellbook } from '../../../lib/core/createSpellbook';

const spell: Spell = {
  name: 'Spark Ward',
  level: 2,
  school: 'abjuration',
  ritual: false,
  castingTime: { kind: 'reaction', trigger: 'a creature you can see casts a spell' },
  range: { kind: 'feet', distance: 60 },
  components: { verbal: true, somatic: true, material: 'a copper wire' },
  duration: { kind: 'instantaneous' },
  description: 'The spell fizzles.\n- One creature is warded.\n[table][0]',
  upcastDescription: 'The ward covers one more creature per slot level above 2.',
  tables: [{ title: 'Sparks', columnLabels: ['d4', 'Effect'], cells: [['1', 'Smoke'], ['2', 'Light']] }]
};

describe('createSpellbook()', () => {
  it('should produce a titled PDF with a title page and one page per spell', async () => {
    const onPageAdded = vi.fn();

    const bytes = await createSpellbook({
      title: 'Test Book',
      spells: [spell],
      config: createLayoutConfig(),
      onPageAdded
    });

    const loaded = await PDFDocument.load(bytes);
    expect(loaded.getPageCount()).toBe(2);
    expect(loaded.getTitle()).toBe('Test Book');
    expect(onPageAdded).toHaveBeenCalledTimes(2);
    expect(onPageAdded.mock.calls.map(([event]) => event.number)).toEqual([null, 1]);
    const outlines = loaded.catalog.lookup(PDFName.of('Outlines'), PDFDict);
    expect(outlines.lookup(PDFName.of('Count'), PDFNumber).asNumber()).toBe(2);
  });

  it('should produce only a title page without spells', async () => {
    const bytes = await createSpellbook({
      title: 'Empty',
      spells: [],
      config: createLayoutConfig()
    });

    expect((await PDFDocument.load(bytes)).getPageCount()).toBe(1);
  });
});
