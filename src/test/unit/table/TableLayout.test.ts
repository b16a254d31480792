/**
 * Unit tests for TableLayout
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { TableContent } from '../../../lib/table/types';
import { createHarness, type LayoutHarness } from '../../helpers/layoutFixtures';

const SLOTS: TableContent = {
  title: 'Spell Slots',
  header: ['Level', 'Slots'],
  rows: [
    ['1st', '2'],
    ['2nd', '3']
  ]
};

function tallTable(rowCount: number): TableContent {
  return {
    title: '',
    header: null,
    rows: Array.from({ length: rowCount }, (_, i) => [`r${i}`])
  };
}

describe('TableLayout', () => {
  let harness: LayoutHarness;

  beforeEach(() => {
    harness = createHarness();
  });

  describe('plan()', () => {
    it('should centre the table in the region', () => {
      const plan = harness.tableLayout.plan(SLOTS, harness.region);

      expect(plan.nominalWidth).toBe(76);
      expect(plan.width).toBe(12);
      expect(plan.left).toBe(44);
      expect(plan.columns.map((c) => c.x)).toEqual([44, 51]);
    });

    it('should estimate the height with the same steps rendering takes', () => {
      const plan = harness.tableLayout.plan(SLOTS, harness.region);

      // title step 5 + 1, two row steps of 5 + 1, last line 4
      expect(plan.estimatedHeight).toBe(22);
      // title step 5 + 1, first grid line 4
      expect(plan.titleBlockHeight).toBe(10);
      expect(plan.rows.map((r) => r.offRow)).toEqual([false, false, true]);
      expect(plan.rows.map((r) => r.header)).toEqual([true, false, false]);
    });

    it('should wrap long cells and size the row by its tallest cell', () => {
      const words = Array.from({ length: 20 }, () => 'word').join(' ');
      const plan = harness.tableLayout.plan({ title: '', header: null, rows: [[words, 'x']] }, harness.region);

      // 'x' keeps width 1; the other column gets 76 - 2 - 1 = 73
      expect(plan.columns[1].width).toBe(1);
      expect(plan.columns[0].width).toBe(73);
      expect(plan.rows[0].cells[0]).toHaveLength(2);
      expect(plan.rows[0].lineCount).toBe(2);
      expect(plan.rows[0].height).toBe(9);
    });

    it('should count an all-empty row as one line', () => {
      const plan = harness.tableLayout.plan({ title: '', header: null, rows: [['a', 'b'], ['', '']] }, harness.region);

      expect(plan.rows[1].lineCount).toBe(1);
      expect(plan.rows[1].height).toBe(4);
    });
  });

  describe('render()', () => {
    it('should shade alternate body rows starting with the second', () => {
      harness.tableLayout.render(harness.cursor(), {
        title: '',
        header: ['h'],
        rows: [['a'], ['b'], ['c'], ['d']]
      });

      // rows at 280 (header), 274, 268, 262, 256; b and d are shaded
      expect(harness.renderer.lines.map((l) => l.y1)).toEqual([269, 257]);
    });

    it('should start a new page when the table fits on an empty page but not in the space left', () => {
      const cursor = harness.cursor({ y: 30 });
      const result = harness.tableLayout.render(cursor, SLOTS);

      expect(harness.renderer.texts[0]).toMatchObject({ text: 'Spell Slots', page: 1, y: 280 });
      expect(harness.renderer.texts.every((t) => t.page === 1)).toBe(true);
      expect(result.page).toEqual({ index: 1 });
    });

    it('should move a table to a new page when its rows need more than the space left', () => {
      // 9 row steps of 6 plus a line of 4: 58 against 50 left
      expect(harness.tableLayout.plan(tallTable(10), harness.region).estimatedHeight).toBe(58);

      harness.tableLayout.render(harness.cursor({ y: 70 }), tallTable(10));

      const texts = harness.renderer.texts;
      expect(texts.every((t) => t.page === 1)).toBe(true);
      expect(texts.find((t) => t.text === 'r0')).toMatchObject({ page: 1, y: 280 });
      expect(texts.find((t) => t.text === 'r9')).toMatchObject({ page: 1, y: 226 });
      expect(harness.renderer.pages).toHaveLength(2);
    });

    it('should keep a table on the page when its last line fits', () => {
      harness.tableLayout.render(harness.cursor({ y: 70 }), tallTable(8));

      expect(harness.renderer.texts.find((t) => t.text === 'r7')).toMatchObject({ page: 0, y: 28 });
      expect(harness.renderer.pages).toHaveLength(1);
    });

    it('should not leave a title alone at the bottom of a page', () => {
      harness.tableLayout.render(harness.cursor({ y: 25 }), { ...tallTable(60), title: 'Tall' });

      const texts = harness.renderer.texts;
      expect(texts[0]).toMatchObject({ text: 'Tall', page: 1, y: 280 });
      expect(texts.find((t) => t.text === 'r0')).toMatchObject({ page: 1, y: 274 });
      expect(texts.filter((t) => t.page === 0)).toEqual([]);
    });

    it('should split a table taller than a page across pages', () => {
      harness.tableLayout.render(harness.cursor(), tallTable(60));

      const texts = harness.renderer.texts;
      expect(texts.filter((t) => t.page === 0)).toHaveLength(44);
      expect(texts.find((t) => t.text === 'r43')).toMatchObject({ page: 0, y: 22 });
      expect(texts.find((t) => t.text === 'r44')).toMatchObject({ page: 1, y: 280 });
      expect(harness.renderer.pages).toHaveLength(2);
    });

    it('should draw every shading line on the page and line of its row', () => {
      harness.tableLayout.render(harness.cursor(), tallTable(60));

      const { texts, lines } = harness.renderer;
      expect(lines).toHaveLength(30);
      for (const line of lines) {
        const row = texts.find((t) => t.page === line.page && t.y === line.y1 - 1);
        expect(row).toBeDefined();
        expect(Number(row?.text.slice(1)) % 2).toBe(1);
      }
    });

    it('should leave the cursor at the last row, right of the table', () => {
      const result = harness.tableLayout.render(harness.cursor(), SLOTS);

      expect(result.y).toBe(262);
      expect(result.x).toBe(56);
    });

    it('should draw nothing for an empty table', () => {
      const result = harness.tableLayout.render(harness.cursor(), { title: '', header: null, rows: [] });

      expect(harness.renderer.texts).toEqual([]);
      expect(harness.renderer.lines).toEqual([]);
      expect(result.y).toBe(280);
    });
  });
});
