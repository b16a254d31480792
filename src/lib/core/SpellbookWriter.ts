import type { LayoutConfig } from '../config';
import { castingTimeText, componentsText, durationText, levelSchoolText, rangeText, tableFromRecord } from '../content/display';
import type { Spell } from '../content/types';
import { regionHeight, regionWidth } from '../layout/FlowRegion';
import type { PageCursor } from '../layout/PageCursor';
import type { TextFlow } from '../text/TextFlow';
import type { MarkupWriter } from '../text/MarkupWriter';
import type { TextFont } from '../types';
import type { SpellbookDocument } from './SpellbookDocument';

export const DEFAULT_SPELLBOOK_TITLE = 'Spellbook';
export const TITLE_PAGE_BOOKMARK = 'Title Page';

const TITLE_FONT: TextFont = { style: 'regular', textClass: 'title' };
const NAME_FONT: TextFont = { style: 'regular', textClass: 'header' };
const LEVEL_FONT: TextFont = { style: 'italic', textClass: 'body' };

/**
 * Writes the title page and spell pages of a spellbook.
 */
export class SpellbookWriter {
  constructor(
    private readonly document: SpellbookDocument,
    private readonly textFlow: TextFlow,
    private readonly markup: MarkupWriter,
    private readonly config: LayoutConfig
  ) {}

  /**
   * Title lines centred on an unnumbered page. A title that fits on one page
   * is centred vertically too; a longer one starts at the top and continues
   * onto numbered pages.
   */
  writeTitlePage(title: string): PageCursor {
    const region = this.document.region;
    const { newline } = this.config.text.title;
    const text = title.trim().length > 0 ? title : DEFAULT_SPELLBOOK_TITLE;
    const lines = this.textFlow.wrapCentered(text, TITLE_FONT, regionWidth(region)).filter((line) => line !== '');

    const maxLines = newline > 0 ? Math.floor(regionHeight(region) / newline) : Infinity;
    const y =
      lines.length > maxLines
        ? region.yMax
        : region.yMin + regionHeight(region) / 2 + ((lines.length - 1) / 2) * newline;

    const page = this.document.addTitlePage();
    this.document.addBookmark(page, TITLE_PAGE_BOOKMARK);
    const cursor = this.document.startCursor(page, y);
    this.textFlow.writeCenteredLines(cursor, lines, TITLE_FONT, region.xMin, region.xMax);
    return cursor;
  }

  /**
   * Lay out one spell starting on a fresh page.
   */
  addSpell(spell: Spell): PageCursor {
    const { xMin } = this.document.region;
    const headerNewline = this.config.text.header.newline;
    const bodyNewline = this.config.text.body.newline;
    const page = this.document.addPage();
    this.document.addBookmark(page, spell.name);
    const cursor = this.document.startCursor(page);

    this.textFlow.flow(cursor, spell.name, NAME_FONT);

    cursor.breakLine(headerNewline, xMin);
    this.textFlow.flow(cursor, levelSchoolText(spell), LEVEL_FONT);

    const fields = [
      `Casting Time: <r> ${castingTimeText(spell.castingTime)}`,
      `Range: <r> ${rangeText(spell.range)}`,
      `Components: <r> ${componentsText(spell.components)}`,
      `Duration: <r> ${durationText(spell.duration)}`
    ];
    fields.forEach((field, index) => {
      cursor.breakLine(index === 0 ? headerNewline : bodyNewline, xMin);
      this.markup.write(cursor, field, { textClass: 'body', style: 'bold' });
    });

    cursor.breakLine(headerNewline, xMin);
    this.markup.write(cursor, descriptionMarkup(spell), {
      textClass: 'body',
      style: 'regular',
      tables: spell.tables.map(tableFromRecord)
    });
    return cursor;
  }
}

/**
 * The description with the upcast text appended as its own paragraph.
 */
export function descriptionMarkup(spell: Pick<Spell, 'level' | 'description' | 'upcastDescription'>): string {
  if (!spell.upcastDescription) {
    return spell.description;
  }
  const heading = spell.level === 0 ? 'Cantrip Upgrade.' : 'Using a Higher-Level Spell Slot.';
  return `${spell.description}\n<bi> ${heading} <r> ${spell.upcastDescription}`;
}
