import type { LayoutConfig } from '../config';
import type { Spell } from '../content/types';
import { PdfRenderer } from '../rendering/PdfRenderer';
import { TableLayout } from '../table/TableLayout';
import { FontMetrics } from '../text/FontMetrics';
import { MarkupWriter } from '../text/MarkupWriter';
import { TextFlow } from '../text/TextFlow';
import { SpellbookDocument, type PageAddedEvent } from './SpellbookDocument';
import { SpellbookWriter } from './SpellbookWriter';

export interface SpellbookOptions {
  title: string;
  spells: readonly Spell[];
  config: LayoutConfig;
  /** PNG or JPEG drawn under every page. */
  background?: string;
  onPageAdded?: (event: PageAddedEvent) => void;
}

/**
 * Lay out a title page and one spell per page, and return the PDF bytes.
 */
export async function createSpellbook(options: SpellbookOptions): Promise<Uint8Array> {
  const { title, spells, config, background } = options;

  const renderer = await PdfRenderer.create(config, { background, title });
  const metrics = new FontMetrics(renderer.metricsSources, config.fonts.scalars);
  const textFlow = new TextFlow(metrics, config, renderer);
  const tableLayout = new TableLayout(metrics, textFlow, config, renderer);
  const markup = new MarkupWriter(textFlow, tableLayout, metrics, config);

  const document = new SpellbookDocument(renderer, metrics, config);
  if (options.onPageAdded) {
    document.on('page-added', options.onPageAdded);
  }

  const writer = new SpellbookWriter(document, textFlow, markup, config);
  writer.writeTitlePage(title);
  for (const spell of spells) {
    writer.addSpell(spell);
  }

  return renderer.save();
}
