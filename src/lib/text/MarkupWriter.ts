import type { LayoutConfig } from '../config';
import type { FontStyle, TextClass } from '../types';
import type { FlowResult, PageCursor } from '../layout/PageCursor';
import type { TableLayout } from '../table/TableLayout';
import { parseTableTokens } from '../table/TableParser';
import type { TableContent, TableToken } from '../table/types';
import type { FontMetrics } from './FontMetrics';
import type { TextFlow } from './TextFlow';
import { tokenText, tokenizeMarkup, type MarkupToken } from './MarkupTokenizer';

export interface MarkupOptions {
  textClass?: TextClass;
  /** Style in effect before the first tag. */
  style?: FontStyle;
  /** Tables addressable with `[table][N]`. */
  tables?: readonly TableContent[];
}

type WriterState =
  | { name: 'prose' }
  | { name: 'table'; tokens: TableToken[] };

/**
 * Writes marked-up text: style tags switch the font, `<table>` pairs enclose
 * inline tables and `[table][N]` places a prepared table.
 */
export class MarkupWriter {
  constructor(
    private readonly textFlow: TextFlow,
    private readonly tableLayout: TableLayout,
    private readonly metrics: FontMetrics,
    private readonly config: LayoutConfig
  ) {}

  write(cursor: PageCursor, markup: string, options: MarkupOptions = {}): FlowResult {
    const session = new MarkupSession(
      { textFlow: this.textFlow, tableLayout: this.tableLayout, metrics: this.metrics, config: this.config },
      cursor,
      options
    );
    for (const token of tokenizeMarkup(markup)) {
      session.consume(token);
    }
    session.finish();
    return cursor.result();
  }
}

interface MarkupParts {
  textFlow: TextFlow;
  tableLayout: TableLayout;
  metrics: FontMetrics;
  config: LayoutConfig;
}

/**
 * State for one write call.
 *
 * The buffer holds text written since the last flush, words separated by
 * spaces, with a trailing newline marking the end of each input paragraph.
 */
class MarkupSession {
  private state: WriterState = { name: 'prose' };
  private style: FontStyle;
  private readonly textClass: TextClass;
  private buffer = '';
  /** Text sits on the current line and no paragraph break followed it yet. */
  private lineOpen = false;
  private wroteAnything = false;

  constructor(
    private readonly parts: MarkupParts,
    private readonly cursor: PageCursor,
    private readonly options: MarkupOptions
  ) {
    this.style = options.style ?? 'regular';
    this.textClass = options.textClass ?? 'body';
  }

  consume(token: MarkupToken): void {
    if (this.state.name === 'table') {
      this.consumeInTable(this.state.tokens, token);
      return;
    }

    switch (token.kind) {
      case 'plain':
      case 'escaped':
        this.append(token.text);
        break;
      case 'paragraph-end':
        this.endParagraph();
        break;
      case 'style':
        this.flush(true);
        this.style = token.style;
        break;
      case 'table-toggle':
        this.flush(false);
        this.state = { name: 'table', tokens: [] };
        break;
      case 'table-reference':
        this.placeReference(token.index, token.raw);
        break;
    }
  }

  finish(): void {
    if (this.state.name === 'table') {
      // Unclosed table: lay out what was collected.
      const tokens = this.state.tokens;
      this.state = { name: 'prose' };
      this.placeTable(parseTableTokens(tokens));
      return;
    }
    this.flush(false);
  }

  private consumeInTable(tokens: TableToken[], token: MarkupToken): void {
    switch (token.kind) {
      case 'paragraph-end':
        return;
      case 'table-toggle':
        this.state = { name: 'prose' };
        this.placeTable(parseTableTokens(tokens));
        return;
      case 'escaped':
        tokens.push({ text: token.text, literal: true });
        return;
      default:
        tokens.push({ text: tokenText(token), literal: false });
    }
  }

  private append(word: string): void {
    if (this.buffer.length > 0 && !this.buffer.endsWith('\n')) {
      this.buffer += ' ';
    }
    this.buffer += word;
  }

  private endParagraph(): void {
    if (this.buffer.length > 0) {
      this.buffer += '\n';
    } else if (this.lineOpen) {
      this.newIndentedLine();
    }
  }

  /**
   * Write the buffer in the current style. With `adjust`, move the cursor so
   * the next run starts correctly: on a new indented line after a paragraph
   * break, otherwise one space further right.
   */
  private flush(adjust: boolean): void {
    if (this.buffer.length === 0) {
      return;
    }
    const endsWithBreak = this.buffer.endsWith('\n');
    const text = endsWithBreak ? this.buffer.slice(0, -1) : this.buffer;
    this.buffer = '';

    const { textFlow, metrics, config } = this.parts;
    if (text.trim().length > 0) {
      textFlow.flow(this.cursor, text, { style: this.style, textClass: this.textClass }, { resolveEscapes: false });
      this.lineOpen = true;
      this.wroteAnything = true;
    }

    if (!adjust || !this.lineOpen) {
      return;
    }
    if (endsWithBreak) {
      this.newIndentedLine();
    } else {
      this.cursor.x += metrics.spaceWidth(this.style, config.text[this.textClass].size);
    }
  }

  private newIndentedLine(): void {
    const { config } = this.parts;
    this.cursor.breakLine(
      config.text[this.textClass].newline,
      this.cursor.region.xMin + config.spacing.tabAmount
    );
    this.lineOpen = false;
  }

  private placeReference(index: number, raw: string): void {
    const table = this.options.tables?.[index];
    if (!table) {
      console.warn(`[MarkupWriter] ${raw} does not match any table, writing it as text`);
      this.append(raw);
      return;
    }
    this.flush(false);
    this.placeTable(table);
  }

  /**
   * Tables sit below the current line, separated by the outer vertical margin
   * on both sides. Text resumes at the left edge in the regular style.
   */
  private placeTable(table: TableContent): void {
    const { tableLayout, config } = this.parts;
    const region = this.cursor.region;
    const margin = config.table.outerVerticalMargin;

    if (this.lineOpen) {
      this.cursor.breakLine(config.text[this.textClass].newline + margin, region.xMin);
    } else if (this.wroteAnything) {
      this.cursor.breakLine(margin, region.xMin);
    }

    tableLayout.render(this.cursor, table);

    this.cursor.breakLine(config.text.tableBody.newline + margin, region.xMin);
    this.style = 'regular';
    this.lineOpen = false;
    this.wroteAnything = true;
  }
}
