export * from './types';

export { LayoutError, LayoutErrorCode, ConfigurationError, MetricsUnavailableError, ContentError } from './errors';

export { EventEmitter } from './events/EventEmitter';

// Configuration
export {
  createLayoutConfig,
  validateLayoutConfig,
  loadLayoutConfig,
  mergeWithDefaults,
  DEFAULT_LAYOUT_CONFIG,
  PAGE_SIZES,
  layoutConfigSchema
} from './config';

export type {
  LayoutConfig,
  LayoutConfigInput,
  LayoutConfigOverrides,
  PageNumberOptions,
  TableOptions,
  TextClassOptions,
  SpacingOptions,
  FontOptions
} from './config';

// Layout
export { PageCursor, isDegenerateRegion, bodyRegion, regionWidth, regionHeight } from './layout';
export type { PageSource, CursorPosition, CursorSnapshot, FlowResult } from './layout';

// Text
export {
  FontMetrics,
  LineWrapper,
  TextFlow,
  MarkupWriter,
  tokenizeMarkup,
  splitTokens
} from './text';

export type { FontMetricsSource, WrapOptions, FlowOptions, MarkupOptions, MarkupToken } from './text';

// Tables
export { TableLayout, parseTableTokens, normalizeTable, solveColumnWidths } from './table';
export type { TableContent, TablePlan, ColumnWidth } from './table';

// Rendering
export { PdfRenderer, filterToWinAnsi } from './rendering';
export type { PdfRendererOptions, PageHandle, Renderer } from './rendering';

// Spell content
export {
  MAGIC_SCHOOLS,
  spellSchema,
  loadSpellFile,
  loadSpellFolder,
  levelSchoolText,
  castingTimeText,
  rangeText,
  componentsText,
  durationText,
  tableFromRecord
} from './content';

export type {
  Spell,
  SpellTable,
  SpellLevel,
  MagicSchool,
  CastingTime,
  Range,
  AreaOfEffect,
  Components,
  Duration
} from './content';

// Spellbook
export { SpellbookDocument, SpellbookWriter, createSpellbook, DEFAULT_SPELLBOOK_TITLE } from './core';
export type { SpellbookOptions, PageAddedEvent } from './core';
