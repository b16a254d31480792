import type { ZodIssue } from 'zod';
import { ConfigurationError } from '../errors';
import type { Margin, PageSize, Size, TextClass } from '../types';
import {
  layoutConfigSchema,
  type FontOptions,
  type PageNumberOptions,
  type SpacingOptions,
  type TableOptions,
  type TextClassOptions
} from './schema';

/**
 * Validated, immutable layout configuration. Geometry is in millimetres,
 * font sizes in points.
 */
export interface LayoutConfig {
  readonly page: {
    readonly width: number;
    readonly height: number;
    readonly margins: Readonly<Margin>;
  };
  readonly fonts: FontOptions;
  readonly text: Readonly<Record<TextClass, TextClassOptions>>;
  readonly spacing: SpacingOptions;
  readonly table: TableOptions;
  readonly pageNumbers: PageNumberOptions | null;
}

export const PAGE_SIZES: Record<Exclude<PageSize, 'Custom'>, Size> = {
  A4: { width: 210, height: 297 },
  Letter: { width: 215.9, height: 279.4 },
  Legal: { width: 215.9, height: 355.6 },
  A3: { width: 297, height: 420 }
};

/**
 * Validate a complete configuration object and resolve its page size.
 * Throws ConfigurationError naming the first offending field.
 */
export function validateLayoutConfig(input: unknown): LayoutConfig {
  const result = layoutConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(formatIssue(result.error.issues[0]), result.error.issues);
  }

  const { page, fonts, text, spacing, table, pageNumbers } = result.data;

  let size: Size =
    page.size === 'Custom'
      ? { width: page.width ?? 0, height: page.height ?? 0 }
      : PAGE_SIZES[page.size];
  if (page.orientation === 'landscape') {
    size = { width: size.height, height: size.width };
  }

  const { margins } = page;
  if (margins.left + margins.right >= size.width) {
    throw new ConfigurationError(
      'Invalid page.margins: left and right margins leave no horizontal space',
      { width: size.width, left: margins.left, right: margins.right }
    );
  }
  if (margins.top + margins.bottom >= size.height) {
    throw new ConfigurationError(
      'Invalid page.margins: top and bottom margins leave no vertical space',
      { height: size.height, top: margins.top, bottom: margins.bottom }
    );
  }

  return deepFreeze({
    page: { width: size.width, height: size.height, margins },
    fonts,
    text,
    spacing,
    table,
    pageNumbers
  });
}

function formatIssue(issue: ZodIssue | undefined): string {
  if (!issue) {
    return 'Invalid configuration';
  }
  const path = issue.path.join('.');
  return path ? `Invalid ${path}: ${issue.message}` : `Invalid configuration: ${issue.message}`;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
