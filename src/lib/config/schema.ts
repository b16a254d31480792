/**
 * zod schemas for the layout configuration surface.
 */

import { z } from 'zod';

const finite = z.number({ invalid_type_error: 'must be a number' }).finite({ message: 'must be a finite number' });

const nonNegative = finite.nonnegative({ message: 'must not be negative' });

const positive = finite.positive({ message: 'must be greater than zero' });

const channel = z
  .number({ invalid_type_error: 'must be a number' })
  .int({ message: 'must be an integer between 0 and 255' })
  .min(0, { message: 'must be an integer between 0 and 255' })
  .max(255, { message: 'must be an integer between 0 and 255' });

export const colorSchema = z.tuple([channel, channel, channel]);

export const fontStyleSchema = z.enum(['regular', 'bold', 'italic', 'boldItalic']);

function perStyle<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    regular: schema,
    bold: schema,
    italic: schema,
    boldItalic: schema
  });
}

function perTextClass<T extends z.ZodTypeAny>(schema: T) {
  return z.object({
    title: schema,
    header: schema,
    body: schema,
    tableTitle: schema,
    tableBody: schema
  });
}

export const marginSchema = z.object({
  top: nonNegative,
  right: nonNegative,
  bottom: nonNegative,
  left: nonNegative
});

export const pageSchema = z
  .object({
    size: z.enum(['A4', 'Letter', 'Legal', 'A3', 'Custom']),
    orientation: z.enum(['portrait', 'landscape']),
    width: positive.optional(),
    height: positive.optional(),
    margins: marginSchema
  })
  .superRefine((page, ctx) => {
    if (page.size !== 'Custom') return;
    if (page.width === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['width'], message: 'is required for a Custom page size' });
    }
    if (page.height === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['height'], message: 'is required for a Custom page size' });
    }
  });

export const textClassSchema = z.object({
  size: nonNegative,
  newline: nonNegative,
  color: colorSchema
});

export const fontsSchema = z.object({
  resources: perStyle(z.string().min(1, { message: 'must name a font resource' })),
  scalars: perStyle(nonNegative)
});

export const spacingSchema = z.object({
  tabAmount: nonNegative,
  bulletIndent: nonNegative
});

export const tableSchema = z.object({
  horizontalCellMargin: nonNegative,
  verticalCellMargin: nonNegative,
  outerHorizontalMargin: nonNegative,
  outerVerticalMargin: nonNegative,
  offRowColor: colorSchema,
  offRowYAdjustScalar: nonNegative,
  offRowThicknessScalar: nonNegative
});

export const pageNumbersSchema = z.object({
  startingSide: z.enum(['left', 'right']),
  flipSides: z.boolean(),
  startingNumber: z.number().int({ message: 'must be a whole number' }).nonnegative({ message: 'must not be negative' }),
  style: fontStyleSchema,
  size: nonNegative,
  color: colorSchema,
  sideMargin: nonNegative,
  bottomMargin: nonNegative
});

export const layoutConfigSchema = z.object({
  page: pageSchema,
  fonts: fontsSchema,
  text: perTextClass(textClassSchema),
  spacing: spacingSchema,
  table: tableSchema,
  pageNumbers: pageNumbersSchema.nullable()
});

export type LayoutConfigInput = z.input<typeof layoutConfigSchema>;

type DeepPartial<T> = T extends readonly unknown[] ? T : T extends object ? { [K in keyof T]?: DeepPartial<T[K]> } : T;

/**
 * Any subset of LayoutConfigInput. Arrays (colours) are given whole.
 */
export type LayoutConfigOverrides = DeepPartial<LayoutConfigInput>;
export type PageNumberOptions = z.output<typeof pageNumbersSchema>;
export type TableOptions = z.output<typeof tableSchema>;
export type TextClassOptions = z.output<typeof textClassSchema>;
export type SpacingOptions = z.output<typeof spacingSchema>;
export type FontOptions = z.output<typeof fontsSchema>;
