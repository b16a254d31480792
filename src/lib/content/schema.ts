import { z } from 'zod';
import { MAGIC_SCHOOLS, type Spell, type SpellLevel } from './types';

const amount = z.number().int({ message: 'must be a whole number' }).positive({ message: 'must be greater than zero' });

const text = z.string().min(1, { message: 'must not be empty' });

const SPELL_LEVELS: readonly SpellLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

function isSpellLevel(value: number): value is SpellLevel {
  return SPELL_LEVELS.some((level) => level === value);
}

export const levelSchema = z
  .number({ invalid_type_error: 'must be a number' })
  .refine(isSpellLevel, { message: 'must be a whole number from 0 to 9' });

export const castingTimeSchema = z.union([
  z.object({ kind: z.literal('action'), amount }),
  z.object({ kind: z.literal('bonusAction') }),
  z.object({ kind: z.literal('reaction'), trigger: text }),
  z.object({
    kind: z.literal('time'),
    amount,
    unit: z.enum(['second', 'minute', 'hour', 'day', 'week', 'month', 'year'])
  }),
  text
]);

export const areaOfEffectSchema = z.union([
  z.object({ shape: z.enum(['line', 'cone', 'cube', 'sphere']), feet: amount }),
  z.object({ shape: z.literal('cylinder'), radius: amount, height: amount }),
  z.object({ shape: z.literal('radius'), miles: amount })
]);

export const rangeSchema = z.union([
  z.object({ kind: z.literal('self'), area: areaOfEffectSchema.optional() }),
  z.object({ kind: z.literal('touch') }),
  z.object({ kind: z.literal('feet'), distance: amount }),
  z.object({ kind: z.literal('miles'), distance: amount }),
  z.object({ kind: z.literal('special') }),
  text
]);

export const durationSchema = z.union([
  z.object({ kind: z.literal('instantaneous') }),
  z.object({
    kind: z.literal('time'),
    amount,
    unit: z.enum(['second', 'round', 'minute', 'hour', 'day', 'week', 'month', 'year']),
    concentration: z.boolean().optional()
  }),
  z.object({
    kind: z.literal('untilDispelled'),
    orTriggered: z.boolean().optional(),
    concentration: z.boolean().optional()
  }),
  z.object({ kind: z.literal('permanent') }),
  z.object({ kind: z.literal('special'), concentration: z.boolean().optional() }),
  text
]);

export const componentsSchema = z.union([
  z.object({
    verbal: z.boolean(),
    somatic: z.boolean(),
    material: text.optional()
  }),
  text
]);

export const spellTableSchema = z.object({
  title: z.string(),
  columnLabels: z.array(z.string()).optional(),
  cells: z.array(z.array(z.string()))
});

export const spellSchema: z.ZodType<Spell, z.ZodTypeDef, unknown> = z.object({
  name: text,
  level: levelSchema,
  school: z.enum(MAGIC_SCHOOLS),
  ritual: z.boolean().default(false),
  castingTime: castingTimeSchema,
  range: rangeSchema,
  components: componentsSchema,
  duration: durationSchema,
  description: z.string(),
  upcastDescription: z.string().optional(),
  tables: z.array(spellTableSchema).default([])
});

export const spellListSchema = z.array(spellSchema);
