/**
 * Spell records as read from content files.
 *
 * Controlled fields (casting time, range, components, duration) take either a
 * tagged value or a plain string, which is printed as given.
 */

export const MAGIC_SCHOOLS = [
  'abjuration',
  'conjuration',
  'divination',
  'enchantment',
  'evocation',
  'illusion',
  'necromancy',
  'transmutation'
] as const;

export type MagicSchool = (typeof MAGIC_SCHOOLS)[number];

/** 0 is a cantrip. */
export type SpellLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export type CastingTimeUnit = 'second' | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'year';

export type CastingTime =
  | { kind: 'action'; amount: number }
  | { kind: 'bonusAction' }
  /** `trigger` follows "1 reaction, which you take when". */
  | { kind: 'reaction'; trigger: string }
  | { kind: 'time'; amount: number; unit: CastingTimeUnit }
  | string;

export type AreaOfEffect =
  | { shape: 'line' | 'cone' | 'cube' | 'sphere'; feet: number }
  | { shape: 'cylinder'; radius: number; height: number }
  | { shape: 'radius'; miles: number };

export type Range =
  | { kind: 'self'; area?: AreaOfEffect }
  | { kind: 'touch' }
  | { kind: 'feet'; distance: number }
  | { kind: 'miles'; distance: number }
  | { kind: 'special' }
  | string;

export type DurationUnit = 'second' | 'round' | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'year';

export type Duration =
  | { kind: 'instantaneous' }
  | { kind: 'time'; amount: number; unit: DurationUnit; concentration?: boolean }
  | { kind: 'untilDispelled'; orTriggered?: boolean; concentration?: boolean }
  | { kind: 'permanent' }
  | { kind: 'special'; concentration?: boolean }
  | string;

export interface Components {
  verbal: boolean;
  somatic: boolean;
  /** Material components, printed in parentheses. */
  material?: string;
}

/**
 * A table placed in a description with `[table][N]`.
 */
export interface SpellTable {
  title: string;
  columnLabels?: string[];
  cells: string[][];
}

export interface Spell {
  name: string;
  level: SpellLevel;
  school: MagicSchool;
  ritual: boolean;
  castingTime: CastingTime;
  range: Range;
  components: Components | string;
  duration: Duration;
  /** Marked-up text: style tags, bullets, inline tables and table references. */
  description: string;
  upcastDescription?: string;
  tables: SpellTable[];
}
