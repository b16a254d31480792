export { MAGIC_SCHOOLS } from './types';
export type {
  MagicSchool,
  SpellLevel,
  CastingTime,
  CastingTimeUnit,
  AreaOfEffect,
  Range,
  Duration,
  DurationUnit,
  Components,
  SpellTable,
  Spell
} from './types';
export { spellSchema, spellListSchema } from './schema';
export {
  amountText,
  ordinal,
  schoolName,
  levelSchoolText,
  castingTimeText,
  areaText,
  rangeText,
  componentsText,
  durationText,
  tableFromRecord
} from './display';
export { loadSpellFile, loadSpellFolder } from './loadSpells';
