import { normalizeTable } from '../table/TableParser';
import type { TableContent } from '../table/types';
import type { AreaOfEffect, CastingTime, Components, Duration, MagicSchool, Range, Spell, SpellTable } from './types';

/**
 * "1 minute", "10 minutes".
 */
export function amountText(amount: number, unit: string): string {
  return amount === 1 ? `1 ${unit}` : `${amount} ${unit}s`;
}

export function ordinal(value: number): string {
  const lastTwo = value % 100;
  if (lastTwo >= 11 && lastTwo <= 13) {
    return `${value}th`;
  }
  switch (value % 10) {
    case 1:
      return `${value}st`;
    case 2:
      return `${value}nd`;
    case 3:
      return `${value}rd`;
    default:
      return `${value}th`;
  }
}

export function schoolName(school: MagicSchool): string {
  return capitalize(school);
}

/**
 * "3rd-level evocation (ritual)", "Evocation cantrip".
 */
export function levelSchoolText(spell: Pick<Spell, 'level' | 'school' | 'ritual'>): string {
  const base =
    spell.level === 0
      ? `${schoolName(spell.school)} cantrip`
      : `${ordinal(spell.level)}-level ${spell.school}`;
  return spell.ritual ? `${base} (ritual)` : base;
}

export function castingTimeText(castingTime: CastingTime): string {
  if (typeof castingTime === 'string') {
    return castingTime;
  }
  switch (castingTime.kind) {
    case 'action':
      return amountText(castingTime.amount, 'action');
    case 'bonusAction':
      return '1 bonus action';
    case 'reaction':
      return `1 reaction, which you take when ${castingTime.trigger}`;
    case 'time':
      return amountText(castingTime.amount, castingTime.unit);
  }
}

export function areaText(area: AreaOfEffect): string {
  switch (area.shape) {
    case 'cylinder':
      return `${area.radius}-foot radius, ${area.height}-foot tall cylinder`;
    case 'radius':
      return `${area.miles}-mile radius`;
    default:
      return `${area.feet}-foot ${area.shape}`;
  }
}

export function rangeText(range: Range): string {
  if (typeof range === 'string') {
    return range;
  }
  switch (range.kind) {
    case 'self':
      return range.area ? `Self (${areaText(range.area)})` : 'Self';
    case 'touch':
      return 'Touch';
    case 'feet':
      return range.distance === 1 ? '1 foot' : `${range.distance} feet`;
    case 'miles':
      return amountText(range.distance, 'mile');
    case 'special':
      return 'Special';
  }
}

export function componentsText(components: Components | string): string {
  if (typeof components === 'string') {
    return components;
  }
  const parts: string[] = [];
  if (components.verbal) parts.push('V');
  if (components.somatic) parts.push('S');
  if (components.material) parts.push(`M (${components.material})`);
  return parts.join(', ');
}

export function durationText(duration: Duration): string {
  if (typeof duration === 'string') {
    return duration;
  }
  switch (duration.kind) {
    case 'instantaneous':
      return 'Instantaneous';
    case 'permanent':
      return 'Permanent';
    case 'time': {
      const text = amountText(duration.amount, duration.unit);
      return duration.concentration ? `Concentration, up to ${text}` : text;
    }
    case 'untilDispelled': {
      const text = duration.orTriggered ? 'until dispelled or triggered' : 'until dispelled';
      return duration.concentration ? `Concentration, ${text}` : capitalize(text);
    }
    case 'special':
      return duration.concentration ? 'Concentration, special' : 'Special';
  }
}

/**
 * Table content for a spell table record. Column labels become the header row.
 */
export function tableFromRecord(record: SpellTable): TableContent {
  return normalizeTable(record.title, record.columnLabels ?? null, record.cells);
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
