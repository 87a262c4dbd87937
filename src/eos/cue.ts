/**
 * Cue identity text, in both directions.
 *
 * The console's command line is whitespace-sensitive: cue numbers are
 * written without a trailing ".0" and with spaces around the list
 * separator ("1 / 10").
 */

import { DecodeError } from '../errors';
import { Cue } from './types';

/** Render a console number: at most three decimals, no trailing zeros */
export function formatNumber(n: number): string {
  if (!Number.isFinite(n)) {
    throw new RangeError(`Cannot format ${n} as a console number`);
  }
  const rounded = Number(n.toFixed(3));
  return String(Object.is(rounded, -0) ? 0 : rounded);
}

/** "1 / 10" */
export function cueFormat(cue: Pick<Cue, 'cuelist' | 'cue'>): string {
  return `${formatNumber(cue.cuelist)} / ${formatNumber(cue.cue)}`;
}

/** Command-line target: "Cue 1 / 10", plus " Part 2" for a non-zero part */
export function cueTarget(cue: Pick<Cue, 'cuelist' | 'cue' | 'part'>): string {
  const base = `Cue ${cueFormat(cue)}`;
  return cue.part !== 0 ? `${base} Part ${cue.part}` : base;
}

export function sameCue(a: Cue | null, b: Cue | null): boolean {
  if (a === null || b === null) return a === b;
  return a.cuelist === b.cuelist && a.cue === b.cue && a.part === b.part;
}

function parseNumberField(text: string, what: string, source: string): number {
  const value = text.trim() === '' ? NaN : Number(text);
  if (!Number.isFinite(value)) {
    throw new DecodeError(`Invalid ${what} "${text}" in cue text "${source}"`);
  }
  return value;
}

/**
 * Decode the text form of a playback notification:
 *   "1/10 2"      → list 1, cue 10, part 2
 *   "1/10 2 55%"  → same, 55% complete
 */
export function parseCueText(text: string): Cue {
  const fields = text.split(' ');
  if (fields.length !== 2 && fields.length !== 3) {
    throw new DecodeError(`Cue text must have 2 or 3 fields, got ${fields.length}: "${text}"`);
  }

  const ident = fields[0].split('/');
  if (ident.length !== 2) {
    throw new DecodeError(`Cue text must start with "<list>/<cue>": "${text}"`);
  }

  const cue: Cue = {
    cuelist: parseNumberField(ident[0], 'cue list', text),
    cue: parseNumberField(ident[1], 'cue number', text),
    part: parseNumberField(fields[1], 'part', text),
  };

  if (fields.length === 3) {
    const pct = fields[2];
    if (!pct.endsWith('%')) {
      throw new DecodeError(`Expected a percentage as third field: "${text}"`);
    }
    cue.percentage = parseNumberField(pct.slice(0, -1), 'percentage', text) / 100;
  }

  return cue;
}

/**
 * Parse "1/10", "1/10/2" or "10" (list 1) from user input.
 */
export function parseCueSpec(spec: string, defaultList = 1): Cue {
  const parts = spec.split('/');
  if (parts.length > 3 || parts.some((p) => p.trim() === '' || !Number.isFinite(Number(p)))) {
    throw new DecodeError(`Invalid cue "${spec}": expected <cue>, <list>/<cue> or <list>/<cue>/<part>`);
  }
  const nums = parts.map(Number);
  if (nums.length === 1) return { cuelist: defaultList, cue: nums[0], part: 0 };
  return { cuelist: nums[0], cue: nums[1], part: nums[2] ?? 0 };
}
