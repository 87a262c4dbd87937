/**
 * Shared OSC argument helpers.
 *
 * Inbound args are decoded with metadata (typed { type, value } objects)
 * and flattened to plain values before dispatch. Outbound args may be plain
 * numbers/strings/booleans and get typed here.
 */

import type { OSCArgument } from 'osc';
import { OscArg, OscArgInput, OscValue } from './types';

/** Extract a float from args[index] */
export function getFloat(args: readonly OscValue[], index = 0): number {
  if (args.length <= index) return 0;
  const val = args[index];
  if (typeof val === 'number') return val;
  if (typeof val === 'boolean') return val ? 1 : 0;
  return typeof val === 'string' ? parseFloat(val) || 0 : 0;
}

/** Extract an integer from args[index] */
export function getInt(args: readonly OscValue[], index = 0): number {
  if (args.length <= index) return 0;
  const val = args[index];
  if (typeof val === 'number') return Math.round(val);
  if (typeof val === 'boolean') return val ? 1 : 0;
  return typeof val === 'string' ? parseInt(val, 10) || 0 : 0;
}

/** Extract a string from args[index] */
export function getString(args: readonly OscValue[], index = 0): string {
  if (args.length <= index) return '';
  return valueToString(args[index]);
}

/** Extract a boolean from args[index]: true for `T` or any number >= 1 */
export function getBool(args: readonly OscValue[], index = 0): boolean {
  if (args.length > index && typeof args[index] === 'boolean') {
    return args[index] === true;
  }
  return getInt(args, index) >= 1;
}

export function valueToString(val: OscValue): string {
  if (val === null) return '';
  if (val instanceof Uint8Array) return Buffer.from(val).toString('hex');
  return String(val);
}

/**
 * Flatten an argument decoded by osc.js with `metadata: true` to a plain
 * value. Types without a plain counterpart (timetags, colors, MIDI) are
 * rendered as strings.
 */
export function toValue(arg: OSCArgument): OscValue {
  const { value } = arg;
  switch (arg.type) {
    case 'T':
      return true;
    case 'F':
      return false;
    case 'N':
    case 'I':
      return null;
  }
  if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Uint8Array) return value;
  if (value === null || value === undefined) return null;
  return JSON.stringify(value);
}

/** Type one outbound argument */
export function toOscArg(arg: OscArgInput): OscArg {
  if (typeof arg === 'number') {
    return Number.isInteger(arg) ? { type: 'i', value: arg } : { type: 'f', value: arg };
  }
  if (typeof arg === 'boolean') {
    return { type: arg ? 'T' : 'F', value: arg };
  }
  if (typeof arg === 'string') {
    return { type: 's', value: arg };
  }
  return arg;
}

/** Type every outbound argument */
export function normalizeArgs(args: readonly OscArgInput[]): OscArg[] {
  return args.map(toOscArg);
}

/** Render args for log lines */
export function formatArgs(args: readonly OscValue[]): string {
  return args.map(valueToString).join(', ');
}
