/**
 * Record Codecs
 *
 * Decoders turn a reply's positional argument list into a record through a
 * PositionalSchema: an ordered list of named fields, each validated with
 * zod. Length and type mismatches are reported once, here, as DecodeError.
 *
 * Encoders produce console command lines for /eos/newcmd.
 */

import { z } from 'zod';
import { CommandRejectedError, DecodeError } from '../errors';
import { OscValue } from '../osc/types';
import { valueToString } from '../osc/osc-args';
import { cueTarget, formatNumber } from './cue';
import { Cue, CueFields, GroupProperties } from './types';

// --- Field types ---

const int = z.number().int();
const num = z.number();
const text = z.string();
/** Eos sends flags either as T/F or as 0/1 */
const flag = z.union([z.boolean(), z.number()]).transform((v) => (typeof v === 'number' ? v !== 0 : v));
/** Free text that the console sometimes sends as a number (e.g. link targets) */
const loose = z.union([z.string(), z.number()]).transform(String);

// --- Positional schema ---

export class PositionalSchema<T extends z.ZodRawShape> {
  readonly name: string;
  readonly fields: readonly string[];
  private readonly schema: z.ZodObject<T, 'strip'>;

  constructor(name: string, shape: T) {
    this.name = name;
    this.fields = Object.keys(shape);
    this.schema = z.object(shape);
  }

  get fieldCount(): number {
    return this.fields.length;
  }

  /** Decode an argument list; its length must equal the field count */
  decode(args: readonly OscValue[]): z.output<z.ZodObject<T, 'strip'>> {
    if (args.length !== this.fields.length) {
      throw new DecodeError(
        `${this.name} reply has ${args.length} argument(s), expected ${this.fields.length}`
      );
    }

    const named: Record<string, OscValue> = {};
    this.fields.forEach((field, i) => {
      named[field] = args[i];
    });

    const parsed = this.schema.safeParse(named);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.') || this.name;
      throw new DecodeError(`${this.name} field "${field}": ${issue.message}`);
    }
    return parsed.data;
  }
}

// --- Schemas, in console order ---

export const cueSchema = new PositionalSchema('cue', {
  index: int,
  uid: text,
  label: text,
  upTime: num,
  upDelay: num,
  downTime: num,
  downDelay: num,
  focusTime: num,
  focusDelay: num,
  colorTime: num,
  colorDelay: num,
  beamTime: num,
  beamDelay: num,
  preheat: flag,
  curve: num,
  rate: int,
  mark: text,
  block: text,
  assert: text,
  link: loose,
  followTime: num,
  hangTime: num,
  allFade: flag,
  loop: int,
  solo: flag,
  timecode: text,
  partCount: int,
  notes: text,
  scene: text,
  sceneEnd: flag,
  cuePartIndex: int,
});

export const groupSchema = new PositionalSchema('group', {
  index: int,
  uid: text,
  label: text,
});

export const macroSchema = new PositionalSchema('macro', {
  index: int,
  uid: text,
  label: text,
  mode: loose,
});

export function decodeCueFields(args: readonly OscValue[]): CueFields {
  return cueSchema.decode(args);
}

/** List replies (channels, macro text, cue fx/links/actions): index, uid, then items */
export interface ListTail {
  index: number;
  uid: string;
  items: string[];
}

export function decodeListTail(args: readonly OscValue[], what: string): ListTail {
  if (args.length < 2) {
    throw new DecodeError(`${what} reply has ${args.length} argument(s), expected at least 2`);
  }
  const index = args[0];
  if (typeof index !== 'number') {
    throw new DecodeError(`${what} reply index must be a number`);
  }
  return {
    index,
    uid: valueToString(args[1]),
    items: args.slice(2).map(valueToString),
  };
}

// --- Reply addresses ---

export type CueSection = 'base' | 'fx' | 'links' | 'actions';

export interface CueReplyAddress {
  cuelist: number;
  cue: number;
  part: number;
  section: CueSection;
}

const CUE_SECTIONS: readonly CueSection[] = ['fx', 'links', 'actions'];

function numericSegment(segment: string | undefined): number | null {
  if (segment === undefined || segment.trim() === '') return null;
  const n = Number(segment);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse /eos/out/get/cue/<list>/<cue>/<part>[/<section>]/... ;
 * null for anything else (counts, other objects).
 */
export function parseCueReplyAddress(address: string): CueReplyAddress | null {
  const segments = address.split('/');
  if (segments.slice(1, 5).join('/') !== 'eos/out/get/cue') return null;

  const cuelist = numericSegment(segments[5]);
  const cue = numericSegment(segments[6]);
  const part = numericSegment(segments[7]);
  if (cuelist === null || cue === null || part === null) return null;

  const next = segments[8];
  const section = CUE_SECTIONS.find((s) => s === next) ?? 'base';
  return { cuelist, cue, part, section };
}

/**
 * Classify a reply address relative to the query's reply base, e.g.
 * base "/eos/out/get/group/5" and "/eos/out/get/group/5/channels/list/0/1"
 * → "channels". Returns null when the address belongs to another object
 * ("/eos/out/get/group/50/...").
 */
export function replySection<S extends string>(
  address: string,
  base: string,
  sections: readonly S[],
): S | 'base' | null {
  if (!address.startsWith(base)) return null;
  const tail = address.slice(base.length);
  if (tail !== '' && !tail.startsWith('/')) return null;
  const first = tail.split('/')[1];
  return sections.find((s) => s === first) ?? 'base';
}

// --- Command text ---

/** Text typed into the command line may not contain the Enter marker */
function commandValue(value: string, what: string): string {
  if (value.includes('#')) {
    throw new CommandRejectedError(`${what} may not contain "#": "${value}"`);
  }
  return value;
}

/** ["1-5", "7"] → "1 Thru 5 + 7" */
export function channelSelection(channels: readonly string[]): string {
  if (channels.length === 0) {
    throw new CommandRejectedError('Channel selection is empty');
  }
  return channels
    .map((range) => range.split('-').map((n) => commandValue(n.trim(), 'Channel')).join(' Thru '))
    .join(' + ');
}

export const commandText = {
  recordBlankCue: (cue: Cue): string => `${cueTarget(cue)} # #`,
  intensityBlock: (cue: Cue): string => `${cueTarget(cue)} Intensity Block #`,
  block: (cue: Cue): string => `${cueTarget(cue)} Block #`,
  assert: (cue: Cue): string => `${cueTarget(cue)} Assert #`,
  time: (cue: Cue, seconds: number): string => `${cueTarget(cue)} Time ${formatNumber(seconds)} #`,
  scene: (cue: Cue, scene: string): string => `${cueTarget(cue)} Scene ${commandValue(scene, 'Scene')} #`,
  selectGroup: (group: number): string => `Group ${formatNumber(group)} #`,
  labelGroup: (group: number, label: string): string =>
    `Group ${formatNumber(group)} Label ${commandValue(label, 'Label')} #`,
  recordGroup: (group: Pick<GroupProperties, 'number' | 'channels'>): string =>
    `Chan ${channelSelection(group.channels)} Record Group ${formatNumber(group.number)} #`,
  selectMacro: (macro: number): string => `${formatNumber(macro)} #`,
};
