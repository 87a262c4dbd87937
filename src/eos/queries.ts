/**
 * Eos queries
 *
 * Request/reply definitions for the console's /eos/get namespace. Single
 * reply exchanges (ping, version, counts) run on the RequestEngine; cue,
 * group and macro lookups are composite queries for the RecordAssembler.
 *
 * Reply shapes (Eos OSC "get" replies):
 *   /eos/out/get/cue/<list>/<cue>/<part>/list/<i>/<n>            31 fields
 *   /eos/out/get/cue/<list>/<cue>/<part>/fx/list/<i>/<n>         index, uid, fx...
 *   /eos/out/get/cue/<list>/<cue>/<part>/links/list/<i>/<n>      index, uid, lists...
 *   /eos/out/get/cue/<list>/<cue>/<part>/actions/list/<i>/<n>    index, uid, actions...
 *   /eos/out/get/group/<n>/list/<i>/<n>                          index, uid, label
 *   /eos/out/get/group/<n>/channels/list/<i>/<n>                 index, uid, ranges...
 *   /eos/out/get/macro/<n>/list/<i>/<n>                          index, uid, label, mode
 *   /eos/out/get/macro/<n>/text/list/<i>/<n>                     index, uid, command...
 */

import { DecodeError, ProtocolMismatchError } from '../errors';
import { getString } from '../osc/osc-args';
import { OscValue } from '../osc/types';
import { Exchange } from './request-engine';
import { CompositeQuery } from './record-assembler';
import {
  CueSection,
  decodeCueFields,
  decodeListTail,
  groupSchema,
  macroSchema,
  parseCueReplyAddress,
  replySection,
} from './codecs';
import { formatNumber } from './cue';
import { Cue, CueFields, CueProperties, EosTarget, GroupProperties, MacroProperties } from './types';

export const CUE_REPLY_COUNT = 4;
export const GROUP_REPLY_COUNT = 2;
export const MACRO_REPLY_COUNT = 2;

// --- Single reply exchanges ---

export interface PingResult {
  echo: string;
  roundtripMs: number;
}

interface PingState {
  startedAt: number;
  echo: string | null;
}

/** Completes when the console echoes `token`; any other echo is a mismatch */
export function pingExchange(token: string): Exchange<PingState, PingResult> {
  return {
    label: 'ping',
    request: { address: '/eos/ping', args: [token] },
    replyPattern: '/eos/out/ping',
    initial: () => ({ startedAt: Date.now(), echo: null }),
    accept(state, message) {
      const echo = getString(message.args);
      if (echo !== token) {
        throw new ProtocolMismatchError(`Ping reply "${echo}" does not match "${token}"`, token, echo);
      }
      return { ...state, echo };
    },
    isComplete: (state) => state.echo !== null,
    finish: (state) => ({ echo: state.echo ?? token, roundtripMs: Date.now() - state.startedAt }),
  };
}

/** First value of the first reply */
function firstReply<R>(
  label: string,
  path: string,
  read: (args: readonly OscValue[]) => R,
): Exchange<R | null, R> {
  return {
    label,
    request: { address: `/eos/${path}` },
    replyPattern: `/eos/out/${path}`,
    initial: () => null,
    accept: (_state, message) => read(message.args),
    isComplete: (state) => state !== null,
    finish(state) {
      if (state === null) throw new DecodeError(`No value for ${label}`);
      return state;
    },
  };
}

export function versionExchange(): Exchange<string | null, string> {
  return firstReply('version', 'get/version', (args) => {
    if (typeof args[0] !== 'string') {
      throw new DecodeError('Version reply carries no version string');
    }
    return args[0];
  });
}

export function countPath(target: EosTarget, cuelist = 1): string {
  return target === 'cue' ? `get/cue/${formatNumber(cuelist)}/count` : `get/${target}/count`;
}

export function countExchange(target: EosTarget, cuelist = 1): Exchange<number | null, number> {
  return firstReply(`${target} count`, countPath(target, cuelist), (args) => {
    const count = args[0];
    if (typeof count !== 'number') {
      throw new DecodeError(`Count reply for ${target} carries no number`);
    }
    return count;
  });
}

// --- Cue records ---

type CueBase = CueFields & Pick<CueProperties, 'cuelist' | 'cue' | 'part'>;

interface CueIdentity {
  cuelist: number;
  cue: number;
  part: number;
}

export interface CueDraft {
  /** Identity every part must share; fixed by the request or by the first reply */
  identity: CueIdentity | null;
  base: CueBase | null;
  fx?: string[];
  links?: string[];
  actions?: string[];
}

type CueSubSection = Exclude<CueSection, 'base'>;

/** Sub-record entries, or undefined when the console reports none */
function subRecord(args: readonly OscValue[], section: CueSubSection): string[] | undefined {
  const { items } = decodeListTail(args, `cue ${section}`);
  return items.length > 0 ? items : undefined;
}

function cueQuery(
  label: string,
  path: string,
  replyPattern: string,
  identity: CueIdentity | null,
): CompositeQuery<CueDraft, CueProperties> {
  return {
    label,
    request: { address: `/eos/${path}` },
    replyPattern,
    expectedCount: CUE_REPLY_COUNT,
    draft: () => ({ identity, base: null }),
    route(draft, message) {
      const addr = parseCueReplyAddress(message.address);
      if (!addr) return null;

      const id = draft.identity;
      if (id && (id.cuelist !== addr.cuelist || id.cue !== addr.cue || id.part !== addr.part)) {
        return null;
      }
      const next: CueDraft = {
        ...draft,
        identity: id ?? { cuelist: addr.cuelist, cue: addr.cue, part: addr.part },
      };

      switch (addr.section) {
        case 'base':
          next.base = {
            cuelist: addr.cuelist,
            cue: addr.cue,
            part: addr.part,
            ...decodeCueFields(message.args),
          };
          break;
        case 'fx':
          next.fx = subRecord(message.args, 'fx');
          break;
        case 'links':
          next.links = subRecord(message.args, 'links');
          break;
        case 'actions':
          next.actions = subRecord(message.args, 'actions');
          break;
      }
      return next;
    },
    build(draft) {
      if (!draft.base) {
        throw new DecodeError(`No property reply for ${label}`);
      }
      const record: CueProperties = { ...draft.base };
      if (draft.fx) record.fx = draft.fx;
      if (draft.links) record.links = draft.links;
      if (draft.actions) record.actions = draft.actions;
      return record;
    },
  };
}

export function cueByNumberQuery(cue: Cue): CompositeQuery<CueDraft, CueProperties> {
  const list = formatNumber(cue.cuelist);
  const number = formatNumber(cue.cue);
  const path = `get/cue/${list}/${number}/${cue.part}`;
  // Replies echo the numbers as formatted in the request
  return cueQuery(
    `cue ${list}/${number}/${cue.part}`,
    path,
    `/eos/out/${path}*`,
    { cuelist: Number(list), cue: Number(number), part: cue.part },
  );
}

export function cueByUidQuery(uid: string): CompositeQuery<CueDraft, CueProperties> {
  // Replies are addressed by cue number, which is not known up front
  return cueQuery(`cue uid ${uid}`, `get/cue/uid/${uid}`, '/eos/out/get/cue/*', null);
}

export function cueByIndexQuery(index: number, cuelist = 1): CompositeQuery<CueDraft, CueProperties> {
  const list = formatNumber(cuelist);
  return cueQuery(
    `cue index ${index} in list ${list}`,
    `get/cue/${list}/index/${index}`,
    `/eos/out/get/cue/${list}/*`,
    null,
  );
}

// --- Groups ---

export interface GroupDraft {
  props: { uid: string; label: string } | null;
  channels: string[] | null;
}

export function groupQuery(group: number): CompositeQuery<GroupDraft, GroupProperties> {
  const base = `/eos/out/get/group/${formatNumber(group)}`;
  const label = `group ${formatNumber(group)}`;
  return {
    label,
    request: { address: `/eos/get/group/${formatNumber(group)}` },
    replyPattern: `${base}*`,
    expectedCount: GROUP_REPLY_COUNT,
    draft: () => ({ props: null, channels: null }),
    route(draft, message) {
      const section = replySection(message.address, base, ['channels'] as const);
      if (section === null) return null;
      if (section === 'channels') {
        return { ...draft, channels: decodeListTail(message.args, `${label} channels`).items };
      }
      const { uid, label: name } = groupSchema.decode(message.args);
      return { ...draft, props: { uid, label: name } };
    },
    build(draft) {
      if (!draft.props || !draft.channels) {
        throw new DecodeError(`Missing ${draft.props ? 'channel' : 'property'} reply for ${label}`);
      }
      return { number: group, uid: draft.props.uid, label: draft.props.label, channels: draft.channels };
    },
  };
}

// --- Macros ---

export interface MacroDraft {
  props: { uid: string; label: string; mode: string } | null;
  command: string[] | null;
}

export function macroQuery(macro: number): CompositeQuery<MacroDraft, MacroProperties> {
  const base = `/eos/out/get/macro/${formatNumber(macro)}`;
  const label = `macro ${formatNumber(macro)}`;
  return {
    label,
    request: { address: `/eos/get/macro/${formatNumber(macro)}` },
    replyPattern: `${base}*`,
    expectedCount: MACRO_REPLY_COUNT,
    draft: () => ({ props: null, command: null }),
    route(draft, message) {
      const section = replySection(message.address, base, ['text'] as const);
      if (section === null) return null;
      if (section === 'text') {
        return { ...draft, command: decodeListTail(message.args, `${label} text`).items };
      }
      const { uid, label: name, mode } = macroSchema.decode(message.args);
      return { ...draft, props: { uid, label: name, mode } };
    },
    build(draft) {
      if (!draft.props || !draft.command) {
        throw new DecodeError(`Missing ${draft.props ? 'text' : 'property'} reply for ${label}`);
      }
      return { number: macro, ...draft.props, command: draft.command };
    },
  };
}
