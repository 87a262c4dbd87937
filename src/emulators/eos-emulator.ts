/**
 * Eos Emulator
 *
 * In-process stand-in for an ETC Eos console behind the MessageTransport
 * interface. Answers the /eos/get queries with the console's real
 * multi-message reply shapes, keeps a small show (cues, groups, macros),
 * and applies the command lines and key sequences the command layer types.
 *
 * Like the console, it never answers "not found": a query for a missing
 * target gets no reply at all.
 *
 *   /eos/ping [token]                  → /eos/out/ping [token]
 *   /eos/get/version                   → /eos/out/get/version [version]
 *   /eos/get/<target>/count            → /eos/out/get/<target>/count [n]
 *   /eos/get/cue/<list>/count          → /eos/out/get/cue/<list>/count [n]
 *   /eos/get/cue/<list>/<cue>/<part>   → 4 messages (fields, fx, links, actions)
 *   /eos/get/cue/uid/<uid>             → same
 *   /eos/get/cue/<list>/index/<i>      → same
 *   /eos/get/group/<n>                 → 2 messages (fields, channels)
 *   /eos/get/macro/<n>                 → 2 messages (fields, text)
 *   /eos/newcmd [line]                 → command log, show edits
 *   /eos/key/<key> [state]             → key log, macro editor
 */

import { EventEmitter } from 'events';
import { Inbox } from '../transport/inbox';
import { MessageTransport } from '../transport/transport';
import { matchesPattern } from '../osc/address-router';
import { OscArgInput, OscMessage, OscValue } from '../osc/types';
import { formatArgs, getString, toOscArg } from '../osc/osc-args';
import { TransportError } from '../errors';
import { getLogger } from '../logger';
import { formatNumber } from '../eos/cue';
import { Cue, CueFields, CueProperties, GroupProperties, MacroProperties } from '../eos/types';

const log = getLogger('Emulator');

export interface EmulatorLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

export interface KeyPress {
  key: string;
  args: OscValue[];
}

export interface EosEmulatorOptions {
  version?: string;
  /** Load the demo show */
  demo?: boolean;
}

export type CueInput = Pick<Cue, 'cuelist' | 'cue' | 'part'>
  & Partial<CueFields>
  & Pick<CueProperties, 'fx' | 'links' | 'actions'>;

export function blankCueFields(uid: string): CueFields {
  return {
    index: 0,
    uid,
    label: '',
    upTime: 5,
    upDelay: 0,
    downTime: 5,
    downDelay: 0,
    focusTime: -1,
    focusDelay: 0,
    colorTime: -1,
    colorDelay: 0,
    beamTime: -1,
    beamDelay: 0,
    preheat: false,
    curve: 0,
    rate: 100,
    mark: '',
    block: '',
    assert: '',
    link: '',
    followTime: -1,
    hangTime: -1,
    allFade: false,
    loop: 0,
    solo: false,
    timecode: '',
    partCount: 0,
    notes: '',
    scene: '',
    sceneEnd: false,
    cuePartIndex: -1,
  };
}

/** Positional arguments of a cue reply, in console order */
function cueArgs(c: CueProperties, index: number): OscValue[] {
  return [
    index, c.uid, c.label,
    c.upTime, c.upDelay, c.downTime, c.downDelay,
    c.focusTime, c.focusDelay, c.colorTime, c.colorDelay, c.beamTime, c.beamDelay,
    c.preheat, c.curve, c.rate,
    c.mark, c.block, c.assert, c.link,
    c.followTime, c.hangTime, c.allFade, c.loop, c.solo,
    c.timecode, c.partCount, c.notes, c.scene, c.sceneEnd, c.cuePartIndex,
  ];
}

function cueKey(cue: Pick<Cue, 'cuelist' | 'cue' | 'part'>): string {
  return `${formatNumber(cue.cuelist)}/${formatNumber(cue.cue)}/${cue.part}`;
}

function byCueOrder(a: CueProperties, b: CueProperties): number {
  return a.cue - b.cue || a.part - b.part;
}

/** "1 Thru 5 + 7" → ["1-5", "7"] */
function parseSelection(selection: string): string[] {
  return selection.split(' + ').map((range) => range.split(' Thru ').map((n) => n.trim()).join('-'));
}

export class EosEmulator extends EventEmitter implements MessageTransport {
  readonly description = 'emulator';

  private connected = false;
  private inbox = new Inbox();
  private version: string;
  private cues = new Map<string, CueProperties>();
  private groups = new Map<number, GroupProperties>();
  private macros = new Map<number, MacroProperties>();
  private uidSeq = 0;

  private commands: string[] = [];
  private keys: KeyPress[] = [];
  private dropPatterns: string[] = [];
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;

  // Macro editor: number selected on the command line, then keys recorded
  private selectedNumber: number | null = null;
  private editingMacro: { number: number; keys: string[] } | null = null;

  constructor(options: EosEmulatorOptions = {}) {
    super();
    this.version = options.version ?? '3.2.10.36';
    if (options.demo) this.loadDemoShow();
  }

  // --- MessageTransport ---

  open(): Promise<void> {
    this.connected = true;
    this.log('Connect', 'Emulator connected (virtual)');
    this.emit('connected');
    return Promise.resolve();
  }

  close(): void {
    if (!this.connected) return;
    this.connected = false;
    this.inbox.clear();
    this.log('Disconnect', 'Emulator disconnected');
    this.emit('disconnected');
  }

  isConnected(): boolean {
    return this.connected;
  }

  send(address: string, args: readonly OscArgInput[] = []): void {
    if (!this.connected) {
      throw new TransportError('Emulator is not connected');
    }
    this.handle(address, args.map((arg) => toOscArg(arg).value));
  }

  receive(timeoutMs: number): Promise<OscMessage[]> {
    return this.inbox.take(timeoutMs);
  }

  // --- Show data ---

  addCue(input: CueInput): CueProperties {
    const cue: CueProperties = {
      ...blankCueFields(this.nextUid()),
      ...input,
    };
    this.cues.set(cueKey(cue), cue);
    return cue;
  }

  addGroup(number: number, label: string, channels: string[]): GroupProperties {
    const group: GroupProperties = { number, uid: this.nextUid(), label, channels };
    this.groups.set(number, group);
    return group;
  }

  addMacro(number: number, label: string, command: string[], mode = 'Background'): MacroProperties {
    const macro: MacroProperties = { number, uid: this.nextUid(), label, mode, command };
    this.macros.set(number, macro);
    return macro;
  }

  cue(cue: Pick<Cue, 'cuelist' | 'cue' | 'part'>): CueProperties | undefined {
    return this.cues.get(cueKey(cue));
  }

  group(number: number): GroupProperties | undefined {
    return this.groups.get(number);
  }

  macro(number: number): MacroProperties | undefined {
    return this.macros.get(number);
  }

  // --- Test hooks ---

  /** Queue an unsolicited message, as the console pushes state changes */
  push(address: string, args: OscArgInput[] = []): void {
    this.deliver(address, args.map((arg) => toOscArg(arg).value));
  }

  /** Swallow replies whose address matches `pattern` (trailing * allowed) */
  dropReplies(pattern: string): void {
    this.dropPatterns.push(pattern);
  }

  restoreReplies(): void {
    this.dropPatterns = [];
  }

  /** Command lines received on /eos/newcmd */
  getCommands(): string[] {
    return [...this.commands];
  }

  getKeys(): KeyPress[] {
    return this.keys.map((k) => ({ key: k.key, args: [...k.args] }));
  }

  clearHistory(): void {
    this.commands = [];
    this.keys = [];
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  // --- Request handling ---

  private handle(address: string, args: OscValue[]): void {
    const parts = address.split('/').filter(Boolean);
    if (parts[0] !== 'eos') {
      this.log('Unhandled', `${address} [${formatArgs(args)}]`);
      return;
    }

    switch (parts[1]) {
      case 'ping':
        this.deliver('/eos/out/ping', args);
        return;
      case 'newcmd':
        this.runCommand(getString(args));
        return;
      case 'key':
        this.pressKey(parts.slice(2).join('/'), args);
        return;
      case 'get':
        this.answer(parts.slice(2));
        return;
      case 'sc':
        this.log('ShowControl', parts.slice(2).join('/'));
        return;
    }
    this.log('Unhandled', `${address} [${formatArgs(args)}]`);
  }

  private answer(path: string[]): void {
    const [target, ...rest] = path;

    if (target === 'version') {
      this.deliver('/eos/out/get/version', [this.version]);
      return;
    }
    if (rest.length === 1 && rest[0] === 'count') {
      this.deliver(`/eos/out/get/${target}/count`, [this.count(target)]);
      return;
    }

    switch (target) {
      case 'cue':
        this.answerCue(rest);
        return;
      case 'group': {
        const group = this.groups.get(Number(rest[0]));
        if (group) this.replyGroup(group);
        return;
      }
      case 'macro': {
        const macro = this.macros.get(Number(rest[0]));
        if (macro) this.replyMacro(macro);
        return;
      }
    }
    this.log('Unanswered', `/eos/get/${path.join('/')}`);
  }

  private answerCue(rest: string[]): void {
    // uid/<uid>
    if (rest[0] === 'uid') {
      const cue = [...this.cues.values()].find((c) => c.uid === rest[1]);
      if (cue) this.replyCue(cue);
      return;
    }

    const list = Number(rest[0]);
    // <list>/count
    if (rest[1] === 'count') {
      this.deliver(`/eos/out/get/cue/${rest[0]}/count`, [this.listCues(list).length]);
      return;
    }
    // <list>/index/<i>
    if (rest[1] === 'index') {
      const cue = this.listCues(list)[Number(rest[2])];
      if (cue) this.replyCue(cue);
      return;
    }
    // <list>/<cue>/<part>
    const cue = this.cues.get(cueKey({ cuelist: list, cue: Number(rest[1]), part: Number(rest[2] ?? 0) }));
    if (cue) this.replyCue(cue);
  }

  private count(target: string): number {
    switch (target) {
      case 'cue':
        return this.cues.size;
      case 'cuelist':
        return new Set([...this.cues.values()].map((c) => c.cuelist)).size;
      case 'group':
        return this.groups.size;
      case 'macro':
        return this.macros.size;
    }
    return 0;
  }

  private listCues(list: number): CueProperties[] {
    return [...this.cues.values()].filter((c) => c.cuelist === list).sort(byCueOrder);
  }

  private replyCue(cue: CueProperties): void {
    const siblings = this.listCues(cue.cuelist);
    const index = siblings.indexOf(cue);
    const base = `/eos/out/get/cue/${cueKey(cue)}`;
    const tail = `list/${index}/${siblings.length}`;

    this.deliver(`${base}/${tail}`, cueArgs(cue, index));
    this.deliver(`${base}/fx/${tail}`, [index, cue.uid, ...(cue.fx ?? [])]);
    this.deliver(`${base}/links/${tail}`, [index, cue.uid, ...(cue.links ?? [])]);
    this.deliver(`${base}/actions/${tail}`, [index, cue.uid, ...(cue.actions ?? [])]);
  }

  private replyGroup(group: GroupProperties): void {
    const numbers = [...this.groups.keys()].sort((a, b) => a - b);
    const index = numbers.indexOf(group.number);
    const base = `/eos/out/get/group/${formatNumber(group.number)}`;
    const tail = `list/${index}/${numbers.length}`;

    this.deliver(`${base}/${tail}`, [index, group.uid, group.label]);
    this.deliver(`${base}/channels/${tail}`, [index, group.uid, ...group.channels]);
  }

  private replyMacro(macro: MacroProperties): void {
    const numbers = [...this.macros.keys()].sort((a, b) => a - b);
    const index = numbers.indexOf(macro.number);
    const base = `/eos/out/get/macro/${formatNumber(macro.number)}`;
    const tail = `list/${index}/${numbers.length}`;

    this.deliver(`${base}/${tail}`, [index, macro.uid, macro.label, macro.mode]);
    this.deliver(`${base}/text/${tail}`, [index, macro.uid, ...macro.command]);
  }

  // --- Command line ---

  private runCommand(line: string): void {
    this.commands.push(line);
    this.log('Command', line);

    const cueMatch = line.match(/^Cue (\S+) \/ (\S+)(?: Part (\d+))? (.*)$/);
    if (cueMatch) {
      this.cueCommand({ cuelist: Number(cueMatch[1]), cue: Number(cueMatch[2]), part: Number(cueMatch[3] ?? 0) }, cueMatch[4]);
      return;
    }

    let m = line.match(/^Group (\S+) Label (.*) #$/);
    if (m) {
      const number = Number(m[1]);
      const group = this.groups.get(number) ?? this.addGroup(number, '', []);
      group.label = m[2];
      return;
    }

    m = line.match(/^Chan (.+) Record Group (\S+) #$/);
    if (m) {
      const number = Number(m[2]);
      const group = this.groups.get(number) ?? this.addGroup(number, '', []);
      group.channels = parseSelection(m[1]);
      return;
    }

    m = line.match(/^(?:Group )?(\S+) #$/);
    if (m) {
      this.selectedNumber = Number(m[1]);
    }
  }

  private cueCommand(target: Pick<Cue, 'cuelist' | 'cue' | 'part'>, rest: string): void {
    if (rest === '# #') {
      if (!this.cue(target)) this.addCue(target);
      return;
    }

    const cue = this.cue(target);
    if (!cue) {
      this.log('Command', `No cue ${cueKey(target)}`);
      return;
    }

    let m: RegExpMatchArray | null;
    if (rest === 'Intensity Block #') {
      if (!cue.block.includes('I')) cue.block += 'I';
    } else if (rest === 'Block #') {
      if (!cue.block.includes('B')) cue.block += 'B';
    } else if (rest === 'Assert #') {
      cue.assert = 'A';
    } else if ((m = rest.match(/^Time (\S+) #$/))) {
      cue.upTime = Number(m[1]);
      cue.downTime = Number(m[1]);
    } else if ((m = rest.match(/^Scene (.*) #$/))) {
      cue.scene = m[1];
    }
  }

  // --- Keys ---

  private pressKey(key: string, args: OscValue[]): void {
    this.keys.push({ key, args });
    this.log('Key', args.length > 0 ? `${key} [${formatArgs(args)}]` : key);

    if (key === 'softkey_6' && this.selectedNumber !== null) {
      this.editingMacro = { number: this.selectedNumber, keys: [] };
      return;
    }
    if (!this.editingMacro) return;

    if (key === 'Select') {
      const { number, keys } = this.editingMacro;
      this.editingMacro = null;
      this.addMacro(number, '', keys);
      return;
    }
    this.editingMacro.keys.push(key);
  }

  // --- Helpers ---

  private deliver(address: string, args: OscValue[]): void {
    if (this.dropPatterns.some((p) => matchesPattern(p, address))) {
      this.log('Drop', address);
      return;
    }
    this.inbox.push({ address, args });
  }

  private nextUid(): string {
    this.uidSeq++;
    return `00000000-0000-4000-8000-${this.uidSeq.toString(16).padStart(12, '0')}`;
  }

  private loadDemoShow(): void {
    this.addCue({ cuelist: 1, cue: 1, part: 0, label: 'Preset', upTime: 3, downTime: 3 });
    this.addCue({ cuelist: 1, cue: 2, part: 0, label: 'House to half', scene: 'Preshow', block: 'B' });
    this.addCue({ cuelist: 1, cue: 2.5, part: 0, label: 'Walk in', links: ['2'] });
    this.addCue({ cuelist: 1, cue: 10, part: 0, label: 'Act 1', fx: ['1'], actions: ['Macro 1'] });
    this.addGroup(1, 'Front wash', ['1-12']);
    this.addGroup(2, 'Specials', ['21', '23', '25-27']);
    this.addMacro(1, 'Reset', ['Go_To_Cue', '1', 'Enter']);
  }

  private log(action: string, details: string): void {
    this._log.push({ timestamp: Date.now(), action, details });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    log.debug(`${action}: ${details}`);
  }
}
