/**
 * Console State Model
 *
 * Snapshot of what the console pushes unprompted: current user, the
 * previous/active/pending playback cues, show name, console state and the
 * lock flag. Standing handlers overwrite one field per message (last write
 * wins) and emit 'change'.
 *
 * Events:
 *   'change' (field, value)
 */

import { EventEmitter } from 'events';
import { AddressRouter, HandlerToken } from '../osc/address-router';
import { OscMessage } from '../osc/types';
import { getBool, getInt, getString } from '../osc/osc-args';
import { DecodeError } from '../errors';
import { getLogger } from '../logger';
import { parseCueText } from './cue';
import { Cue } from './types';

const log = getLogger('State');

export interface ConsoleSnapshot {
  user: number | null;
  previousCue: Cue | null;
  activeCue: Cue | null;
  pendingCue: Cue | null;
  showName: string;
  state: number | null;
  locked: boolean;
}

export type SnapshotField = keyof ConsoleSnapshot;

type CueField = 'previousCue' | 'activeCue' | 'pendingCue';

export function initialSnapshot(): ConsoleSnapshot {
  return {
    user: null,
    previousCue: null,
    activeCue: null,
    pendingCue: null,
    showName: '',
    state: null,
    locked: false,
  };
}

export class ConsoleStateModel extends EventEmitter {
  private snapshot: ConsoleSnapshot = initialSnapshot();

  /** Register the standing handlers; returns a function that removes them */
  attach(router: AddressRouter): () => void {
    const tokens: HandlerToken[] = [
      router.register('/eos/out/user', (m) => this.set('user', getInt(m.args))),
      router.register('/eos/out/previous/cue*', (m) => this.updateCue('previousCue', m)),
      router.register('/eos/out/active/cue*', (m) => this.updateCue('activeCue', m)),
      router.register('/eos/out/pending/cue*', (m) => this.updateCue('pendingCue', m)),
      router.register('/eos/out/show/name', (m) => this.set('showName', getString(m.args))),
      router.register('/eos/out/state', (m) => this.set('state', getInt(m.args))),
      router.register('/eos/out/locked', (m) => this.set('locked', getBool(m.args))),
    ];
    return () => {
      for (const token of tokens) router.unregister(token);
    };
  }

  getSnapshot(): ConsoleSnapshot {
    return { ...this.snapshot };
  }

  get<K extends SnapshotField>(field: K): ConsoleSnapshot[K] {
    return this.snapshot[field];
  }

  reset(): void {
    this.snapshot = initialSnapshot();
  }

  private set<K extends SnapshotField>(field: K, value: ConsoleSnapshot[K]): void {
    this.snapshot[field] = value;
    this.emit('change', field, value);
  }

  private updateCue(field: CueField, message: OscMessage): void {
    // The numeric variant (/eos/out/active/cue/<list>/<cue>) repeats what the text says
    if (!message.address.endsWith('/text')) return;

    const text = getString(message.args);
    if (text === '') {
      this.set(field, null);
      return;
    }

    try {
      this.set(field, parseCueText(text));
    } catch (err) {
      if (!(err instanceof DecodeError)) throw err;
      log.warn({ address: message.address, text }, `Ignoring cue text: ${err.message}`);
    }
  }
}
