/**
 * Eos command layer
 *
 * "Ensure" workflows over an EosClient: each reads the target first and only
 * types a command when the console differs from what is wanted. A target
 * that does not answer counts as missing (see isMissingTargetError).
 */

import { setTimeout as delay } from 'timers/promises';
import { CommandRejectedError, isMissingTargetError } from '../errors';
import { getLogger } from '../logger';
import { OscArg } from '../osc/types';
import { commandText } from './codecs';
import { cueFormat, formatNumber } from './cue';
import { EosClient } from './eos-client';
import { Cue, CueProperties, EosTab, GroupProperties } from './types';

const log = getLogger('Commands');

const KEY_DOWN: OscArg = { type: 'f', value: 1.0 };
const KEY_UP: OscArg = { type: 'f', value: 0.0 };

export interface EosCommandsOptions {
  /** Pause after opening a key sequence, before the console takes more keys */
  keyDelayMs?: number;
}

export interface RecordGroupOptions {
  /** Update label and channels of a differing existing group */
  overwrite?: boolean;
}

export type RecordOutcome = 'created' | 'updated' | 'unchanged';

function sameChannels(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((range, i) => range === b[i]);
}

export class EosCommands {
  private client: EosClient;
  private keyDelayMs: number;

  constructor(client: EosClient, options: EosCommandsOptions = {}) {
    this.client = client;
    this.keyDelayMs = options.keyDelayMs ?? 100;
  }

  blind(): void {
    this.client.pressKey('Blind');
  }

  live(): void {
    this.client.pressKey('Live');
  }

  /** Hold Tab, type the tab number, release Tab */
  async openTab(tab: EosTab): Promise<void> {
    this.client.pressKey('Tab', [KEY_DOWN]);
    await delay(this.keyDelayMs);
    for (const digit of String(tab)) {
      this.client.pressKey(digit);
    }
    this.client.pressKey('Tab', [KEY_UP]);
  }

  /** Record an empty cue in blind, unless the cue already exists */
  async recordBlankCue(cue: Cue): Promise<RecordOutcome> {
    this.blind();
    if (await this.findCue(cue)) {
      log.debug(`Cue ${cueFormat(cue)} already exists`);
      return 'unchanged';
    }
    log.info(`Recording blank cue ${cueFormat(cue)}`);
    this.client.sendCommand(commandText.recordBlankCue(cue));
    return 'created';
  }

  /** Returns true when the flag had to be set */
  async intensityBlockCue(cue: Cue): Promise<boolean> {
    const props = await this.client.getCue(cue);
    if (props.block.includes('I')) return false;
    this.client.sendCommand(commandText.intensityBlock(cue));
    return true;
  }

  async blockCue(cue: Cue): Promise<boolean> {
    const props = await this.client.getCue(cue);
    if (props.block.includes('B')) return false;
    this.client.sendCommand(commandText.block(cue));
    return true;
  }

  async assertCue(cue: Cue): Promise<boolean> {
    const props = await this.client.getCue(cue);
    if (props.assert.includes('A')) return false;
    this.client.sendCommand(commandText.assert(cue));
    return true;
  }

  setTime(cue: Cue, seconds: number): void {
    this.client.sendCommand(commandText.time(cue, seconds));
  }

  async addScene(cue: Cue, scene: string): Promise<void> {
    const props = await this.client.getCue(cue);
    if (props.scene !== '' && props.scene !== scene) {
      log.warn(`Renaming scene on ${cueFormat(cue)} (was "${props.scene}")`);
    }
    this.client.sendCommand(commandText.scene(cue, scene));
  }

  /**
   * Make group `group.number` hold `group.label` and `group.channels`.
   * An existing group that differs is only changed with `overwrite`.
   */
  async recordGroup(group: GroupProperties, options: RecordGroupOptions = {}): Promise<RecordOutcome> {
    await this.openTab(EosTab.Groups);

    let existing: GroupProperties | null;
    try {
      existing = await this.client.getGroup(group.number);
    } catch (err) {
      if (!isMissingTargetError(err)) throw err;
      existing = null;
    }

    if (!existing) {
      log.info(`Creating group ${formatNumber(group.number)}`);
      this.client.sendCommand(commandText.selectGroup(group.number));
      this.client.sendCommand(commandText.labelGroup(group.number, group.label));
      this.client.sendCommand(commandText.recordGroup(group));
      return 'created';
    }

    const labelDiffers = existing.label !== group.label;
    const channelsDiffer = !sameChannels(existing.channels, group.channels);
    if (!labelDiffers && !channelsDiffer) return 'unchanged';

    if (!options.overwrite) {
      throw new CommandRejectedError(`Existing group ${formatNumber(group.number)} differs from the desired group`);
    }

    if (labelDiffers) {
      log.info(`Updating group ${formatNumber(group.number)} label to "${group.label}"`);
      this.client.sendCommand(commandText.labelGroup(group.number, group.label));
    }
    if (channelsDiffer) {
      log.info(
        `Updating group ${formatNumber(group.number)} channels to ${group.channels.join(',')} (was ${existing.channels.join(',')})`,
      );
      this.client.sendCommand(commandText.selectGroup(group.number));
      this.client.sendCommand(commandText.recordGroup(group));
    }
    return 'updated';
  }

  /** Record a new macro by pressing `keys` in the macro editor */
  async recordMacro(macro: number, keys: readonly string[]): Promise<void> {
    await this.openTab(EosTab.Macros);

    try {
      await this.client.getMacro(macro);
    } catch (err) {
      if (!isMissingTargetError(err)) throw err;
      log.info(`Recording macro ${formatNumber(macro)}`);
      this.client.sendCommand(commandText.selectMacro(macro));
      this.client.pressKey('softkey_6');
      await delay(this.keyDelayMs);
      for (const key of keys) {
        this.client.pressKey(key);
      }
      this.client.pressKey('Select');
      return;
    }
    throw new CommandRejectedError(`Macro ${formatNumber(macro)} already exists`);
  }

  private async findCue(cue: Cue): Promise<CueProperties | null> {
    try {
      return await this.client.getCue(cue);
    } catch (err) {
      if (isMissingTargetError(err)) return null;
      throw err;
    }
  }
}
