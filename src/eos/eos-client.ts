/**
 * Eos Client
 *
 * Session with one ETC Eos console over a MessageTransport. Owns the
 * address router, the request engine, the record assembler and the console
 * state model; everything received while a call or poll() is pumping goes
 * through the router, so push notifications update the state model at any
 * time.
 *
 * Events:
 *   'connected'    (version)       transport open and console answered
 *   'disconnected'                 transport lost or closed
 *   'state'        (field, value)  a pushed console field changed
 *   'error'        (err)           non-fatal transport error
 */

import { EventEmitter } from 'events';
import * as path from 'path';
import { AddressRouter } from '../osc/address-router';
import { OscArgInput, OscMessage } from '../osc/types';
import { formatArgs } from '../osc/osc-args';
import { MessageTransport } from '../transport/transport';
import { getLogger } from '../logger';
import { RequestEngine, DEFAULT_ENGINE_OPTIONS } from './request-engine';
import { RecordAssembler } from './record-assembler';
import { ConsoleSnapshot, ConsoleStateModel } from './console-state';
import {
  PingResult,
  countExchange,
  cueByIndexQuery,
  cueByNumberQuery,
  cueByUidQuery,
  groupQuery,
  macroQuery,
  pingExchange,
  versionExchange,
} from './queries';
import { Cue, CueProperties, EosTarget, GroupProperties, MacroProperties } from './types';

const log = getLogger('Eos');

export interface EosClientOptions {
  /** Reply deadline for every call */
  timeoutMs?: number;
  /** Longest single wait on the transport */
  pollIntervalMs?: number;
  /** Name announced to the console's show control log at connect */
  clientName?: string;
}

export interface CountOptions {
  /** Cue list for target "cue" */
  cuelist?: number;
}

export class EosClient extends EventEmitter {
  readonly router: AddressRouter;
  readonly state: ConsoleStateModel;

  private transport: MessageTransport;
  private engine: RequestEngine;
  private assembler: RecordAssembler;
  private clientName: string;
  private version: string | null = null;
  private detachState: (() => void) | null;
  // Transports that emit their own 'disconnected' are forwarded instead
  private forwardsEvents = false;

  constructor(transport: MessageTransport, options: EosClientOptions = {}) {
    super();
    this.transport = transport;
    this.router = new AddressRouter();
    this.engine = new RequestEngine(transport, this.router, {
      timeoutMs: options.timeoutMs ?? DEFAULT_ENGINE_OPTIONS.timeoutMs,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_ENGINE_OPTIONS.pollIntervalMs,
    });
    this.assembler = new RecordAssembler(this.engine);
    this.clientName = options.clientName ?? path.basename(process.argv[1] || 'eos-osc');

    this.state = new ConsoleStateModel();
    this.detachState = this.state.attach(this.router);
    this.state.on('change', (field: keyof ConsoleSnapshot, value: unknown) => {
      log.debug({ field, value }, 'Console state changed');
      this.emit('state', field, value);
    });

    this.router.setDefaultHandler((message) => this.onUnhandled(message));

    if (transport instanceof EventEmitter) {
      this.forwardsEvents = true;
      transport.on('connected', () => log.info(`Connected to ${transport.description}`));
      transport.on('disconnected', () => {
        log.info(`Disconnected from ${transport.description}`);
        this.emit('disconnected');
      });
      transport.on('error', (err: Error) => {
        if (this.listenerCount('error') > 0) this.emit('error', err);
      });
    }
  }

  /** Console version reported at connect, or null before connect() */
  get consoleVersion(): string | null {
    return this.version;
  }

  isConnected(): boolean {
    return this.transport.isConnected();
  }

  /** Open the transport, announce this client and ask the console for its version */
  async connect(): Promise<string> {
    await this.transport.open();
    try {
      this.transport.send(`/eos/sc/Connected from ${this.clientName}`);
      this.version = await this.getVersion();
    } catch (err) {
      this.transport.close();
      throw err;
    }
    log.info({ version: this.version }, `Eos ${this.version} on ${this.transport.description}`);
    this.emit('connected', this.version);
    return this.version;
  }

  disconnect(): void {
    this.transport.close();
    if (this.detachState) {
      this.detachState();
      this.detachState = null;
    }
    this.router.setDefaultHandler(null);
    if (!this.forwardsEvents) this.emit('disconnected');
  }

  // --- Queries ---

  ping(token = ''): Promise<PingResult> {
    return this.engine.call(pingExchange(token));
  }

  getVersion(): Promise<string> {
    return this.engine.call(versionExchange());
  }

  getTargetCount(target: EosTarget, options: CountOptions = {}): Promise<number> {
    return this.engine.call(countExchange(target, options.cuelist));
  }

  getCue(cue: Cue): Promise<CueProperties> {
    return this.assembler.assemble(cueByNumberQuery(cue));
  }

  getCueByUid(uid: string): Promise<CueProperties> {
    return this.assembler.assemble(cueByUidQuery(uid));
  }

  getCueByIndex(index: number, cuelist = 1): Promise<CueProperties> {
    return this.assembler.assemble(cueByIndexQuery(index, cuelist));
  }

  getGroup(group: number): Promise<GroupProperties> {
    return this.assembler.assemble(groupQuery(group));
  }

  getMacro(macro: number): Promise<MacroProperties> {
    return this.assembler.assemble(macroQuery(macro));
  }

  // --- Output ---

  /** Replace the command line with `line` (terminate with "#" to execute) */
  sendCommand(line: string): void {
    log.debug({ line }, 'Command');
    this.transport.send('/eos/newcmd', [line]);
  }

  /** Press a console key by name, e.g. "Blind", "softkey_6", "Tab" */
  pressKey(key: string, args: readonly OscArgInput[] = []): void {
    this.transport.send(`/eos/key/${key}`, args);
  }

  // --- Push notifications ---

  /** Dispatch pushed messages for `durationMs`; resolves with the count */
  poll(durationMs: number): Promise<number> {
    return this.engine.pump(durationMs);
  }

  getState(): ConsoleSnapshot {
    return this.state.getSnapshot();
  }

  private onUnhandled(message: OscMessage): void {
    log.debug({ address: message.address, args: formatArgs(message.args) }, 'Unhandled message');
  }
}
