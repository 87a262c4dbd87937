export { EosClient } from './eos-client';
export type { EosClientOptions, CountOptions } from './eos-client';
export { EosCommands } from './commands';
export type { EosCommandsOptions, RecordGroupOptions, RecordOutcome } from './commands';
export { ConsoleStateModel, initialSnapshot } from './console-state';
export type { ConsoleSnapshot, SnapshotField } from './console-state';
export { RequestEngine, DEFAULT_ENGINE_OPTIONS } from './request-engine';
export type { Exchange, RequestEngineOptions } from './request-engine';
export { RecordAssembler, toExchange } from './record-assembler';
export type { CompositeQuery, Assembly } from './record-assembler';
export * from './queries';
export * from './codecs';
export * from './cue';
export * from './types';
export * from '../errors';
export { AddressRouter, matchesPattern } from '../osc/address-router';
export type { MessageHandler, HandlerToken } from '../osc/address-router';
export type { OscMessage, OscValue, OscArg, OscArgInput } from '../osc/types';
export { createTransport, TcpTransport, UdpTransport } from '../transport';
export type { MessageTransport } from '../transport';
export { EosEmulator } from '../emulators/eos-emulator';
export { loadConfig, normalizeConfig } from '../config';
export type { Config, ConsoleConfig } from '../config';
