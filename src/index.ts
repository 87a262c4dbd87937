#!/usr/bin/env node

/**
 * eos-osc
 *
 * Command-line client for ETC Eos consoles over OSC.
 *
 * Usage:
 *   eos-osc version                  # Console software version
 *   eos-osc ping [token]             # Round trip through /eos/ping
 *   eos-osc count <target> [list]    # Number of cues, groups, macros, ...
 *   eos-osc cue 1/10[/2]             # Cue properties
 *   eos-osc group <n>                # Group label and channels
 *   eos-osc macro <n>                # Macro text
 *   eos-osc watch [seconds]          # Print playback/state pushes
 *
 * Options:
 *   --config, -c <path>   Config YAML (default ./eos.yml)
 *   --verbose, -v         Debug logging
 *   --emulate             Talk to the built-in emulator instead of a console
 */

import { loadConfig } from './config';
import { initLogger } from './logger';
import { errorMessage } from './errors';
import { createTransport } from './transport';
import { EosEmulator } from './emulators/eos-emulator';
import { EosClient } from './eos/eos-client';
import { ConsoleSnapshot } from './eos/console-state';
import { cueFormat, cueTarget, formatNumber, parseCueSpec } from './eos/cue';
import { Cue, CueProperties, EOS_TARGETS, EosTarget, GroupProperties, MacroProperties, isEosTarget } from './eos/types';

export type CliCommand =
  | { kind: 'version' }
  | { kind: 'ping'; token: string }
  | { kind: 'count'; target: EosTarget; cuelist: number }
  | { kind: 'cue'; cue: Cue }
  | { kind: 'group'; number: number }
  | { kind: 'macro'; number: number }
  | { kind: 'watch'; seconds: number };

export interface CliOptions {
  configPath?: string;
  verbose: boolean;
  emulate: boolean;
  help: boolean;
  command: CliCommand | null;
}

function printUsage(): void {
  console.log('');
  console.log('  eos-osc');
  console.log('  OSC client for ETC Eos consoles');
  console.log('');
  console.log('  Commands:');
  console.log('    version                  Console software version');
  console.log('    ping [token]             Round trip through /eos/ping');
  console.log(`    count <target> [list]    Count of ${EOS_TARGETS.join(', ')}`);
  console.log('    cue <list>/<cue>[/part]  Cue properties');
  console.log('    group <n>                Group label and channels');
  console.log('    macro <n>                Macro text');
  console.log('    watch [seconds]          Print pushed console state (0 = until Ctrl+C)');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./eos.yml)');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --emulate             Use the built-in console emulator');
  console.log('    --help, -h            Show this help');
  console.log('');
}

function numberArg(value: string | undefined, what: string): number {
  const n = value === undefined || value.trim() === '' ? NaN : Number(value);
  if (!Number.isFinite(n)) {
    throw new Error(`${what} must be a number, got "${value ?? ''}"`);
  }
  return n;
}

function parseCommand(words: string[]): CliCommand | null {
  const [name, ...rest] = words;
  switch (name) {
    case undefined:
      return null;
    case 'version':
      return { kind: 'version' };
    case 'ping':
      return { kind: 'ping', token: rest[0] ?? 'eos-osc' };
    case 'count': {
      const target = rest[0];
      if (target === undefined || !isEosTarget(target)) {
        throw new Error(`count needs a target: ${EOS_TARGETS.join(', ')}`);
      }
      return { kind: 'count', target, cuelist: rest[1] === undefined ? 1 : numberArg(rest[1], 'Cue list') };
    }
    case 'cue':
      if (rest[0] === undefined) throw new Error('cue needs <list>/<cue>[/<part>]');
      return { kind: 'cue', cue: parseCueSpec(rest[0]) };
    case 'group':
      return { kind: 'group', number: numberArg(rest[0], 'Group') };
    case 'macro':
      return { kind: 'macro', number: numberArg(rest[0], 'Macro') };
    case 'watch':
      return { kind: 'watch', seconds: rest[0] === undefined ? 0 : numberArg(rest[0], 'Seconds') };
  }
  throw new Error(`Unknown command "${name}"`);
}

/** Parse arguments after the node binary and script (process.argv.slice(2)) */
export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { verbose: false, emulate: false, help: false, command: null };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
      case '-c':
        options.configPath = args[++i];
        if (!options.configPath) throw new Error('--config requires a file path');
        break;
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--emulate':
        options.emulate = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        if (arg.startsWith('-') && Number.isNaN(Number(arg))) {
          throw new Error(`Unknown option ${arg}`);
        }
        words.push(arg);
    }
  }

  options.command = parseCommand(words);
  return options;
}

// --- Output ---

function formatTime(seconds: number): string {
  return seconds < 0 ? '-' : `${formatNumber(seconds)}s`;
}

export function formatCue(cue: CueProperties): string[] {
  const lines = [
    `${cueTarget(cue)}${cue.label ? `  "${cue.label}"` : ''}`,
    `  uid      ${cue.uid}`,
    `  up       ${formatTime(cue.upTime)} (delay ${formatTime(cue.upDelay)})`,
    `  down     ${formatTime(cue.downTime)} (delay ${formatTime(cue.downDelay)})`,
  ];
  if (cue.block) lines.push(`  block    ${cue.block}`);
  if (cue.assert) lines.push(`  assert   ${cue.assert}`);
  if (cue.mark) lines.push(`  mark     ${cue.mark}`);
  if (cue.link) lines.push(`  link     ${cue.link}`);
  if (cue.scene) lines.push(`  scene    ${cue.scene}${cue.sceneEnd ? ' (end)' : ''}`);
  if (cue.notes) lines.push(`  notes    ${cue.notes}`);
  if (cue.fx) lines.push(`  fx       ${cue.fx.join(', ')}`);
  if (cue.links) lines.push(`  links    ${cue.links.join(', ')}`);
  if (cue.actions) lines.push(`  actions  ${cue.actions.join(', ')}`);
  return lines;
}

export function formatGroup(group: GroupProperties): string[] {
  return [
    `Group ${formatNumber(group.number)}${group.label ? `  "${group.label}"` : ''}`,
    `  channels ${group.channels.join(', ') || '(none)'}`,
  ];
}

export function formatMacro(macro: MacroProperties): string[] {
  return [
    `Macro ${formatNumber(macro.number)}${macro.label ? `  "${macro.label}"` : ''} [${macro.mode}]`,
    `  ${macro.command.join(' ') || '(empty)'}`,
  ];
}

export function formatStateField(snapshot: ConsoleSnapshot, field: keyof ConsoleSnapshot): string {
  switch (field) {
    case 'previousCue':
    case 'activeCue':
    case 'pendingCue': {
      const cue = snapshot[field];
      if (!cue) return '-';
      const progress = cue.percentage === undefined ? '' : ` ${Math.round(cue.percentage * 100)}%`;
      return `${cueFormat(cue)} part ${cue.part}${progress}`;
    }
    default: {
      const value = snapshot[field];
      return value === null ? '-' : String(value);
    }
  }
}

// --- Commands ---

async function watch(client: EosClient, seconds: number): Promise<void> {
  let stopped = false;
  process.once('SIGINT', () => {
    stopped = true;
  });

  client.on('state', (field: keyof ConsoleSnapshot) => {
    console.log(`  ${field.padEnd(12)} ${formatStateField(client.getState(), field)}`);
  });

  const deadline = seconds > 0 ? Date.now() + seconds * 1000 : Infinity;
  while (!stopped && Date.now() < deadline) {
    await client.poll(Math.min(1000, deadline - Date.now()));
  }
}

async function run(client: EosClient, command: CliCommand): Promise<void> {
  switch (command.kind) {
    case 'version':
      console.log(await client.getVersion());
      return;
    case 'ping': {
      const { echo, roundtripMs } = await client.ping(command.token);
      console.log(`Reply "${echo}" in ${roundtripMs}ms`);
      return;
    }
    case 'count':
      console.log(await client.getTargetCount(command.target, { cuelist: command.cuelist }));
      return;
    case 'cue':
      formatCue(await client.getCue(command.cue)).forEach((line) => console.log(line));
      return;
    case 'group':
      formatGroup(await client.getGroup(command.number)).forEach((line) => console.log(line));
      return;
    case 'macro':
      formatMacro(await client.getMacro(command.number)).forEach((line) => console.log(line));
      return;
    case 'watch':
      await watch(client, command.seconds);
      return;
  }
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`[Error] ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  if (options.help || !options.command) {
    printUsage();
    if (!options.help) process.exitCode = 1;
    return;
  }

  const config = loadConfig(options.configPath);
  initLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });

  const transport = options.emulate ? new EosEmulator({ demo: true }) : createTransport(config.console);
  const client = new EosClient(transport, {
    timeoutMs: config.timeouts.replyMs,
    pollIntervalMs: config.timeouts.pollMs,
  });

  try {
    await client.connect();
    await run(client, options.command);
  } finally {
    client.disconnect();
  }
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`[Error] ${errorMessage(err)}`);
    process.exitCode = 1;
  });
}
