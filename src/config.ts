/**
 * Configuration loader
 *
 * Reads a YAML config file with the console connection, reply timing and
 * logging settings, validates it, and fills in per-transport defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { validateClientConfig, formatZodError, ClientConfigOutput, TransportKind } from './config-schema';
import { LogLevel } from './logger';

export interface ConsoleConfig {
  host: string;
  transport: TransportKind;
  /** TCP: console port. UDP: the console's receive port. */
  port: number;
  /** UDP only: local port the console sends to */
  localPort: number;
  /** TCP only */
  reconnectDelayMs: number;
}

/** Runtime config used by the client and the CLI */
export interface Config {
  console: ConsoleConfig;
  timeouts: {
    replyMs: number;
    pollMs: number;
  };
  logging: {
    level?: LogLevel;
    pretty?: boolean;
  };
}

// --- Defaults ---

export const DEFAULT_CONFIG_FILE = 'eos.yml';

/** Eos factory ports */
const DEFAULT_PORTS: Record<TransportKind, { port: number; localPort: number }> = {
  'tcp-slip': { port: 3032, localPort: 0 },
  'tcp-packet-length': { port: 3032, localPort: 0 },
  udp: { port: 8000, localPort: 8001 },
};

function validate(document: unknown): ClientConfigOutput {
  try {
    return validateClientConfig(document);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

/**
 * Build runtime config from an already-parsed document.
 * Throws with one line per validation issue.
 */
export function normalizeConfig(document: unknown): Config {
  const validated = validate(document);
  const kind = validated.console.transport;
  const defaults = DEFAULT_PORTS[kind];

  return {
    console: {
      host: validated.console.host,
      transport: kind,
      port: validated.console.port ?? defaults.port,
      localPort: validated.console.localPort ?? defaults.localPort,
      reconnectDelayMs: validated.console.reconnectDelayMs ?? 3000,
    },
    timeouts: {
      replyMs: validated.timeouts.replyMs,
      pollMs: validated.timeouts.pollMs,
    },
    logging: {
      level: validated.logging.level,
      pretty: validated.logging.pretty,
    },
  };
}

/**
 * Load config from YAML. A missing file yields the defaults.
 */
export function loadConfig(configPath?: string): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    if (configPath) {
      throw new Error(`[Config] Config file not found: ${resolvedPath}`);
    }
    return normalizeConfig({});
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  const document: unknown = parse(raw);
  return normalizeConfig(document);
}
