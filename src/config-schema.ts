/**
 * Config Schema Validation
 *
 * Zod schemas for the client configuration file.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger';

// --- Reusable Validators ---

const portSchema = z.number().int().min(1).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || ipv4.test(val) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

export const transportKindSchema = z.enum(['tcp-slip', 'tcp-packet-length', 'udp']);

// --- Console Connection ---

const consoleConfigSchema = z.object({
  host: hostSchema.default('127.0.0.1'),
  transport: transportKindSchema.default('tcp-slip'),
  port: portSchema.optional(),
  localPort: z.number().int().min(0).max(65535).optional(),
  reconnectDelayMs: z.number().int().min(100).optional(),
}).strict();

// --- Reply Timing ---

const timeoutsConfigSchema = z.object({
  replyMs: z.number().int().min(10).default(1500),
  pollMs: z.number().int().min(1).default(100),
}).strict().refine(
  (t) => t.pollMs <= t.replyMs,
  { message: 'pollMs must not exceed replyMs' }
);

// --- Logging ---

const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).optional(),
  pretty: z.boolean().optional(),
}).strict();

// --- Full Config Schema ---

export const clientConfigSchema = z.object({
  console: consoleConfigSchema.default({}),
  timeouts: timeoutsConfigSchema.default({}),
  logging: loggingConfigSchema.default({}),
}).strict();

// --- Type Exports ---

export type TransportKind = z.output<typeof transportKindSchema>;
export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ClientConfigOutput = z.output<typeof clientConfigSchema>;

/**
 * Validate a parsed config document
 */
export function validateClientConfig(data: unknown): ClientConfigOutput {
  return clientConfigSchema.parse(data ?? {});
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
