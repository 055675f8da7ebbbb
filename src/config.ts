/**
 * Client configuration
 *
 * Options are merged over `DEFAULT_CLIENT_OPTIONS` and validated once, when
 * the client is created. Per-call options still override these.
 */

import { z } from 'zod';
import { ValidationError } from './core/errors.js';
import { DEFAULT_DISCOVERY_RETRY, DEFAULT_SEND_RETRY, RetryPolicy } from './retry/policy.js';
import { openUdpTransport } from './transport/udp.js';
import { consoleLogger, silentLogger, type LogSink } from './types/logger.js';
import type { TransportFactory } from './types/udp.js';
import {
  DEFAULT_BROADCAST_ADDRESS,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DEFAULT_TIMEOUT_MS,
  WIZ_PORT,
} from './constants.js';

export interface ClientOptions {
  /**
   * Device UDP port
   * @default 38899
   */
  port?: number;

  /**
   * Per-attempt timeout for point-to-point calls (ms)
   * @default 3000
   */
  timeout?: number;

  /**
   * Total discovery window (ms)
   * @default 10000
   */
  discoveryTimeout?: number;

  /**
   * @default '255.255.255.255'
   */
  broadcastAddress?: string;

  /**
   * Retry policy for point-to-point calls
   */
  retry?: RetryPolicy;

  /**
   * Repeat-broadcast schedule for discovery
   */
  discoveryRetry?: RetryPolicy;

  /**
   * Log sink. Without one, `DEBUG=*` or `DEBUG=wizlink` turns on console debug output.
   */
  logger?: LogSink;

  /**
   * Socket factory
   */
  transportFactory?: TransportFactory;
}

export type ResolvedClientOptions = Required<ClientOptions>;

export const DEFAULT_CLIENT_OPTIONS: Omit<ResolvedClientOptions, 'logger'> = {
  port: WIZ_PORT,
  timeout: DEFAULT_TIMEOUT_MS,
  discoveryTimeout: DEFAULT_DISCOVERY_TIMEOUT_MS,
  broadcastAddress: DEFAULT_BROADCAST_ADDRESS,
  retry: DEFAULT_SEND_RETRY,
  discoveryRetry: DEFAULT_DISCOVERY_RETRY,
  transportFactory: openUdpTransport,
};

function isLogSink(value: unknown): value is LogSink {
  return typeof value === 'object' && value !== null && 'log' in value && typeof value.log === 'function';
}

const clientOptionsSchema = z.object({
  port: z.number().int().min(1).max(65535),
  timeout: z.number().int().positive(),
  discoveryTimeout: z.number().int().nonnegative(),
  broadcastAddress: z.string().ip({ version: 'v4' }),
  retry: z.instanceof(RetryPolicy),
  discoveryRetry: z.instanceof(RetryPolicy),
  logger: z.custom<LogSink>(isLogSink, { message: 'Expected an object with a log(level, message) method' }),
  transportFactory: z.custom<TransportFactory>((value) => typeof value === 'function', {
    message: 'Expected a function',
  }),
});

/**
 * Log sink implied by the DEBUG environment variable
 */
export function detectLogger(env: NodeJS.ProcessEnv = process.env): LogSink {
  const debug = env.DEBUG ?? '';
  if (debug === '*' || debug.includes('wizlink')) {
    return consoleLogger('debug');
  }
  return silentLogger;
}

/**
 * Merge `options` over the defaults and validate the result.
 * Throws ValidationError naming the first invalid field.
 *
 * @example
 * ```typescript
 * const resolved = resolveClientOptions({ timeout: 1000 });
 * resolved.port; // 38899
 * ```
 */
export function resolveClientOptions(
  options: ClientOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedClientOptions {
  const merged: ResolvedClientOptions = {
    ...DEFAULT_CLIENT_OPTIONS,
    ...withoutUndefined(options),
    logger: options.logger ?? detectLogger(env),
  };

  const result = clientOptionsSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(`Invalid option "${field}": ${issue.message}`, {
      field,
      value: issue.path.length > 0 ? Reflect.get(merged, issue.path[0]) : undefined,
    });
  }

  // Validated, but the caller's objects are kept as-is
  return merged;
}

/**
 * Copy of `options` without the keys set to undefined, so a spread of it
 * never erases a default
 */
export function withoutUndefined<T extends object>(options: T): Partial<T> {
  const out: Partial<T> = {};
  for (const [key, value] of Object.entries(options)) {
    if (value !== undefined) Reflect.set(out, key, value);
  }
  return out;
}
