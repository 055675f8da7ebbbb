import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_CLIENT_OPTIONS, detectLogger, resolveClientOptions } from '../src/config.js';
import { DEFAULT_DISCOVERY_RETRY, DEFAULT_SEND_RETRY, RetryPolicy } from '../src/retry/policy.js';
import { openUdpTransport } from '../src/transport/udp.js';
import { silentLogger, type LogSink } from '../src/types/logger.js';
import { ValidationError } from '../src/core/errors.js';

describe('resolveClientOptions', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should fill every field from the defaults', () => {
    const resolved = resolveClientOptions({}, {});

    expect(resolved).toEqual({ ...DEFAULT_CLIENT_OPTIONS, logger: silentLogger });
    expect(resolved.port).toBe(38899);
    expect(resolved.timeout).toBe(3000);
    expect(resolved.discoveryTimeout).toBe(10000);
    expect(resolved.broadcastAddress).toBe('255.255.255.255');
    expect(resolved.retry).toBe(DEFAULT_SEND_RETRY);
    expect(resolved.discoveryRetry).toBe(DEFAULT_DISCOVERY_RETRY);
    expect(resolved.transportFactory).toBe(openUdpTransport);
    expect(resolved.logger).toBe(silentLogger);
  });

  it('should override defaults and ignore undefined values', () => {
    const retry = RetryPolicy.disabled();
    const resolved = resolveClientOptions({ timeout: 1500, port: undefined, retry }, {});

    expect(resolved.timeout).toBe(1500);
    expect(resolved.port).toBe(38899);
    expect(resolved.retry).toBe(retry);
  });

  it('should keep the caller logger even with DEBUG set', () => {
    const logger: LogSink = { log: () => {} };
    expect(resolveClientOptions({ logger }, { DEBUG: '*' }).logger).toBe(logger);
  });

  it.each([
    ['port', { port: 70000 }],
    ['port', { port: 1.5 }],
    ['timeout', { timeout: 0 }],
    ['discoveryTimeout', { discoveryTimeout: -1 }],
    ['broadcastAddress', { broadcastAddress: 'lights.local' }],
  ])('rejects an invalid %s', (field, options) => {
    let caught: unknown;
    try {
      resolveClientOptions(options, {});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ field });
    expect(caught instanceof Error && caught.message.startsWith(`Invalid option "${field}": `)).toBe(true);
  });

  it('should report the offending value', () => {
    let caught: unknown;
    try {
      resolveClientOptions({ port: 0 }, {});
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ field: 'port', value: 0 });
  });
});

describe('detectLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should stay silent without DEBUG', () => {
    expect(detectLogger({})).toBe(silentLogger);
    expect(detectLogger({ DEBUG: 'express:*' })).toBe(silentLogger);
  });

  it.each(['*', 'wizlink', 'app,wizlink'])('logs debug output for DEBUG=%s', (value) => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = detectLogger({ DEBUG: value });
    logger.log('debug', 'hello');
    logger.log('trace', 'hidden');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[DEBUG] hello');
  });
});
