/**
 * Broadcast discovery
 *
 * One total window per call: the initial broadcast, every scheduled repeat and
 * every reply share the same deadline. Replies are deduplicated by MAC, first
 * one wins. Silence and garbage are never errors; an empty list is a valid result.
 */

import os from 'node:os';
import { z } from 'zod';
import { ConnectionError } from '../core/errors.js';
import { decodeDatagram, encodeMessage, resultOf } from '../protocol/codec.js';
import { DEFAULT_DISCOVERY_RETRY, type RetryPolicy } from '../retry/policy.js';
import { openUdpTransport } from '../transport/udp.js';
import { silentLogger, type LogSink } from '../types/logger.js';
import type {
  DatagramTransport,
  DiscoverAllOptions,
  DiscoverOptions,
  DiscoveredDevice,
  EngineOptions,
  InterfaceAddress,
  Message,
  TransportFactory,
} from '../types/udp.js';
import {
  DEFAULT_BROADCAST_ADDRESS,
  DEFAULT_DISCOVERY_TIMEOUT_MS,
  DISCOVERY_PHONE_IP,
  DISCOVERY_PHONE_MAC,
  DISCOVERY_REQUEST_ID,
  MAX_TIMER_DELAY_MS,
  METHOD_REGISTRATION,
  WIZ_PORT,
} from '../constants.js';

const registrationResultSchema = z
  .object({
    mac: z.string(),
    moduleName: z.string().optional(),
    fwVersion: z.string().optional(),
  })
  .passthrough();

/**
 * Registration request every light answers with its MAC
 */
export function buildRegistrationMessage(): Message {
  return {
    method: METHOD_REGISTRATION,
    params: {
      phoneMac: DISCOVERY_PHONE_MAC,
      register: false,
      phoneIp: DISCOVERY_PHONE_IP,
      id: DISCOVERY_REQUEST_ID,
    },
  };
}

/**
 * Device described by one registration reply, or null when the datagram
 * is not JSON, is an error reply, or carries no MAC
 */
export function parseRegistrationReply(msg: Buffer, ip: string, port: number): DiscoveredDevice | null {
  const decoded = decodeDatagram(msg);
  if (decoded.kind !== 'result') return null;

  const parsed = registrationResultSchema.safeParse(resultOf(decoded.data));
  if (!parsed.success || parsed.data.mac === '') return null;

  const { mac, moduleName, fwVersion } = parsed.data;
  return { ip, port, mac, moduleName, fwVersion };
}

/**
 * Non-internal IPv4 interfaces of this host
 */
export function listIPv4Interfaces(): InterfaceAddress[] {
  const result: InterfaceAddress[] = [];
  for (const [name, entries] of Object.entries(os.networkInterfaces())) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4' && !entry.internal) {
        result.push({ name, address: entry.address });
      }
    }
  }
  return result;
}

/**
 * Repeat broadcasts inside one window.
 * Each repeat is its own timer that re-checks the deadline when it fires.
 */
class RepeatSchedule {
  private timer: NodeJS.Timeout | null = null;
  private sent = 0;
  private interval: number;
  private stopped = false;

  constructor(
    private readonly retry: RetryPolicy,
    private readonly startedAt: number,
    private readonly window: number,
    private readonly fire: () => void,
    private readonly logger: LogSink
  ) {
    this.interval = retry.baseInterval;
  }

  start(): void {
    if (this.retry.enabled) this.scheduleNext();
  }

  cancel(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private scheduleNext(): void {
    if (this.stopped || this.sent >= this.retry.maxRetries) return;

    this.timer = setTimeout(() => {
      this.timer = null;
      const elapsed = Date.now() - this.startedAt;
      if (elapsed >= this.window) {
        this.logger.log('trace', `Window closed after ${elapsed}ms, suppressing further broadcasts`);
        this.stopped = true;
        return;
      }

      this.sent++;
      this.logger.log('debug', `Repeat broadcast ${this.sent}/${this.retry.maxRetries}`);
      this.fire();

      this.interval = this.retry.nextInterval(this.interval);
      this.scheduleNext();
    }, Math.min(this.interval, MAX_TIMER_DELAY_MS));
  }
}

/**
 * @example
 * ```typescript
 * const collector = new DiscoveryCollector();
 *
 * // Default: 10s window, exponential repeats from 500ms
 * const lights = await collector.discover();
 *
 * // Quick single broadcast on one subnet
 * const quick = await collector.discover({
 *   broadcastAddress: '192.168.1.255',
 *   timeout: 2000,
 *   retry: RetryPolicy.disabled(),
 * });
 * ```
 */
export class DiscoveryCollector {
  private readonly transportFactory: TransportFactory;
  private readonly logger: LogSink;

  constructor(options: EngineOptions = {}) {
    this.transportFactory = options.transportFactory ?? openUdpTransport;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Broadcast a registration request and collect every distinct light that
   * answers before `timeout` elapses.
   *
   * Rejects only with ConnectionError, when the broadcast socket cannot be
   * opened or the first broadcast cannot be sent.
   */
  async discover(options: DiscoverOptions = {}): Promise<DiscoveredDevice[]> {
    const broadcastAddress = options.broadcastAddress ?? DEFAULT_BROADCAST_ADDRESS;
    const window = options.timeout ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
    const retry = options.retry ?? DEFAULT_DISCOVERY_RETRY;
    const port = options.port ?? WIZ_PORT;

    const payload = encodeMessage(buildRegistrationMessage());
    this.logger.log('info', `Broadcasting to ${broadcastAddress}:${port}`);
    this.logger.log('debug', `Broadcast: ${payload.toString('utf8')}`);

    const transport = await this.openTransport(broadcastAddress, port, options.localAddress);

    const devices: DiscoveredDevice[] = [];
    const seen = new Set<string>();
    const unsubscribe = transport.onMessage((msg, rinfo) => {
      const device = parseRegistrationReply(msg, rinfo.address, rinfo.port);
      if (!device) {
        this.logger.log('trace', `Ignoring datagram from ${rinfo.address}`);
        return;
      }
      if (seen.has(device.mac)) return;
      seen.add(device.mac);
      devices.push(device);
      this.logger.log('debug', `Found ${device.mac} at ${device.ip} (total ${devices.length})`);
    });

    const startedAt = Date.now();
    const schedule = new RepeatSchedule(
      retry,
      startedAt,
      window,
      () => {
        transport.send(payload, port, broadcastAddress).catch((err: unknown) => {
          this.logger.log('warn', `Repeat broadcast failed: ${err instanceof Error ? err.message : String(err)}`);
        });
      },
      this.logger
    );

    try {
      await this.sendInitial(transport, payload, port, broadcastAddress);
      schedule.start();

      this.logger.log('info', `Collecting responses for ${window}ms...`);
      await sleep(Math.max(0, window - (Date.now() - startedAt)));

      this.logger.log('info', `Discovery complete: ${devices.length} light(s)`);
      return devices;
    } finally {
      schedule.cancel();
      unsubscribe();
      await transport.close();
    }
  }

  /**
   * Run `discover` once per non-internal IPv4 interface, binding each socket
   * to the interface address, and merge the results by MAC. A failing
   * interface is logged and skipped.
   */
  async discoverOnAllInterfaces(options: DiscoverAllOptions = {}): Promise<DiscoveredDevice[]> {
    const { interfaces = listIPv4Interfaces, ...discoverOptions } = options;
    let targets: InterfaceAddress[];
    try {
      targets = interfaces();
    } catch (err) {
      this.logger.log('warn', `Interface enumeration failed: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }
    this.logger.log('info', `Discovering on ${targets.length} interface(s)`);

    const results = await Promise.allSettled(
      targets.map((iface) =>
        this.discover({
          ...discoverOptions,
          broadcastAddress: DEFAULT_BROADCAST_ADDRESS,
          localAddress: iface.address,
        })
      )
    );

    const merged: DiscoveredDevice[] = [];
    const seen = new Set<string>();
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.log('warn', `Discovery on ${targets[index].name} (${targets[index].address}) failed: ${reason}`);
        return;
      }
      for (const device of result.value) {
        if (seen.has(device.mac)) continue;
        seen.add(device.mac);
        merged.push(device);
      }
    });

    return merged;
  }

  private async openTransport(
    broadcastAddress: string,
    port: number,
    localAddress?: string
  ): Promise<DatagramTransport> {
    try {
      return await this.transportFactory({ broadcast: true, localAddress, logger: this.logger });
    } catch (err) {
      this.logger.log('error', `Broadcast failed: ${err instanceof Error ? err.message : String(err)}`);
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`Broadcast to ${broadcastAddress}:${port} failed`, {
        address: broadcastAddress,
        port,
        cause: err,
      });
    }
  }

  private async sendInitial(
    transport: DatagramTransport,
    payload: Buffer,
    port: number,
    broadcastAddress: string
  ): Promise<void> {
    try {
      const bytesSent = await transport.send(payload, port, broadcastAddress);
      this.logger.log('debug', `Sent ${bytesSent} bytes`);
    } catch (err) {
      this.logger.log('error', `Broadcast failed: ${err instanceof Error ? err.message : String(err)}`);
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`Broadcast to ${broadcastAddress}:${port} failed`, {
        address: broadcastAddress,
        port,
        cause: err,
      });
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_TIMER_DELAY_MS)));
}
