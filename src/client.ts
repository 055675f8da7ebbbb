import {
  resolveClientOptions,
  withoutUndefined,
  type ClientOptions,
  type ResolvedClientOptions,
} from './config.js';
import { Light } from './device/light.js';
import { DiscoveryCollector } from './discovery/collector.js';
import { Exchange } from './protocol/exchange.js';
import type {
  DiscoverAllOptions,
  DiscoverOptions,
  DiscoveredDevice,
  Message,
  Reply,
  SendOptions,
} from './types/udp.js';

/**
 * Entry point tying one configuration to the exchange and discovery engines
 *
 * @example
 * ```typescript
 * const client = createClient({ timeout: 2000 });
 *
 * const devices = await client.discover();
 * const light = client.light(devices[0].ip);
 * await light.turnOn(60);
 * ```
 */
export class Client {
  readonly options: ResolvedClientOptions;
  readonly exchange: Exchange;
  readonly collector: DiscoveryCollector;

  constructor(options: ClientOptions = {}) {
    this.options = resolveClientOptions(options);
    const engine = { transportFactory: this.options.transportFactory, logger: this.options.logger };
    this.exchange = new Exchange(engine);
    this.collector = new DiscoveryCollector(engine);
  }

  send(address: string, message: Message, options: SendOptions = {}): Promise<Reply> {
    return this.exchange.send(address, message, { ...this.sendDefaults(), ...withoutUndefined(options) });
  }

  discover(options: DiscoverOptions = {}): Promise<DiscoveredDevice[]> {
    return this.collector.discover({
      broadcastAddress: this.options.broadcastAddress,
      timeout: this.options.discoveryTimeout,
      retry: this.options.discoveryRetry,
      port: this.options.port,
      ...withoutUndefined(options),
    });
  }

  discoverOnAllInterfaces(options: DiscoverAllOptions = {}): Promise<DiscoveredDevice[]> {
    return this.collector.discoverOnAllInterfaces({
      timeout: this.options.discoveryTimeout,
      retry: this.options.discoveryRetry,
      port: this.options.port,
      ...withoutUndefined(options),
    });
  }

  light(host: string, options: SendOptions = {}): Light {
    return new Light(host, { ...this.sendDefaults(), ...withoutUndefined(options), exchange: this.exchange });
  }

  /**
   * Discover and wrap every answering device in a Light
   */
  async discoverLights(options: DiscoverOptions = {}): Promise<Light[]> {
    const devices = await this.discover(options);
    return devices.map((device) => this.light(device.ip));
  }

  private sendDefaults(): SendOptions {
    return { port: this.options.port, timeout: this.options.timeout, retry: this.options.retry };
  }
}

export function createClient(options: ClientOptions = {}): Client {
  return new Client(options);
}
