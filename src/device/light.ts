import { MethodNotFoundError } from '../core/errors.js';
import { Exchange } from '../protocol/exchange.js';
import { resultOf } from '../protocol/codec.js';
import type { Message, Reply, SendOptions } from '../types/udp.js';
import {
  buildSetPilot,
  parsePilotState,
  parseSystemConfig,
  type PilotParams,
  type PilotState,
  type SystemConfig,
} from './pilot.js';
import {
  METHOD_GET_MODEL_CONFIG,
  METHOD_GET_PILOT,
  METHOD_GET_SYSTEM_CONFIG,
  METHOD_GET_USER_CONFIG,
  METHOD_REBOOT,
  METHOD_RESET,
} from '../constants.js';

export interface LightOptions extends SendOptions {
  /**
   * Engine used for every call. Share one to share its logger and transport factory.
   * @default new Exchange()
   */
  exchange?: Exchange;
}

export interface WhiteBalance {
  coldWhite?: number;
  warmWhite?: number;
  brightness?: number;
}

/**
 * One light at a known address
 *
 * @example
 * ```typescript
 * const light = new Light('192.168.1.100');
 * await light.turnOn(75);
 * await light.setPilot({ r: 255, g: 120, b: 0 });
 * const state = await light.getPilot();
 * ```
 */
export class Light {
  readonly host: string;
  private readonly exchange: Exchange;
  private readonly sendOptions: SendOptions;
  private cachedConfig: SystemConfig | null = null;

  constructor(host: string, options: LightOptions = {}) {
    const { exchange, ...sendOptions } = options;
    this.host = host;
    this.exchange = exchange ?? new Exchange();
    this.sendOptions = sendOptions;
  }

  /**
   * Send a raw message to this light
   */
  request(message: Message): Promise<Reply> {
    return this.exchange.send(this.host, message, this.sendOptions);
  }

  async getPilot(): Promise<PilotState> {
    const reply = await this.request({ method: METHOD_GET_PILOT, params: {} });
    return parsePilotState(reply);
  }

  async setPilot(params: PilotParams): Promise<void> {
    await this.request(buildSetPilot(params));
  }

  turnOn(dimming?: number): Promise<void> {
    return this.setPilot({ state: true, dimming });
  }

  turnOff(): Promise<void> {
    return this.setPilot({ state: false });
  }

  /**
   * Brightness in percent. Values are sent as given; the firmware clamps them.
   */
  setBrightness(percent: number): Promise<void> {
    return this.setPilot({ dimming: percent });
  }

  setColor(r: number, g: number, b: number, brightness?: number): Promise<void> {
    return this.setPilot({ r, g, b, dimming: brightness });
  }

  /**
   * Color temperature in kelvin
   */
  setTemperature(kelvin: number, brightness?: number): Promise<void> {
    return this.setPilot({ temp: kelvin, dimming: brightness });
  }

  setWarmWhite(value: number, brightness?: number): Promise<void> {
    return this.setPilot({ w: value, dimming: brightness });
  }

  setColdWhite(value: number, brightness?: number): Promise<void> {
    return this.setPilot({ c: value, dimming: brightness });
  }

  /**
   * Mix of the cold and warm white channels
   */
  setWhite(white: WhiteBalance): Promise<void> {
    return this.setPilot({ c: white.coldWhite, w: white.warmWhite, dimming: white.brightness });
  }

  /**
   * Effect speed of the running dynamic scene
   */
  setSpeed(speed: number): Promise<void> {
    return this.setPilot({ speed });
  }

  /**
   * Read the current state and flip it. Resolves with the new on/off value.
   */
  async toggle(): Promise<boolean> {
    const { state } = await this.getPilot();
    const next = state !== true;
    if (next) {
      await this.turnOn();
    } else {
      await this.turnOff();
    }
    return next;
  }

  /**
   * Cached after the first successful read; see `clearCache`
   */
  async getSystemConfig(): Promise<SystemConfig> {
    if (this.cachedConfig) return this.cachedConfig;
    const reply = await this.request({ method: METHOD_GET_SYSTEM_CONFIG, params: {} });
    this.cachedConfig = parseSystemConfig(reply);
    return this.cachedConfig;
  }

  clearCache(): void {
    this.cachedConfig = null;
  }

  /**
   * Model configuration, or null on firmware that lacks `getModelConfig`
   */
  async getModelConfig(): Promise<Record<string, unknown> | null> {
    try {
      const reply = await this.request({ method: METHOD_GET_MODEL_CONFIG, params: {} });
      return resultOf(reply.data);
    } catch (err) {
      if (err instanceof MethodNotFoundError) return null;
      throw err;
    }
  }

  async getUserConfig(): Promise<Record<string, unknown>> {
    const reply = await this.request({ method: METHOD_GET_USER_CONFIG, params: {} });
    return resultOf(reply.data);
  }

  async reboot(): Promise<void> {
    await this.request({ method: METHOD_REBOOT, params: {} });
  }

  /**
   * Factory reset. The light leaves the network afterwards.
   */
  async reset(): Promise<void> {
    await this.request({ method: METHOD_RESET, params: {} });
  }

  toString(): string {
    return `Light(${this.host})`;
  }
}
