/**
 * Pilot messages
 *
 * `setPilot` writes a light's output, `getPilot` reads it back with a few
 * extra radio fields. Values are passed through as-is; firmware decides what
 * it accepts.
 */

import { z } from 'zod';
import { resultOf } from '../protocol/codec.js';
import type { Message, Reply } from '../types/udp.js';
import { METHOD_SET_PILOT } from '../constants.js';

// Fields of the wrong type read as absent instead of failing the whole reply
const lenient = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

export const pilotParamsSchema = z.object({
  state: lenient(z.boolean()),
  dimming: lenient(z.number()),
  r: lenient(z.number()),
  g: lenient(z.number()),
  b: lenient(z.number()),
  c: lenient(z.number()),
  w: lenient(z.number()),
  temp: lenient(z.number()),
  sceneId: lenient(z.number()),
  speed: lenient(z.number()),
  ratio: lenient(z.number()),
});

export type PilotParams = z.infer<typeof pilotParamsSchema>;

export const pilotStateSchema = pilotParamsSchema
  .extend({
    mac: lenient(z.string()),
    rssi: lenient(z.number()),
    src: lenient(z.string()),
  })
  .passthrough();

export type PilotState = z.infer<typeof pilotStateSchema>;

export const systemConfigSchema = z
  .object({
    mac: lenient(z.string()),
    moduleName: lenient(z.string()),
    fwVersion: lenient(z.string()),
    homeId: lenient(z.number()),
    roomId: lenient(z.number()),
  })
  .passthrough();

export type SystemConfig = z.infer<typeof systemConfigSchema>;

const PILOT_KEYS = [
  'state',
  'dimming',
  'r',
  'g',
  'b',
  'c',
  'w',
  'temp',
  'sceneId',
  'speed',
  'ratio',
] as const satisfies ReadonlyArray<keyof PilotParams>;

/**
 * `setPilot` request carrying only the keys that are set
 *
 * @example
 * ```typescript
 * buildSetPilot({ r: 255, g: 0, b: 0, dimming: 80 });
 * // { method: 'setPilot', params: { dimming: 80, r: 255, g: 0, b: 0 } }
 * ```
 */
export function buildSetPilot(params: PilotParams): Message {
  const out: Record<string, unknown> = {};
  for (const key of PILOT_KEYS) {
    const value = params[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return { method: METHOD_SET_PILOT, params: out };
}

/**
 * Typed state from a `getPilot` reply, read from `result` or the top level
 */
export function parsePilotState(reply: Reply | Record<string, unknown>): PilotState {
  return withoutUndefined(pilotStateSchema.parse(resultOf(replyData(reply))));
}

export function parseSystemConfig(reply: Reply | Record<string, unknown>): SystemConfig {
  return withoutUndefined(systemConfigSchema.parse(resultOf(replyData(reply))));
}

function replyData(reply: Reply | Record<string, unknown>): Record<string, unknown> {
  if (isReply(reply)) return reply.data;
  return reply;
}

function isReply(value: Reply | Record<string, unknown>): value is Reply {
  return Buffer.isBuffer(value.raw) && typeof value.data === 'object' && value.data !== null;
}

function withoutUndefined<T extends object>(value: T): T {
  for (const key of Object.keys(value)) {
    if (Reflect.get(value, key) === undefined) Reflect.deleteProperty(value, key);
  }
  return value;
}
