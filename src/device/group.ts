/**
 * Group operations
 *
 * Fan one operation out to several lights in parallel. A failing light never
 * fails the group; each light gets its own result.
 */

import type { Light, WhiteBalance } from './light.js';
import type { PilotState } from './pilot.js';

export interface GroupOperationResult {
  light: Light;
  ok: boolean;
  error?: Error;
}

/**
 * Run `operation` on every light at once. Results follow input order.
 *
 * @example
 * ```typescript
 * const results = await runOnGroup(lights, (light) => light.turnOff());
 * const failed = results.filter((r) => !r.ok);
 * ```
 */
export async function runOnGroup(
  lights: readonly Light[],
  operation: (light: Light) => Promise<unknown>
): Promise<GroupOperationResult[]> {
  const settled = await Promise.allSettled(lights.map((light) => operation(light)));
  return settled.map((outcome, index) =>
    outcome.status === 'fulfilled'
      ? { light: lights[index], ok: true }
      : { light: lights[index], ok: false, error: toError(outcome.reason) }
  );
}

export function turnOnGroup(lights: readonly Light[], dimming?: number): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.turnOn(dimming));
}

export function turnOffGroup(lights: readonly Light[]): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.turnOff());
}

/**
 * Each light flips its own state, so a mixed group stays mixed
 */
export function toggleGroup(lights: readonly Light[]): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.toggle());
}

export function setGroupBrightness(lights: readonly Light[], percent: number): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.setBrightness(percent));
}

export function setGroupColor(
  lights: readonly Light[],
  r: number,
  g: number,
  b: number,
  brightness?: number
): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.setColor(r, g, b, brightness));
}

export function setGroupTemperature(
  lights: readonly Light[],
  kelvin: number,
  brightness?: number
): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.setTemperature(kelvin, brightness));
}

export function setGroupWarmWhite(
  lights: readonly Light[],
  value: number,
  brightness?: number
): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.setWarmWhite(value, brightness));
}

export function setGroupColdWhite(
  lights: readonly Light[],
  value: number,
  brightness?: number
): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.setColdWhite(value, brightness));
}

export function setGroupWhite(lights: readonly Light[], white: WhiteBalance): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.setWhite(white));
}

export function setGroupSpeed(lights: readonly Light[], speed: number): Promise<GroupOperationResult[]> {
  return runOnGroup(lights, (light) => light.setSpeed(speed));
}

/**
 * Current state of every light keyed by host; null where the read failed
 */
export async function getGroupStates(lights: readonly Light[]): Promise<Map<string, PilotState | null>> {
  const settled = await Promise.allSettled(lights.map((light) => light.getPilot()));
  const states = new Map<string, PilotState | null>();
  settled.forEach((outcome, index) => {
    states.set(lights[index].host, outcome.status === 'fulfilled' ? outcome.value : null);
  });
  return states;
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
