import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Light } from '../../src/device/light.js';
import { Exchange } from '../../src/protocol/exchange.js';
import {
  runOnGroup,
  getGroupStates,
  turnOnGroup,
  turnOffGroup,
  toggleGroup,
  setGroupBrightness,
  setGroupColor,
  setGroupTemperature,
  setGroupWarmWhite,
  setGroupColdWhite,
  setGroupWhite,
  setGroupSpeed,
} from '../../src/device/group.js';
import { TimeoutError } from '../../src/core/errors.js';
import { RetryPolicy } from '../../src/retry/policy.js';
import { FakeTransport, fakeFactory } from '../helpers/fake-transport.js';

const requestSchema = z.object({ method: z.string(), params: z.record(z.unknown()).optional() });

/**
 * Every host answers except those listed in `offline`, which fail their send
 */
function groupExchange(offline: string[]): Exchange {
  const { factory } = fakeFactory(
    () =>
      new FakeTransport((sent, _index, t) => {
        if (offline.includes(sent.address)) return;
        t.deliver({ method: 'getPilot', result: { state: true, dimming: 50 } }, { address: sent.address });
      })
  );
  return new Exchange({ transportFactory: factory });
}

describe('runOnGroup', () => {
  it('should return one result per light in input order', async () => {
    const lights = ['192.168.1.10', '192.168.1.11', '192.168.1.12'].map((host) => new Light(host));
    const failure = new Error('unreachable');

    const results = await runOnGroup(lights, async (light) => {
      if (light.host === '192.168.1.11') throw failure;
    });

    expect(results).toEqual([
      { light: lights[0], ok: true },
      { light: lights[1], ok: false, error: failure },
      { light: lights[2], ok: true },
    ]);
  });

  it('should wrap a non-Error rejection', async () => {
    const lights = [new Light('192.168.1.10')];
    const results = await runOnGroup(lights, () => Promise.reject('nope'));

    expect(results[0].ok).toBe(false);
    expect(results[0].error?.message).toBe('nope');
  });

  it('should run lights in parallel', async () => {
    const lights = [new Light('192.168.1.10'), new Light('192.168.1.11')];
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const pending = runOnGroup(lights, async (light) => {
      order.push(`start ${light.host}`);
      await gate;
      order.push(`end ${light.host}`);
    });
    release();
    await pending;

    expect(order).toEqual(['start 192.168.1.10', 'start 192.168.1.11', 'end 192.168.1.10', 'end 192.168.1.11']);
  });

  it('should return an empty list for an empty group', async () => {
    expect(await runOnGroup([], async () => {})).toEqual([]);
  });

  it('should run real light operations', async () => {
    const exchange = groupExchange([]);
    const lights = [new Light('192.168.1.10', { exchange }), new Light('192.168.1.11', { exchange })];

    const results = await runOnGroup(lights, (light) => light.turnOff());

    expect(results.map((r) => r.ok)).toEqual([true, true]);
  });
});

/**
 * Records the setPilot params each host receives; each host starts in `initial`
 */
function recordingGroup(hosts: string[], initial: Record<string, boolean> = {}) {
  const received = new Map<string, unknown[]>(hosts.map((host) => [host, []]));
  const { factory } = fakeFactory(
    () =>
      new FakeTransport((sent, _index, t) => {
        const request = requestSchema.parse(sent.json);
        if (request.method === 'getPilot') {
          t.deliver({ method: 'getPilot', result: { state: initial[sent.address] ?? false } }, { address: sent.address });
          return;
        }
        received.get(sent.address)?.push(request.params);
        t.deliver({ method: 'setPilot', result: { success: true } }, { address: sent.address });
      })
  );
  const exchange = new Exchange({ transportFactory: factory });
  return { lights: hosts.map((host) => new Light(host, { exchange })), received };
}

describe('group helpers', () => {
  const hosts = ['192.168.1.10', '192.168.1.11'];

  it('should send the same params to every light', async () => {
    const { lights, received } = recordingGroup(hosts);

    await turnOnGroup(lights, 30);
    await turnOffGroup(lights);
    await setGroupBrightness(lights, 45);
    await setGroupColor(lights, 1, 2, 3, 90);
    await setGroupTemperature(lights, 5000);
    await setGroupWarmWhite(lights, 100, 20);
    await setGroupColdWhite(lights, 110);
    await setGroupWhite(lights, { coldWhite: 5, warmWhite: 6 });
    const results = await setGroupSpeed(lights, 120);

    const expected = [
      { state: true, dimming: 30 },
      { state: false },
      { dimming: 45 },
      { dimming: 90, r: 1, g: 2, b: 3 },
      { temp: 5000 },
      { dimming: 20, w: 100 },
      { c: 110 },
      { c: 5, w: 6 },
      { speed: 120 },
    ];
    expect(received.get('192.168.1.10')).toEqual(expected);
    expect(received.get('192.168.1.11')).toEqual(expected);
    expect(results.map((r) => r.ok)).toEqual([true, true]);
  });

  it('should toggle each light from its own state', async () => {
    const { lights, received } = recordingGroup(hosts, { '192.168.1.10': true });

    const results = await toggleGroup(lights);

    expect(results.map((r) => r.ok)).toEqual([true, true]);
    expect(received.get('192.168.1.10')).toEqual([{ state: false }]);
    expect(received.get('192.168.1.11')).toEqual([{ state: true }]);
  });
});

describe('getGroupStates', () => {
  it('should map each host to its state, null where the read failed', async () => {
    const exchange = groupExchange(['192.168.1.11']);
    const options = { exchange, timeout: 1, retry: RetryPolicy.disabled() };
    const lights = [new Light('192.168.1.10', options), new Light('192.168.1.11', options)];

    const states = await getGroupStates(lights);

    expect([...states.keys()]).toEqual(['192.168.1.10', '192.168.1.11']);
    expect(states.get('192.168.1.10')).toEqual({ state: true, dimming: 50 });
    expect(states.get('192.168.1.11')).toBeNull();
  });

  it('should report the timeout for the offline light', async () => {
    const exchange = groupExchange(['192.168.1.11']);
    const options = { exchange, timeout: 1, retry: RetryPolicy.disabled() };
    const lights = [new Light('192.168.1.11', options)];

    const [result] = await runOnGroup(lights, (light) => light.getPilot());

    expect(result.error).toBeInstanceOf(TimeoutError);
  });
});
