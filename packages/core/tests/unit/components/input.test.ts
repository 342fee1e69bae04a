import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { ComponentContext, ParameterValues } from '../../../src/components/component.js';
import { InputBehavior } from '../../../src/components/input.js';
import { DeviceManager } from '../../../src/devices/device-manager.js';
import { VariableEnvironment } from '../../../src/environment/variable-environment.js';

describe('InputBehavior', () => {
  let env: VariableEnvironment;
  let devices: DeviceManager;
  let endRoutine: ReturnType<typeof vi.fn>;

  function context(params: ParameterValues, clockTime: number): ComponentContext {
    return {
      env,
      devices,
      routine: 'trial',
      component: 'resp',
      t: clockTime - 1,
      clockTime,
      frame: 0,
      liveSince: 1,
      params,
      endRoutine,
    };
  }

  function params(overrides: ParameterValues = {}): ParameterValues {
    return { ...new InputBehavior('resp').defaults, ...overrides };
  }

  beforeEach(() => {
    env = new VariableEnvironment();
    devices = new DeviceManager();
    endRoutine = vi.fn();
  });

  it('clears earlier responses and resets its variables on start', () => {
    const input = new InputBehavior('resp');
    devices.getOrCreate('keyboard').makeResponse('space', 0.5);
    env.set('resp.value', 'stale');

    input.onStart(context(params(), 1));
    input.onFrame(context(params(), 1));

    expect(env.get('resp.value')).toBeNull();
    expect(env.get('resp.rt')).toBeNull();
    expect(env.has('resp.responses')).toBe(false);
    expect(endRoutine).not.toHaveBeenCalled();
  });

  it('records the first accepted response and ends the routine', () => {
    const input = new InputBehavior('resp');
    const p = params({ allowed: ['f', 'j'] });
    input.onStart(context(p, 1));

    const keyboard = devices.get('keyboard');
    keyboard.makeResponse('x', 1.1);
    keyboard.makeResponse('j', 1.25);
    input.onFrame(context(p, 1.3));

    expect(env.get('resp.value')).toBe('j');
    expect(env.get('resp.rt')).toBeCloseTo(0.25);
    expect(endRoutine).toHaveBeenCalledTimes(1);
  });

  it('ignores responses outside the allowed set', () => {
    const input = new InputBehavior('resp');
    const p = params({ allowed: 'space' });
    input.onStart(context(p, 1));
    devices.get('keyboard').makeResponse('x', 1.1);
    input.onFrame(context(p, 1.2));

    expect(env.get('resp.value')).toBeNull();
    expect(endRoutine).not.toHaveBeenCalled();
  });

  it('stores every response when storeAll is set', () => {
    const input = new InputBehavior('resp');
    const p = params({ storeAll: true, forceEndRoutine: false, device: 'buttons' });
    input.onStart(context(p, 1));

    const buttons = devices.get('buttons');
    buttons.makeResponse(1, 1.5);
    input.onFrame(context(p, 1.5));
    buttons.makeResponse(2, 1.75);
    input.onFrame(context(p, 1.75));

    expect(env.get('resp.responses')).toEqual([1, 2]);
    expect(env.get('resp.value')).toBe(1);
    expect(env.get('resp.rt')).toBe(0.5);
    expect(endRoutine).not.toHaveBeenCalled();
  });

  it('requires a device name', () => {
    const input = new InputBehavior('resp');
    expect(() => input.onStart(context(params({ device: '' }), 1))).toThrow('Input "resp" needs a device name');
  });

  it('stops polling once stopped', () => {
    const input = new InputBehavior('resp');
    const p = params();
    input.onStart(context(p, 1));
    input.onStop();
    devices.get('keyboard').makeResponse('space', 1.5);
    input.onFrame(context(p, 1.5));
    expect(env.get('resp.value')).toBeNull();
  });
});
