// packages/core/src/components/input.ts -- Listener polling a response device each tick

import type { ResponseDevice } from '../devices/response-device.js';
import type { Value } from '../types/flow.js';
import { ConfigurationError } from '../utils/errors.js';
import type { Capability, ComponentBehavior, ComponentContext, ParameterValues } from './component.js';

function accepts(allowed: Value, value: Value): boolean {
  if (allowed === null) return true;
  if (Array.isArray(allowed)) return allowed.some((candidate) => candidate === value);
  return allowed === value;
}

/**
 * Writes `<name>.value` and `<name>.rt` for the first accepted response of
 * an activation, and `<name>.responses` for all of them when `storeAll` is set.
 */
export class InputBehavior implements ComponentBehavior {
  readonly kind = 'input';
  readonly capabilities: ReadonlySet<Capability> = new Set<Capability>(['listenable']);
  readonly defaults: ParameterValues = {
    device: 'keyboard',
    allowed: null,
    forceEndRoutine: true,
    storeAll: false,
  };

  private device: ResponseDevice | undefined;
  private cursor = 0;
  private answered = false;

  constructor(private readonly name: string) {}

  onStart(ctx: ComponentContext): void {
    const deviceName = ctx.params.device;
    if (typeof deviceName !== 'string' || deviceName === '') {
      throw new ConfigurationError(`Input "${this.name}" needs a device name`, this.name);
    }
    this.device = ctx.devices.getOrCreate(deviceName);
    // Anything pressed before the listener went live does not count.
    this.device.clearResponses();
    this.cursor = 0;
    this.answered = false;

    ctx.env.set(`${this.name}.value`, null);
    ctx.env.set(`${this.name}.rt`, null);
    if (ctx.params.storeAll === true) {
      ctx.env.set(`${this.name}.responses`, []);
    }
  }

  onFrame(ctx: ComponentContext): void {
    const device = this.device;
    if (!device) return;

    device.dispatchMessages();
    const fresh = device.getResponses(this.cursor);
    this.cursor = device.responseCount;

    for (const response of fresh) {
      if (!accepts(ctx.params.allowed, response.value)) continue;

      if (ctx.params.storeAll === true) {
        const previous = ctx.env.lookup(`${this.name}.responses`);
        const list = Array.isArray(previous) ? previous : [];
        ctx.env.set(`${this.name}.responses`, [...list, response.value]);
      }

      if (!this.answered) {
        this.answered = true;
        ctx.env.set(`${this.name}.value`, response.value);
        ctx.env.set(`${this.name}.rt`, response.t - (ctx.liveSince ?? response.t));
        if (ctx.params.forceEndRoutine === true) {
          ctx.endRoutine();
        }
      }
    }
  }

  onStop(): void {
    this.device = undefined;
  }
}
