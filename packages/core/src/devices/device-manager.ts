// packages/core/src/devices/device-manager.ts

import { ConfigurationError } from '../utils/errors.js';
import { ResponseDevice } from './response-device.js';

/** Named registry of response devices available to input components. */
export class DeviceManager {
  private devices = new Map<string, ResponseDevice>();

  register(device: ResponseDevice): ResponseDevice {
    this.devices.set(device.name, device);
    return device;
  }

  /** Device registered under `name`, created on first use. */
  getOrCreate(name: string): ResponseDevice {
    return this.devices.get(name) ?? this.register(new ResponseDevice(name));
  }

  get(name: string): ResponseDevice {
    const device = this.devices.get(name);
    if (!device) {
      throw new ConfigurationError(`Unknown device "${name}". Available: ${this.names().join(', ')}`, name);
    }
    return device;
  }

  has(name: string): boolean {
    return this.devices.has(name);
  }

  names(): string[] {
    return [...this.devices.keys()];
  }
}
