// packages/core/src/devices -- response sources polled by input components

export { ResponseDevice, LoggingListener } from './response-device.js';
export type { DeviceResponse, ResponseListener } from './response-device.js';
export { DeviceManager } from './device-manager.js';
