// packages/core/src/devices/response-device.ts

import type { Value } from '../types/flow.js';
import type { Logger } from '../utils/logger.js';

/** One timestamped response; `t` is on the run clock, in seconds. */
export interface DeviceResponse {
  t: number;
  value: Value;
}

export interface ResponseListener {
  readonly name: string;
  receiveMessage(response: DeviceResponse): void;
}

/**
 * Source of responses polled by input components. Hardware-backed devices
 * override `dispatchMessages` to pull pending input before each poll;
 * tests and scripted sessions push responses with `makeResponse`.
 */
export class ResponseDevice {
  private responses: DeviceResponse[] = [];
  private listeners: ResponseListener[] = [];

  constructor(readonly name: string) {}

  /** Pull pending messages from the underlying source. */
  dispatchMessages(): void {}

  receiveMessage(response: DeviceResponse): void {
    this.responses.push(response);
    for (const listener of this.listeners) {
      listener.receiveMessage(response);
    }
  }

  /** Record a response as if the device had registered it. */
  makeResponse(value: Value, t: number): DeviceResponse {
    const response: DeviceResponse = { t, value };
    this.receiveMessage(response);
    return response;
  }

  /** Stored responses from `offset` on. */
  getResponses(offset = 0): DeviceResponse[] {
    return this.responses.slice(offset);
  }

  get responseCount(): number {
    return this.responses.length;
  }

  clearResponses(): void {
    this.dispatchMessages();
    this.responses = [];
  }

  addListener(listener: ResponseListener): ResponseListener {
    this.listeners.push(listener);
    return listener;
  }

  getListenerNames(): string[] {
    return this.listeners.map((listener) => listener.name);
  }

  clearListeners(): void {
    this.listeners = [];
  }
}

/** Listener that writes every response to a logger at debug level. */
export class LoggingListener implements ResponseListener {
  readonly name = 'log';

  constructor(
    private logger: Logger,
    private deviceName: string,
  ) {}

  receiveMessage(response: DeviceResponse): void {
    this.logger.debug(`${this.deviceName} response`, response);
  }
}
