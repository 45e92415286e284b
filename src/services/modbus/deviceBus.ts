import { Mutex } from "../../utils/mutex";
import type { DeviceTransport } from "./ModbusRtuClient";

/**
 * Single gate to the serial line. Every transaction, polling or command write,
 * runs inside `withBus`, so request and response frames never interleave.
 * Failures propagate to the caller; the lock is released either way.
 */
export class DeviceBus {
  private readonly mutex = new Mutex();

  constructor(private readonly transport: DeviceTransport) {}

  withBus<T>(operation: (transport: DeviceTransport) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(() => operation(this.transport));
  }

  isBusy(): boolean {
    return this.mutex.isLocked();
  }
}
