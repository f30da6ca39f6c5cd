/**
 * Integration Module - In-Memory Device Registry
 *
 * Default registry for running standalone. A host embedding the service
 * passes its own `DeviceRegistry` instead.
 */
import type { DeviceEntry, DeviceRegistry } from "./schema.js";

export class MemoryDeviceRegistry implements DeviceRegistry {
  private readonly devices = new Map<string, DeviceEntry>();

  getOrCreate(device: DeviceEntry): DeviceEntry {
    const existing = this.devices.get(device.deviceId);
    if (existing !== undefined && existing.name === device.name) {
      return existing;
    }
    // A renamed device keeps its id, only the name is updated
    this.devices.set(device.deviceId, device);
    return device;
  }

  remove(deviceId: string): boolean {
    return this.devices.delete(deviceId);
  }

  list(groupName?: string): ReadonlyArray<DeviceEntry> {
    const all = [...this.devices.values()];
    return groupName === undefined
      ? all
      : all.filter((device) => device.groupName === groupName);
  }
}
