/**
 * Integration Module - Public API
 */

// Types
export type {
  DeviceEntry,
  DeviceRegistry,
  GroupRuntime,
  RestoreStateStore,
  SnapshotListener,
} from "./schema.js";
export type { IntegrationError } from "./errors.js";
export type { IntegrationOptions } from "./service.js";

// Error utilities
export { formatIntegrationError } from "./errors.js";

// Service
export { MomentaryIntegration } from "./service.js";
export { MemoryDeviceRegistry } from "./registry.js";
