export { CloudAdapter, type CloudAdapterOptions } from "./adapters/cloud.js";
export { MemoryAdapter, type InjectedFault, type MemoryCall } from "./adapters/memory.js";
export { StatusCoordinator, type StatusCoordinatorOptions, type StatusListener } from "./coordinator.js";
export {
  DeviceEntity,
  brightnessToLevel,
  clampLevel,
  levelToBrightness,
  type CommandOutcome,
  type DeviceEntityOptions,
  type EntityDispatcher,
} from "./entities/device-entity.js";
export { DeviceRegistry, type DeviceRegistryOptions } from "./entities/registry.js";
export { DebounceIndex, type OfferResult } from "./queue/debounce.js";
export {
  Dispatcher,
  type DispatcherOptions,
  type DispatcherSnapshot,
  type DispatcherStats,
} from "./queue/dispatcher.js";
export {
  REQUEST_PRIORITY_ORDER,
  RequestEnvelope,
  RequestKind,
  RequestPriority,
  isCommand,
  type AnyEnvelope,
  type CommandEnvelope,
  type EnvelopeState,
  type PollEnvelope,
} from "./queue/envelope.js";
export { PriorityQueue } from "./queue/priority-queue.js";
export { reconcile } from "./reconcile.js";
export { createClient, createRuntime, type Runtime, type RuntimeOverrides } from "./runtime.js";
export { createServer } from "./server.js";
export { isAllowed, loadConfig, type AppConfig } from "./util/config.js";
export * from "./util/errors.js";
export { RateGate, type RateGateOptions, type RateGateSnapshot } from "./util/limiter.js";
export { createLogger, silentLogger, type Logger } from "./util/logger.js";
export type * from "./util/types.js";
