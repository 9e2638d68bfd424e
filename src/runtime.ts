import type { Logger } from "pino";
import { CloudAdapter } from "./adapters/cloud.js";
import { MemoryAdapter } from "./adapters/memory.js";
import { StatusCoordinator } from "./coordinator.js";
import { DeviceRegistry } from "./entities/registry.js";
import { Dispatcher } from "./queue/dispatcher.js";
import { isAllowed, type AppConfig } from "./util/config.js";
import { RateGate } from "./util/limiter.js";
import { silentLogger } from "./util/logger.js";
import type { RemoteClient } from "./util/types.js";

export type Runtime = {
  config: AppConfig;
  client: RemoteClient;
  dispatcher: Dispatcher;
  coordinator: StatusCoordinator;
  registry: DeviceRegistry;
  start(): Promise<void>;
  stop(): Promise<void>;
};

export type RuntimeOverrides = {
  client?: RemoteClient;
  logger?: Logger;
};

export function createClient(config: AppConfig): RemoteClient {
  if (config.dryRun) {
    return new MemoryAdapter(config.dryRunDevices.map((id) => [id, 0] as const));
  }
  return new CloudAdapter({
    apiBase: config.apiBase,
    apiKey: config.apiKey,
    requestTimeoutMs: config.requestTimeoutMs,
  });
}

/**
 * Build the one dispatcher, poller and entity registry for this process.
 * Everything that talks to the device API gets these instances passed in.
 */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? silentLogger;
  const client = overrides.client ?? createClient(config);
  const gate = new RateGate({
    windowCapacity: config.rateWindowCapacity,
    windowDurationMs: config.rateWindowDurationMs,
    minSpacingMs: config.minRequestSpacingMs,
  });
  const dispatcher = new Dispatcher({ client, gate, logger });
  const coordinator = new StatusCoordinator({
    dispatcher,
    pollIntervalMs: config.pollIntervalMs,
    logger,
  });
  const registry = new DeviceRegistry({
    dispatcher,
    isAllowed: (deviceId) => isAllowed(config, deviceId),
    logger,
    onEntityChange: (entity) => logger.trace({ device: entity.view() }, "device state changed"),
  });
  const detach = registry.attach(coordinator);

  return {
    config,
    client,
    dispatcher,
    coordinator,
    registry,
    async start() {
      dispatcher.start();
      await coordinator.firstRefresh();
      coordinator.start();
      logger.info({ devices: registry.list().length, dryRun: config.dryRun }, "runtime started");
    },
    async stop() {
      coordinator.stop();
      detach();
      await dispatcher.stop();
    },
  };
}
