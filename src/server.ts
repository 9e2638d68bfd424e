import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CommandOutcome, DeviceEntity } from "./entities/device-entity.js";
import type { Runtime } from "./runtime.js";
import { isAllowed } from "./util/config.js";

type ToolResult = { content: { type: "text"; text: string }[]; isError?: boolean };

function text(value: string, isError = false): ToolResult {
  return { content: [{ type: "text", text: value }], ...(isError ? { isError } : {}) };
}

function json(value: unknown): ToolResult {
  return text(JSON.stringify(value, null, 2));
}

function describeOutcome(deviceId: string, level: number, outcome: CommandOutcome): ToolResult {
  switch (outcome.status) {
    case "applied":
      return text(`Device ${deviceId} set to ${outcome.result.value}%.`);
    case "superseded":
      return text(`Level ${level}% for device ${deviceId} was superseded by a newer command.`);
    case "failed":
      return text(`Setting device ${deviceId} to ${level}% failed (${outcome.code}): ${outcome.message}`, true);
  }
}

export function createServer(runtime: Runtime): McpServer {
  const { config, coordinator, dispatcher, registry } = runtime;
  const server = new McpServer({ name: "devicegate-mcp", version: "0.1.0" });

  function requireEntity(deviceId: string): DeviceEntity {
    if (!isAllowed(config, deviceId)) throw new Error("Device not allowed");
    const entity = registry.get(deviceId);
    if (!entity) throw new Error(`Unknown device ${deviceId}`);
    return entity;
  }

  async function applyLevel(deviceId: string, level: number, wait: boolean): Promise<ToolResult> {
    const entity = requireEntity(deviceId);
    // setLevel never rejects; unawaited outcomes are logged by the entity
    const outcome = entity.setLevel(level);
    if (!wait) return text(`Device ${deviceId} set to ${Math.round(level)}% (queued).`);
    return describeOutcome(deviceId, level, await outcome);
  }

  server.registerTool("devices_list", {
    description: "List known devices with their displayed and last polled levels.",
    inputSchema: {}
  }, async () => json(registry.list().map((e) => e.view())));

  server.registerTool("devices_refresh", {
    description: "Poll the device API now (queued behind pending commands) and list devices.",
    inputSchema: {}
  }, async () => {
    const ok = await coordinator.refresh();
    if (!ok) throw new Error(`Refresh failed: ${coordinator.lastError?.message ?? "unknown error"}`);
    return json(registry.list().map((e) => e.view()));
  });

  server.registerTool("device_set_level", {
    description: "Set a device level (0-100). Shown immediately; sent when the rate limit allows.",
    inputSchema: {
      deviceId: z.string(),
      level: z.number().min(0).max(100),
      wait: z.boolean().optional().describe("Wait for the API call to finish"),
    }
  }, async ({ deviceId, level, wait }) => applyLevel(deviceId, level, wait ?? false));

  server.registerTool("device_set_power", {
    description: "Turn a device fully on or off.",
    inputSchema: { deviceId: z.string(), on: z.boolean(), wait: z.boolean().optional() }
  }, async ({ deviceId, on, wait }) => applyLevel(deviceId, on ? 100 : 0, wait ?? false));

  // --- Batch: last level per device wins; the queue debounces the rest ---
  server.registerTool("device_batch", {
    description: "Set several device levels at once; repeated devices collapse to the last level.",
    inputSchema: {
      items: z.array(z.object({
        deviceId: z.string(),
        level: z.number().min(0).max(100),
      })).min(1)
    }
  }, async ({ items }) => {
    const allowed = items.filter((it) => isAllowed(config, it.deviceId));
    if (allowed.length === 0) throw new Error("No allowed items");

    const latest = new Map<string, number>();
    for (const it of allowed) latest.set(it.deviceId, it.level);
    for (const deviceId of latest.keys()) requireEntity(deviceId);
    for (const [deviceId, level] of latest) {
      void requireEntity(deviceId).setLevel(level);
    }
    return text(`Queued ${latest.size} command(s) from ${items.length} item(s).`);
  });

  server.registerTool("queue_status", {
    description: "Show pending requests, the in-flight call and remaining rate budget.",
    inputSchema: {}
  }, async () => json({
    ...dispatcher.snapshot(),
    lastPollOk: coordinator.lastUpdateSuccess,
    lastPollError: coordinator.lastError?.message ?? null,
  }));

  return server;
}
