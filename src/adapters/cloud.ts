import { fetch, type Dispatcher as HttpDispatcher } from "undici";
import { z } from "zod";
import { RemoteFailureError, toRemoteError } from "../util/errors.js";
import type { DeviceId, DeviceLevel, DeviceStatusMap, RemoteClient, SetDeviceResult } from "../util/types.js";

export type CloudAdapterOptions = {
  apiBase: string;
  apiKey: string;
  requestTimeoutMs: number;
  /** undici dispatcher override, e.g. a MockAgent in tests. */
  dispatcher?: HttpDispatcher;
};

const ControlResponseSchema = z.object({
  deviceId: z.string(),
  value: z.number(),
});

const StatusResponseSchema = z.object({
  statuses: z.array(
    z
      .object({
        deviceId: z.string(),
        value: z.number(),
      })
      .passthrough(),
  ),
});

/**
 * HTTP client for the device-control cloud API. It does not rate limit or
 * retry; the dispatcher in front of it owns both concerns.
 */
export class CloudAdapter implements RemoteClient {
  constructor(private readonly opts: CloudAdapterOptions) {}

  async setDeviceValue(deviceId: DeviceId, value: DeviceLevel): Promise<SetDeviceResult> {
    const out = await this.request("POST", "/devices/control", ControlResponseSchema, { deviceId, value });
    return { deviceId: out.deviceId, value: out.value };
  }

  async getDevicesStatus(): Promise<DeviceStatusMap> {
    const out = await this.request("GET", "/devices/status", StatusResponseSchema);
    return new Map(out.statuses.map((s) => [s.deviceId, s.value]));
  }

  private headers(withBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { "X-Api-Key": this.opts.apiKey };
    if (withBody) headers["Content-Type"] = "application/json";
    return headers;
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload?: unknown,
  ): Promise<T> {
    const operation = `${method} ${path}`;
    let body: unknown;
    try {
      const res = await fetch(`${this.opts.apiBase}${path}`, {
        method,
        headers: this.headers(payload !== undefined),
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.opts.requestTimeoutMs),
        dispatcher: this.opts.dispatcher,
      });
      if (!res.ok) {
        // drain so the connection can be reused
        await res.text();
        throw new RemoteFailureError(`Device API error ${res.status}: ${operation} failed`, res.status);
      }
      body = await res.json();
    } catch (err) {
      throw toRemoteError(err, operation);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new RemoteFailureError(`Device API returned an unexpected ${operation} response`, undefined, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }
}
