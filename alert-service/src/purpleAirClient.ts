import { z } from "zod";
import type { ServiceConfig } from "./config.js";
import { FetchFailure } from "./lib/errors.js";
import { epochSecondsToWallClock, wallClock } from "./lib/time.js";
import type { RunTime, TelemetryFetchResult, TelemetryRecord } from "./types.js";

export const TELEMETRY_FIELDS = ["pm2.5_10minute", "channel_flags", "channel_state", "last_seen"] as const;

const cell = z.union([z.number(), z.string(), z.null()]);

const sensorsResponseSchema = z.object({
  fields: z.array(z.string()),
  data: z.array(z.array(cell))
});

type SensorsResponse = z.infer<typeof sensorsResponseSchema>;

export type TelemetryClientConfig = Pick<
  ServiceConfig,
  "PURPLEAIR_API_KEY" | "PURPLEAIR_API_URL" | "LOCAL_TIME_ZONE" | "LAST_SEEN_OFFSET_HOURS" | "API_TIMEOUT_MS"
>;

export type TelemetryClientDependencies = {
  fetch?: typeof fetch;
  now?: () => Date;
};

export function buildSensorsUrl(config: Pick<ServiceConfig, "PURPLEAIR_API_URL">, sensorIds: readonly number[]): string {
  const url = new URL("sensors", config.PURPLEAIR_API_URL);
  url.searchParams.set("fields", TELEMETRY_FIELDS.join(","));
  url.searchParams.set("show_only", sensorIds.join(","));
  return url.toString();
}

async function fetchJson(config: TelemetryClientConfig, url: string, fetchImpl: typeof fetch): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: "GET",
      headers: { "X-API-Key": config.PURPLEAIR_API_KEY },
      signal: AbortSignal.timeout(config.API_TIMEOUT_MS)
    });
  }
  catch (err) {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      throw new FetchFailure("timeout", `Telemetry request timed out after ${config.API_TIMEOUT_MS}ms`, null, { cause: err });
    }
    throw new FetchFailure("network_error", "Telemetry request failed", null, { cause: err });
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new FetchFailure("http_error", `Telemetry request failed (${response.status}): ${text || response.statusText}`, response.status);
  }

  try {
    return await response.json();
  }
  catch (err) {
    throw new FetchFailure("malformed_response", "Telemetry response is not JSON", response.status, { cause: err });
  }
}

function toNumber(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" && !value.trim()) return null;
  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function columnIndex(fields: string[], name: string): number {
  const index = fields.indexOf(name);
  if (index < 0) {
    throw new FetchFailure("malformed_response", `Telemetry response is missing the ${name} column`);
  }
  return index;
}

export function parseSensorsResponse(payload: SensorsResponse, offsetHours: number): TelemetryRecord[] {
  const sensorCol = columnIndex(payload.fields, "sensor_index");
  const pmCol = columnIndex(payload.fields, "pm2.5_10minute");
  const flagsCol = columnIndex(payload.fields, "channel_flags");
  const stateCol = columnIndex(payload.fields, "channel_state");
  const lastSeenCol = columnIndex(payload.fields, "last_seen");

  return payload.data.map((row) => {
    const sensorIndex = toNumber(row[sensorCol]);
    if (sensorIndex === null || !Number.isInteger(sensorIndex)) {
      throw new FetchFailure("malformed_response", "Telemetry row without a valid sensor_index");
    }
    const lastSeenSeconds = toNumber(row[lastSeenCol]);
    return {
      sensorIndex,
      pm25: toNumber(row[pmCol]),
      channelFlags: toNumber(row[flagsCol]),
      channelState: toNumber(row[stateCol]),
      lastSeen: lastSeenSeconds === null ? null : epochSecondsToWallClock(lastSeenSeconds, offsetHours)
    };
  });
}

/**
 * Queries the telemetry API once for every sensor in `sensorIds`. The run time
 * is captured before the request is sent.
 */
export async function fetchTelemetry(
  config: TelemetryClientConfig,
  sensorIds: readonly number[],
  threshold: number,
  deps: TelemetryClientDependencies = {}
): Promise<TelemetryFetchResult> {
  const now = deps.now ?? (() => new Date());
  const startedAt = now();
  const runtime: RunTime = {
    startedAt,
    timeZone: config.LOCAL_TIME_ZONE,
    localTime: wallClock(startedAt, config.LOCAL_TIME_ZONE)
  };

  if (!sensorIds.length) {
    return { runtime, threshold, records: [] };
  }

  const body = await fetchJson(config, buildSensorsUrl(config, sensorIds), deps.fetch ?? fetch);
  const parsed = sensorsResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new FetchFailure("malformed_response", "Telemetry response does not match the expected shape");
  }

  return {
    runtime,
    threshold,
    records: parseSensorsResponse(parsed.data, config.LAST_SEEN_OFFSET_HOURS)
  };
}
