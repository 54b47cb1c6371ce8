import { describe, expect, it } from "vitest";
import { classifyTelemetry, judgeRecord } from "../src/quality.js";
import { extractSpikes } from "../src/spikes.js";
import type { TelemetryRecord } from "../src/types.js";

const now = new Date("2024-01-15T12:00:00.000Z");
const minutesAgo = (minutes: number) => new Date(now.getTime() - minutes * 60_000);

function record(overrides: Partial<TelemetryRecord> = {}): TelemetryRecord {
  return { sensorIndex: 1, pm25: 20, channelFlags: 0, channelState: 3, lastSeen: minutesAgo(5), ...overrides };
}

describe("judgeRecord", () => {
  it("accepts healthy, fresh, in-range readings", () => {
    expect(judgeRecord(record(), now)).toBe("clean");
    expect(judgeRecord(record({ channelState: 1 }), now)).toBe("clean");
  });

  it("flags any downgraded channel", () => {
    expect(judgeRecord(record({ channelFlags: 1 }), now)).toBe("flagged");
    expect(judgeRecord(record({ channelFlags: 2 }), now)).toBe("flagged");
    expect(judgeRecord(record({ channelFlags: 3 }), now)).toBe("flagged");
  });

  it("flags sensors reporting no PM channel", () => {
    expect(judgeRecord(record({ channelState: 0 }), now)).toBe("flagged");
  });

  it("flags sensors not seen within the last hour", () => {
    expect(judgeRecord(record({ lastSeen: minutesAgo(60) }), now)).toBe("clean");
    expect(judgeRecord(record({ lastSeen: minutesAgo(61) }), now)).toBe("flagged");
  });

  it("flags regardless of how high the reading is", () => {
    expect(judgeRecord(record({ pm25: 500, channelFlags: 3 }), now)).toBe("flagged");
  });

  it("treats null fields and readings at the ceiling as unusable", () => {
    expect(judgeRecord(record({ pm25: null }), now)).toBe("unusable");
    expect(judgeRecord(record({ channelFlags: null }), now)).toBe("unusable");
    expect(judgeRecord(record({ channelState: null }), now)).toBe("unusable");
    expect(judgeRecord(record({ lastSeen: null }), now)).toBe("unusable");
    expect(judgeRecord(record({ pm25: 1000 }), now)).toBe("unusable");
    expect(judgeRecord(record({ pm25: 999.9 }), now)).toBe("clean");
  });

  it("honours custom limits", () => {
    const options = { staleAfterMinutes: 10, readingCeiling: 500 };
    expect(judgeRecord(record({ lastSeen: minutesAgo(11) }), now, options)).toBe("flagged");
    expect(judgeRecord(record({ pm25: 500 }), now, options)).toBe("unusable");
  });
});

describe("classifyTelemetry", () => {
  it("partitions every record into exactly one set", () => {
    const records = [
      record({ sensorIndex: 1 }),
      record({ sensorIndex: 2, channelFlags: 1 }),
      record({ sensorIndex: 3, pm25: null }),
      record({ sensorIndex: 4, pm25: 1500 }),
      record({ sensorIndex: 5, lastSeen: minutesAgo(120) }),
      record({ sensorIndex: 6, pm25: 0 }),
    ];

    const result = classifyTelemetry(records, now);

    expect(result.clean.map((r) => r.sensorIndex)).toEqual([1, 6]);
    expect(result.flagged.map((r) => r.sensorIndex)).toEqual([2, 5]);
    expect(result.unusable.map((r) => r.sensorIndex)).toEqual([3, 4]);
    expect(result.flaggedSensorIds).toEqual([2, 3, 4, 5]);
    expect(result.clean.length + result.flagged.length + result.unusable.length).toBe(records.length);
  });

  it("returns empty sets for empty input", () => {
    expect(classifyTelemetry([], now)).toEqual({ clean: [], flagged: [], unusable: [], flaggedSensorIds: [] });
  });

  it("separates a spiking sensor from a downgraded one", () => {
    const records = [
      record({ sensorIndex: 1, pm25: 40, channelFlags: 0, channelState: 3, lastSeen: now }),
      record({ sensorIndex: 2, pm25: 5, channelFlags: 1, channelState: 3, lastSeen: now }),
    ];

    const quality = classifyTelemetry(records, now);

    expect(extractSpikes(quality.clean, 35)).toEqual([{ sensorIndex: 1, pm25: 40 }]);
    expect(quality.flaggedSensorIds).toEqual([2]);
  });
});
