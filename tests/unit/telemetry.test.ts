import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { emit, log, TelemetryEvents, VALID_EVENT_NAMES } from "../../src/utils/telemetry.js";
import { TelemetrySink } from "../helpers/telemetry-sink.js";

describe("telemetry", () => {
  const sink = new TelemetrySink();

  beforeEach(() => {
    sink.clear();
    sink.install();
  });

  afterEach(() => {
    sink.uninstall();
    vi.restoreAllMocks();
  });

  it("freezes a unique event name per key", () => {
    expect(VALID_EVENT_NAMES.size).toBe(Object.keys(TelemetryEvents).length);
  });

  it("forwards sanitized data to the test sink", () => {
    emit(TelemetryEvents.WaveCompleted, {
      wave: 2,
      specialists: ["a", ["nested"], { id: "b" }],
      meta: { ok: true, fn: () => 1 },
      skipped: undefined,
    });

    expect(sink.events).toEqual([
      {
        name: "validation.wave.completed",
        data: { wave: 2, specialists: ["a", { id: "b" }], meta: { ok: true } },
      },
    ]);
  });

  it("warns about event names outside the frozen set", () => {
    const warn = vi.spyOn(log, "warn").mockImplementation(() => undefined);

    emit("validation.mystery", { a: 1 });

    expect(warn).toHaveBeenCalledWith({ event: "validation.mystery" }, "Unknown telemetry event (not in frozen enum)");
    expect(sink.named("validation.mystery")).toHaveLength(1);
  });
});
