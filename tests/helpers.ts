import type { Clock } from "../src/scheduler/scheduler.js";
import type { Sampler } from "../src/client/client.js";
import type { DeviceEndpoint, DeviceKind, Sample, TestRun } from "../src/types.js";
import { AMMETER_MODELS } from "../src/emulator/models.js";
import { computeStats } from "../src/stats/stats.js";

/** Clock whose sleep advances virtual time instantly. */
export class VirtualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(public time = 1_000_000) {}

  now(): number {
    return this.time;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms);
    if (signal?.aborted) return;
    this.time += ms;
  }
}

/** Sampler replaying a script: numbers are readings, errors are thrown. */
export function scriptedSampler(script: (number | Error)[]): Sampler & { closed: boolean; calls: number } {
  const sampler = {
    closed: false,
    calls: 0,
    async measure(): Promise<number> {
      const step = script[sampler.calls % script.length];
      sampler.calls++;
      if (step instanceof Error) throw step;
      return step;
    },
    close(): void {
      sampler.closed = true;
    },
  };
  return sampler;
}

export function endpoint(kind: DeviceKind, port = AMMETER_MODELS[kind].defaultPort): DeviceEndpoint {
  return { kind, host: "127.0.0.1", port, command: AMMETER_MODELS[kind].command };
}

/** Finalized run built from plain values; null marks an invalid sample. */
export function makeRun(
  id: string,
  kind: DeviceKind,
  values: (number | null)[],
  overrides: Partial<TestRun> = {}
): TestRun {
  const createdAt = overrides.createdAt ?? 1_000;
  const samples = values.map((value, index): Sample =>
    value === null
      ? { kind, index, timestamp: createdAt + index * 100, value: null, valid: false, error: "parse" }
      : { kind, index, timestamp: createdAt + index * 100, value, valid: true }
  );
  return {
    id,
    kind,
    endpoint: endpoint(kind),
    config: { numSamples: values.length, durationSeconds: 0, frequencyHz: 10, maxConsecutiveFailures: 3 },
    samples,
    status: samples.every((s) => s.valid) ? "completed" : "degraded",
    stats: computeStats(samples),
    createdAt,
    finishedAt: createdAt + values.length * 100,
    ...overrides,
  };
}
