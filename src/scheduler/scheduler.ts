import { randomUUID } from "crypto";
import type {
  DeviceEndpoint,
  FinalStatus,
  Sample,
  SamplingConfig,
  TestRun,
} from "../types.js";
import { ConfigError, isDeviceError } from "../errors.js";
import { MeasurementClient } from "../client/client.js";
import type { ClientOptions, Sampler } from "../client/client.js";
import { computeStats } from "../stats/stats.js";
import { sleep } from "../lib/lines.js";
import { validateSamplingConfig } from "./config.js";

export interface Clock {
  now(): number; // ms epoch
  /** Resolves after `ms`, or early when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => sleep(ms, signal),
};

export interface SchedulerOptions {
  clock?: Clock;
  client?: ClientOptions;
  /** Builds the sampler for each endpoint; defaults to a MeasurementClient. */
  samplerFor?: (endpoint: DeviceEndpoint) => Sampler;
  newRunId?: () => string;
}

export interface RunOptions {
  signal?: AbortSignal;
  onSample?: (run: TestRun, sample: Sample) => void;
}

interface ActiveRun {
  run: TestRun;
  sampler: Sampler;
  consecutiveFailures: number;
  lastTimestamp: number;
}

// ---------------------------------------------------------------------------
// SamplingScheduler
// ---------------------------------------------------------------------------

export class SamplingScheduler {
  private readonly clock: Clock;
  private readonly samplerFor: (endpoint: DeviceEndpoint) => Sampler;
  private readonly newRunId: () => string;

  constructor(opts: SchedulerOptions = {}) {
    this.clock = opts.clock ?? systemClock;
    const clientOptions = opts.client ?? {};
    this.samplerFor =
      opts.samplerFor ?? ((endpoint) => new MeasurementClient(endpoint, clientOptions));
    this.newRunId = opts.newRunId ?? randomUUID;
  }

  /**
   * Samples every endpoint in lock-step rounds. Round i starts at the
   * absolute deadline start + i / frequencyHz, so request latency never
   * accumulates into drift. Returns one finalized run per endpoint.
   */
  async run(
    endpoints: readonly DeviceEndpoint[],
    config: SamplingConfig,
    opts: RunOptions = {}
  ): Promise<TestRun[]> {
    validateSamplingConfig(config);
    if (endpoints.length === 0) {
      throw new ConfigError(["at least one device endpoint is required"]);
    }

    const { signal, onSample } = opts;
    const start = this.clock.now();
    const intervalMs = 1000 / config.frequencyHz;
    const durationMs = config.durationSeconds * 1000;

    const active: ActiveRun[] = endpoints.map((endpoint) => ({
      run: {
        id: this.newRunId(),
        kind: endpoint.kind,
        endpoint: { ...endpoint },
        config: { ...config },
        samples: [],
        status: "running",
        stats: null,
        createdAt: start,
        finishedAt: null,
      },
      sampler: this.samplerFor(endpoint),
      consecutiveFailures: 0,
      lastTimestamp: start,
    }));

    console.log(
      `[scheduler] start devices=${endpoints.map((e) => e.kind).join(",")} ` +
        `samples=${config.numSamples} freq=${config.frequencyHz}Hz ` +
        `duration=${config.durationSeconds}s maxFailures=${config.maxConsecutiveFailures}`
    );

    const timeUp = (): boolean => durationMs > 0 && this.clock.now() - start >= durationMs;

    try {
      for (let index = 0; ; index++) {
        const polling = active.filter((a) => a.run.status === "running");
        if (polling.length === 0) break;

        if (signal?.aborted) {
          for (const a of polling) this.finalize(a, "interrupted");
          break;
        }
        if (index >= config.numSamples || timeUp()) {
          for (const a of polling) this.finalize(a, completionStatus(a.run));
          break;
        }

        const wait = start + index * intervalMs - this.clock.now();
        if (wait > 0) await this.clock.sleep(wait, signal);

        if (signal?.aborted) {
          for (const a of polling) this.finalize(a, "interrupted");
          break;
        }
        if (timeUp()) {
          for (const a of polling) this.finalize(a, completionStatus(a.run));
          break;
        }

        // Fan out one task per device, join before the next deadline.
        const settled = await Promise.allSettled(polling.map((a) => this.takeSample(a, index, onSample)));
        const failed = settled.find((r): r is PromiseRejectedResult => r.status === "rejected");
        if (failed) {
          // Not a device failure: close out every open run, then rethrow.
          for (const a of active) {
            if (a.run.status === "running") this.finalize(a, "interrupted");
          }
          throw failed.reason;
        }

        for (const a of polling) {
          if (a.consecutiveFailures >= config.maxConsecutiveFailures) {
            console.warn(
              `[scheduler] ${a.run.kind} run ${a.run.id} aborted after ` +
                `${a.consecutiveFailures} consecutive failures`
            );
            this.finalize(a, "aborted");
          }
        }
      }
    } finally {
      for (const a of active) a.sampler.close();
    }

    return active.map((a) => a.run);
  }

  private async takeSample(
    a: ActiveRun,
    index: number,
    onSample?: (run: TestRun, sample: Sample) => void
  ): Promise<void> {
    const timestamp = Math.max(a.lastTimestamp, this.clock.now());
    let sample: Sample;
    try {
      const value = await a.sampler.measure();
      sample = { kind: a.run.kind, index, timestamp, value, valid: true };
      a.consecutiveFailures = 0;
    } catch (err) {
      if (!isDeviceError(err)) throw err;
      sample = { kind: a.run.kind, index, timestamp, value: null, valid: false, error: err.kind };
      a.consecutiveFailures++;
      console.warn(`[scheduler] ${a.run.kind} sample ${index} invalid: ${err.message}`);
    }
    a.lastTimestamp = timestamp;
    a.run.samples.push(Object.freeze(sample));
    onSample?.(a.run, sample);
  }

  private finalize(a: ActiveRun, status: FinalStatus): void {
    const run = a.run;
    if (run.status !== "running") {
      throw new Error(`run ${run.id} already finalized as ${run.status}`);
    }
    run.status = status;
    run.stats = Object.freeze(computeStats(run.samples));
    run.finishedAt = Math.max(a.lastTimestamp, this.clock.now());
    Object.freeze(run.samples);
    Object.freeze(run.config);
    Object.freeze(run.endpoint);
    Object.freeze(run);

    const s = run.stats;
    console.log(
      `[scheduler] ${run.kind} run ${run.id} ${status} ` +
        `samples=${run.samples.length} valid=${s.count}` +
        (s.mean !== null ? ` mean=${s.mean.toFixed(4)}A` : "")
    );
  }
}

function completionStatus(run: TestRun): FinalStatus {
  return run.samples.every((s) => s.valid) ? "completed" : "degraded";
}
