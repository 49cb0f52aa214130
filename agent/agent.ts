#!/usr/bin/env node
/**
 * Ammeter campaign agent
 *
 * Runs one sampling campaign against the emulators, archives every run and
 * exits with 0 (ok), 1 (connection failure), 2 (protocol/parse failure) or
 * 3 (invalid sampling config).
 *
 * Sampling (any two of the first three):
 *   NUM_SAMPLES, DURATION_SECONDS, FREQUENCY_HZ
 *   MAX_CONSECUTIVE_FAILURES — default 3
 *
 * Optional:
 *   DEVICES             — comma list, e.g. "greenlee,entes" (default: all)
 *   EMBEDDED_EMULATORS  — "true" starts the emulators in this process
 *   SQLITE_PATH, EMULATOR_HOST, *_PORT, REQUEST_TIMEOUT_MS, MAX_RETRIES,
 *   RETRY_BACKOFF_MS, EMULATOR_SEED
 */

import type { DeviceKind, SamplingConfig } from "../src/types.js";
import { endpointFor, loadConfig, parseDeviceList, samplingFromEnv } from "../src/config.js";
import { resolveSamplingConfig } from "../src/scheduler/config.js";
import { SamplingScheduler } from "../src/scheduler/scheduler.js";
import { SqliteArchive } from "../src/archive/sqlite.js";
import { randomFor, startEmulators } from "../src/emulator/emulator.js";
import type { EmulatorFleet } from "../src/emulator/emulator.js";
import { exitCodeFor, runCampaign } from "../src/campaign.js";
import type { CampaignResult } from "../src/campaign.js";
import { errorMessage } from "../src/errors.js";

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

function fmt(value: number | null): string {
  return value === null ? "-" : value.toFixed(4);
}

function report(result: CampaignResult): void {
  for (const run of result.runs) {
    const s = run.stats;
    console.log(
      `[agent] ${run.kind.padEnd(8)} ${run.status.padEnd(11)} id=${run.id} ` +
        `valid=${s?.count ?? 0}/${run.samples.length} mean=${fmt(s?.mean ?? null)}A ` +
        `median=${fmt(s?.median ?? null)}A stdev=${fmt(s?.stdev ?? null)}A ` +
        `min=${fmt(s?.min ?? null)}A max=${fmt(s?.max ?? null)}A`
    );
  }
  if (result.ranking.entries.length > 1) {
    console.log(`[agent] ranking vs reference ${fmt(result.ranking.reference)}A:`);
    for (const entry of result.ranking.entries) {
      console.log(
        `[agent]   #${entry.rank} ${entry.kind} deviation=${fmt(entry.deviation)}A stdev=${fmt(entry.stdev)}A`
      );
    }
  }
  for (const { runId, error } of result.archiveErrors) {
    console.error(`[agent] run ${runId} not archived: ${error.message}`);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<number> {
  const config = loadConfig();
  let kinds: DeviceKind[];
  let sampling: SamplingConfig;
  try {
    kinds = parseDeviceList(process.env.DEVICES);
    sampling = resolveSamplingConfig(samplingFromEnv());
  } catch (err) {
    console.error(`[agent] ${errorMessage(err)}`);
    return exitCodeFor(err instanceof Error ? err : new Error(String(err)));
  }

  let fleet: EmulatorFleet | null = null;
  if (process.env.EMBEDDED_EMULATORS === "true") {
    fleet = await startEmulators(kinds, {
      host: config.emulatorHost,
      portFor: (kind) => config.ports[kind],
      randomFor: (kind) => randomFor(kind, config.emulatorSeed),
    });
  }

  const controller = new AbortController();
  const onSignal = () => {
    console.log("[agent] stop requested — finishing current sample");
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  const archive = SqliteArchive.open(config.sqlitePath);
  try {
    const result = await runCampaign({
      endpoints: kinds.map((kind) => endpointFor(kind, config)),
      config: sampling,
      archive,
      scheduler: new SamplingScheduler({
        client: {
          timeoutMs: config.requestTimeoutMs,
          maxRetries: config.maxRetries,
          backoffMs: config.retryBackoffMs,
        },
      }),
      signal: controller.signal,
    });
    report(result);
    return exitCodeFor(result);
  } catch (err) {
    console.error(`[agent] campaign failed: ${errorMessage(err)}`);
    return exitCodeFor(err instanceof Error ? err : new Error(String(err)));
  } finally {
    archive.close();
    await fleet?.stop();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error("[agent] fatal:", err);
    process.exit(1);
  }
);
