import type { DeviceEndpoint, Sample, SamplingConfig, TestRun } from "./types.js";
import { ArchiveError, ConfigError, errorMessage } from "./errors.js";
import type { ResultArchive } from "./archive/archive.js";
import { SamplingScheduler } from "./scheduler/scheduler.js";
import { validateSamplingConfig } from "./scheduler/config.js";
import { rankDevices } from "./stats/stats.js";
import type { RankingResult } from "./stats/stats.js";

export interface CampaignInput {
  endpoints: readonly DeviceEndpoint[];
  config: SamplingConfig;
  archive: ResultArchive;
  scheduler?: SamplingScheduler;
  signal?: AbortSignal;
  onSample?: (run: TestRun, sample: Sample) => void;
}

export interface CampaignResult {
  runs: TestRun[];
  ranking: RankingResult;
  /** Runs whose stats were computed but could not be archived. */
  archiveErrors: { runId: string; error: ArchiveError }[];
}

/**
 * scheduler → stats → archive. An archive failure is reported next to the
 * run it concerns; the run and its stats are still returned.
 */
export async function runCampaign(input: CampaignInput): Promise<CampaignResult> {
  validateSamplingConfig(input.config);
  const scheduler = input.scheduler ?? new SamplingScheduler();

  const runs = await scheduler.run(input.endpoints, input.config, {
    signal: input.signal,
    onSample: input.onSample,
  });

  const archiveErrors: CampaignResult["archiveErrors"] = [];
  for (const run of runs) {
    try {
      await input.archive.store(run);
      console.log(`[archive] stored ${run.kind} run ${run.id} (${run.status})`);
    } catch (err) {
      const error =
        err instanceof ArchiveError
          ? err
          : new ArchiveError(`failed to store run ${run.id}: ${errorMessage(err)}`, { cause: err });
      console.error(`[archive] ${error.message}`);
      archiveErrors.push({ runId: run.id, error });
    }
  }

  return { runs, ranking: rankDevices(runs), archiveErrors };
}

// ---------------------------------------------------------------------------
// Process exit codes
// ---------------------------------------------------------------------------

export const EXIT_OK = 0;
export const EXIT_CONNECTION = 1;
export const EXIT_PROTOCOL = 2;
export const EXIT_CONFIG = 3;

/**
 * 0 when no run aborted; otherwise 1 if an aborted run's trailing failures
 * were connection/timeout errors, 2 if they were protocol/parse errors.
 * A ConfigError maps to 3; any other thrown error to 1.
 */
export function exitCodeFor(outcome: CampaignResult | Error): number {
  if (outcome instanceof ConfigError) return EXIT_CONFIG;
  if (outcome instanceof Error) return EXIT_CONNECTION;

  let code = EXIT_OK;
  for (const run of outcome.runs) {
    if (run.status !== "aborted") continue;
    const last = run.samples[run.samples.length - 1];
    if (last?.error === "connection" || last?.error === "timeout") return EXIT_CONNECTION;
    code = EXIT_PROTOCOL;
  }
  return code;
}

