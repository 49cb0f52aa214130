import { describe, expect, it, vi } from "vitest";
import {
  EXIT_CONFIG,
  EXIT_CONNECTION,
  EXIT_OK,
  EXIT_PROTOCOL,
  exitCodeFor,
  runCampaign,
} from "../src/campaign.js";
import type { CampaignResult } from "../src/campaign.js";
import { MemoryArchive } from "../src/archive/memory.js";
import { SamplingScheduler } from "../src/scheduler/scheduler.js";
import { ArchiveError, ConfigError, ConnectionError, ProtocolError, TimeoutError } from "../src/errors.js";
import type { TestRun } from "../src/types.js";
import { VirtualClock, endpoint, makeRun, scriptedSampler } from "./helpers.js";

vi.spyOn(console, "log").mockImplementation(() => {});
vi.spyOn(console, "warn").mockImplementation(() => {});
vi.spyOn(console, "error").mockImplementation(() => {});

class FailingArchive extends MemoryArchive {
  override async store(run: TestRun): Promise<void> {
    if (run.kind === "entes") throw new Error("disk full");
    return super.store(run);
  }
}

const config = { numSamples: 3, durationSeconds: 0, frequencyHz: 5, maxConsecutiveFailures: 3 };

function scheduler(): SamplingScheduler {
  return new SamplingScheduler({
    clock: new VirtualClock(),
    samplerFor: (ep) => scriptedSampler(ep.kind === "greenlee" ? [10, 12, 14] : [11]),
  });
}

describe("runCampaign", () => {
  it("archives every run and ranks the devices", async () => {
    const archive = new MemoryArchive();
    const result = await runCampaign({
      endpoints: [endpoint("greenlee"), endpoint("entes")],
      config,
      archive,
      scheduler: scheduler(),
    });

    expect(result.runs.map((r) => r.status)).toEqual(["completed", "completed"]);
    expect(result.archiveErrors).toEqual([]);
    expect(archive.size).toBe(2);
    // medians 12 and 11 → reference 11.5, both means 0.5 away; entes has stdev 0
    expect(result.ranking.reference).toBe(11.5);
    expect(result.ranking.entries.map((e) => e.kind)).toEqual(["entes", "greenlee"]);
  });

  it("still returns a run whose archiving failed", async () => {
    const archive = new FailingArchive();
    const result = await runCampaign({
      endpoints: [endpoint("greenlee"), endpoint("entes")],
      config,
      archive,
      scheduler: scheduler(),
    });

    const entes = result.runs.find((r) => r.kind === "entes");
    expect(entes?.stats?.mean).toBe(11);
    expect(result.archiveErrors).toHaveLength(1);
    expect(result.archiveErrors[0].runId).toBe(entes?.id);
    expect(result.archiveErrors[0].error).toBeInstanceOf(ArchiveError);
    expect(result.archiveErrors[0].error.message).toContain("disk full");
    expect(archive.size).toBe(1);
  });

  it("rejects an invalid config before sampling", async () => {
    await expect(
      runCampaign({
        endpoints: [endpoint("greenlee")],
        config: { ...config, numSamples: 0 },
        archive: new MemoryArchive(),
        scheduler: scheduler(),
      })
    ).rejects.toThrow(ConfigError);
  });
});

describe("exitCodeFor", () => {
  function resultOf(runs: TestRun[]): CampaignResult {
    return { runs, ranking: { reference: null, entries: [] }, archiveErrors: [] };
  }

  function abortedRun(error: Error & { kind: "connection" | "timeout" | "protocol" | "parse" }): TestRun {
    const base = makeRun("x", "greenlee", [null, null, null], { status: "aborted" });
    return {
      ...base,
      samples: base.samples.map((s) => ({ ...s, error: error.kind })),
    };
  }

  it("is 0 when no run aborted", () => {
    expect(exitCodeFor(resultOf([makeRun("a", "greenlee", [1, null])]))).toBe(EXIT_OK);
  });

  it("is 1 for a run lost to connection failures", () => {
    expect(exitCodeFor(resultOf([abortedRun(new ConnectionError("refused"))]))).toBe(EXIT_CONNECTION);
    expect(exitCodeFor(resultOf([abortedRun(new TimeoutError("slow"))]))).toBe(EXIT_CONNECTION);
  });

  it("is 2 for a run lost to protocol failures", () => {
    expect(exitCodeFor(resultOf([abortedRun(new ProtocolError("rejected"))]))).toBe(EXIT_PROTOCOL);
  });

  it("prefers the connection code when both kinds abort", () => {
    const runs = [abortedRun(new ProtocolError("rejected")), abortedRun(new ConnectionError("refused"))];
    expect(exitCodeFor(resultOf(runs))).toBe(EXIT_CONNECTION);
  });

  it("maps thrown errors", () => {
    expect(exitCodeFor(new ConfigError(["bad"]))).toBe(EXIT_CONFIG);
    expect(exitCodeFor(new Error("boom"))).toBe(EXIT_CONNECTION);
  });
});
