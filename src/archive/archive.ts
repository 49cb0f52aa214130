import type { DeviceKind, FinalStatus, RunStatus, StatMetric, TestRun } from "../types.js";
import { STAT_METRICS } from "../types.js";
import { ArchiveError, NotFoundError } from "../errors.js";

export interface RunQuery {
  kind?: DeviceKind;
  status?: FinalStatus;
  from?: number; // createdAt lower bound, inclusive
  to?: number; // createdAt upper bound, inclusive
}

export interface RunComparison {
  kind: DeviceKind;
  runA: string;
  runB: string;
  /** b − a per metric; null when either run has no value for it. */
  deltas: Record<StatMetric, number | null>;
  countDelta: number;
}

export interface MetricSpread {
  min: number;
  max: number;
  spread: number;
}

/** Side-by-side metrics for any number of runs, of one device or several. */
export interface MultiRunComparison {
  runs: { id: string; kind: DeviceKind; status: RunStatus }[];
  /** metric → run id → value */
  metrics: Record<StatMetric, Record<string, number | null>>;
  /** Only metrics at least one run has a value for. */
  summary: Partial<Record<StatMetric, MetricSpread>>;
}

export interface ArchiveSummary {
  totalRuns: number;
  completedRuns: number;
  successRate: number;
  byKind: Partial<Record<DeviceKind, number>>;
  byStatus: Partial<Record<RunStatus, number>>;
}

/**
 * Storage-agnostic result archive. Implementations only accept finalized
 * runs and must return from `get` a run equal to the one stored.
 */
export interface ResultArchive {
  store(run: TestRun): Promise<void>;
  get(id: string): Promise<TestRun | null>;
  /** Lazy, most recent first. */
  query(filter?: RunQuery): AsyncIterable<TestRun>;
  /** Most recent run matching the filter, or null. */
  latest(filter?: RunQuery): Promise<TestRun | null>;
  compare(idA: string, idB: string): Promise<RunComparison>;
  compareMany(ids: string[]): Promise<MultiRunComparison>;
  delete(id: string): Promise<boolean>;
  summary(): Promise<ArchiveSummary>;
}

// ---------------------------------------------------------------------------
// Shared behaviour
// ---------------------------------------------------------------------------

export abstract class BaseArchive implements ResultArchive {
  abstract store(run: TestRun): Promise<void>;
  abstract get(id: string): Promise<TestRun | null>;
  abstract query(filter?: RunQuery): AsyncIterable<TestRun>;
  abstract delete(id: string): Promise<boolean>;

  async compare(idA: string, idB: string): Promise<RunComparison> {
    const a = await this.get(idA);
    if (!a) throw new NotFoundError(idA);
    const b = await this.get(idB);
    if (!b) throw new NotFoundError(idB);
    return compareRuns(a, b);
  }

  async latest(filter: RunQuery = {}): Promise<TestRun | null> {
    for await (const run of this.query(filter)) return run;
    return null;
  }

  async compareMany(ids: string[]): Promise<MultiRunComparison> {
    const runs: TestRun[] = [];
    for (const id of ids) {
      const run = await this.get(id);
      if (!run) throw new NotFoundError(id);
      runs.push(run);
    }
    return compareAcross(runs);
  }

  async summary(): Promise<ArchiveSummary> {
    const byKind: Partial<Record<DeviceKind, number>> = {};
    const byStatus: Partial<Record<RunStatus, number>> = {};
    let total = 0;
    for await (const run of this.query()) {
      total++;
      byKind[run.kind] = (byKind[run.kind] ?? 0) + 1;
      byStatus[run.status] = (byStatus[run.status] ?? 0) + 1;
    }
    const completed = byStatus.completed ?? 0;
    return {
      totalRuns: total,
      completedRuns: completed,
      successRate: total > 0 ? completed / total : 0,
      byKind,
      byStatus,
    };
  }
}

export function assertStorable(run: TestRun): void {
  if (run.status === "running" || run.stats === null) {
    throw new ArchiveError(`run ${run.id} is not finalized`);
  }
}

export function matchesQuery(run: TestRun, filter: RunQuery): boolean {
  if (filter.kind && run.kind !== filter.kind) return false;
  if (filter.status && run.status !== filter.status) return false;
  if (filter.from !== undefined && run.createdAt < filter.from) return false;
  if (filter.to !== undefined && run.createdAt > filter.to) return false;
  return true;
}

export function compareRuns(a: TestRun, b: TestRun): RunComparison {
  if (a.kind !== b.kind) {
    throw new ArchiveError(`cannot compare a ${a.kind} run with a ${b.kind} run`);
  }
  const delta = (metric: StatMetric): number | null => {
    const va = a.stats?.[metric] ?? null;
    const vb = b.stats?.[metric] ?? null;
    return va === null || vb === null ? null : vb - va;
  };
  return {
    kind: a.kind,
    runA: a.id,
    runB: b.id,
    deltas: {
      mean: delta("mean"),
      median: delta("median"),
      stdev: delta("stdev"),
      min: delta("min"),
      max: delta("max"),
    },
    countDelta: (b.stats?.count ?? 0) - (a.stats?.count ?? 0),
  };
}

export function compareAcross(runs: TestRun[]): MultiRunComparison {
  const column = (metric: StatMetric): Record<string, number | null> => {
    const byRun: Record<string, number | null> = {};
    for (const run of runs) byRun[run.id] = run.stats?.[metric] ?? null;
    return byRun;
  };
  const metrics: Record<StatMetric, Record<string, number | null>> = {
    mean: column("mean"),
    median: column("median"),
    stdev: column("stdev"),
    min: column("min"),
    max: column("max"),
  };

  const summary: Partial<Record<StatMetric, MetricSpread>> = {};
  for (const metric of STAT_METRICS) {
    const values = Object.values(metrics[metric]).filter((v): v is number => v !== null);
    if (values.length === 0) continue;
    const lo = values.reduce((a, b) => (b < a ? b : a));
    const hi = values.reduce((a, b) => (b > a ? b : a));
    summary[metric] = { min: lo, max: hi, spread: hi - lo };
  }

  return {
    runs: runs.map((run) => ({ id: run.id, kind: run.kind, status: run.status })),
    metrics,
    summary,
  };
}

/** Most recent first; ties broken by id so paging is stable. */
export function byRecency(a: TestRun, b: TestRun): number {
  return b.createdAt - a.createdAt || (a.id < b.id ? 1 : a.id > b.id ? -1 : 0);
}
