import type { TestRun } from "../types.js";
import { ArchiveError } from "../errors.js";
import { BaseArchive, assertStorable, byRecency, matchesQuery } from "./archive.js";
import type { RunQuery } from "./archive.js";

/** In-process archive; stored runs are deep copies, never shared. */
export class MemoryArchive extends BaseArchive {
  private readonly runs = new Map<string, TestRun>();

  async store(run: TestRun): Promise<void> {
    assertStorable(run);
    if (this.runs.has(run.id)) {
      throw new ArchiveError(`run ${run.id} is already archived`);
    }
    this.runs.set(run.id, structuredClone(run));
  }

  async get(id: string): Promise<TestRun | null> {
    const run = this.runs.get(id);
    return run ? structuredClone(run) : null;
  }

  async *query(filter: RunQuery = {}): AsyncIterable<TestRun> {
    const ordered = Array.from(this.runs.values()).sort(byRecency);
    for (const run of ordered) {
      if (matchesQuery(run, filter)) yield structuredClone(run);
    }
  }

  async delete(id: string): Promise<boolean> {
    return this.runs.delete(id);
  }

  get size(): number {
    return this.runs.size;
  }
}
