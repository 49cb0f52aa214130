import type { Hono } from "hono";
import type { DeviceKind, FinalStatus, TestRun } from "../types.js";
import { isDeviceKind, isFinalStatus } from "../types.js";
import type { RunQuery } from "../archive/archive.js";
import { ArchiveError, NotFoundError } from "../errors.js";
import { describeDistribution, describeShape, rankDevices, validValues } from "../stats/stats.js";
import type { HubContext } from "./context.js";
import { checkAuth } from "./context.js";

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function idList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id !== "");
}

type FilterResult = { ok: true; filter: RunQuery } | { ok: false; error: string };

function parseFilter(query: (name: string) => string | undefined): FilterResult {
  const kindParam = query("kind");
  let kind: DeviceKind | undefined;
  if (kindParam !== undefined) {
    if (!isDeviceKind(kindParam)) return { ok: false, error: `unknown device kind: ${kindParam}` };
    kind = kindParam;
  }
  const statusParam = query("status");
  let status: FinalStatus | undefined;
  if (statusParam !== undefined) {
    if (!isFinalStatus(statusParam)) return { ok: false, error: `unknown run status: ${statusParam}` };
    status = statusParam;
  }
  return {
    ok: true,
    filter: { kind, status, from: optionalNumber(query("from")), to: optionalNumber(query("to")) },
  };
}

// ---------------------------------------------------------------------------
// Mount archive routes
// ---------------------------------------------------------------------------

export function mountRunRoutes(app: Hono, ctx: HubContext): void {
  // --------------------------------------------------------------------------
  // GET /api/runs — most recent first, filtered by kind / status / createdAt
  // --------------------------------------------------------------------------
  app.get("/api/runs", async (c) => {
    const parsed = parseFilter((name) => c.req.query(name));
    if (!parsed.ok) return c.json({ error: parsed.error }, 400);
    const limit = Math.min(optionalNumber(c.req.query("limit")) ?? DEFAULT_LIMIT, MAX_LIMIT);

    const runs: TestRun[] = [];
    if (limit > 0) {
      for await (const run of ctx.archive.query(parsed.filter)) {
        runs.push(run);
        if (runs.length >= limit) break;
      }
    }
    return c.json(runs);
  });

  // --------------------------------------------------------------------------
  // GET /api/runs/latest — same filters as the list
  // --------------------------------------------------------------------------
  app.get("/api/runs/latest", async (c) => {
    const parsed = parseFilter((name) => c.req.query(name));
    if (!parsed.ok) return c.json({ error: parsed.error }, 400);
    const run = await ctx.archive.latest(parsed.filter);
    if (!run) return c.json({ error: "not found" }, 404);
    return c.json(run);
  });

  // --------------------------------------------------------------------------
  // GET /api/runs/:id — full run, plus its distribution shape
  // --------------------------------------------------------------------------
  app.get("/api/runs/:id", async (c) => {
    const run = await ctx.archive.get(c.req.param("id"));
    if (!run) return c.json({ error: "not found" }, 404);
    const values = validValues(run.samples);
    return c.json({ ...run, distribution: describeDistribution(values), shape: describeShape(values) });
  });

  // --------------------------------------------------------------------------
  // GET /api/runs/:a/compare/:b — per-metric deltas (b − a)
  // --------------------------------------------------------------------------
  app.get("/api/runs/:a/compare/:b", async (c) => {
    try {
      return c.json(await ctx.archive.compare(c.req.param("a"), c.req.param("b")));
    } catch (err) {
      if (err instanceof NotFoundError) return c.json({ error: err.message }, 404);
      if (err instanceof ArchiveError) return c.json({ error: err.message }, 409);
      throw err;
    }
  });

  // --------------------------------------------------------------------------
  // GET /api/compare?ids=a,b,c — metrics side by side with min/max/spread
  // --------------------------------------------------------------------------
  app.get("/api/compare", async (c) => {
    const ids = idList(c.req.query("ids"));
    if (ids.length < 2) return c.json({ error: "ids needs at least two runs" }, 400);
    try {
      return c.json(await ctx.archive.compareMany(ids));
    } catch (err) {
      if (err instanceof NotFoundError) return c.json({ error: err.message }, 404);
      throw err;
    }
  });

  // --------------------------------------------------------------------------
  // DELETE /api/runs/:id
  // --------------------------------------------------------------------------
  app.delete("/api/runs/:id", async (c) => {
    if (!checkAuth(ctx.config.apiSecret, c.req.header("Authorization"))) {
      return c.json({ error: "unauthorized" }, 401);
    }
    const ok = await ctx.archive.delete(c.req.param("id"));
    if (!ok) return c.json({ error: "not found" }, 404);
    return c.body(null, 204);
  });

  // --------------------------------------------------------------------------
  // GET /api/ranking?ids=a,b,c[&reference=x] — cross-device accuracy
  // --------------------------------------------------------------------------
  app.get("/api/ranking", async (c) => {
    const ids = idList(c.req.query("ids"));
    if (ids.length === 0) return c.json({ error: "ids is required" }, 400);

    const runs: TestRun[] = [];
    for (const id of ids) {
      const run = await ctx.archive.get(id);
      if (!run) return c.json({ error: `run not found: ${id}` }, 404);
      runs.push(run);
    }
    return c.json(rankDevices(runs, optionalNumber(c.req.query("reference"))));
  });

  // --------------------------------------------------------------------------
  // GET /api/summary — archive totals
  // --------------------------------------------------------------------------
  app.get("/api/summary", async (c) => c.json(await ctx.archive.summary()));
}
