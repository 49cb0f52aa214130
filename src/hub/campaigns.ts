import type { Hono } from "hono";
import type { DeviceKind, SamplingConfig } from "../types.js";
import { ConfigError, errorMessage } from "../errors.js";
import { endpointFor, parseDeviceList } from "../config.js";
import { resolveSamplingConfig } from "../scheduler/config.js";
import { SamplingScheduler } from "../scheduler/scheduler.js";
import { runCampaign } from "../campaign.js";
import type { HubContext } from "./context.js";
import { checkAuth } from "./context.js";
import { SSE_HEADERS, createSSEStream } from "./relay.js";

interface CampaignBody {
  devices?: string[] | string;
  numSamples?: number;
  durationSeconds?: number;
  frequencyHz?: number;
  maxConsecutiveFailures?: number;
}

// ---------------------------------------------------------------------------
// Mount campaign routes
// ---------------------------------------------------------------------------

export function mountCampaignRoutes(app: Hono, ctx: HubContext): void {
  // One campaign at a time; DELETE aborts it.
  let current: AbortController | null = null;

  // -------------------------------------------------------------------------
  // POST /api/campaigns — run a campaign to completion, archive its runs
  // -------------------------------------------------------------------------
  app.post("/api/campaigns", async (c) => {
    if (!checkAuth(ctx.config.apiSecret, c.req.header("Authorization"))) {
      return c.json({ error: "unauthorized" }, 401);
    }
    if (current) return c.json({ error: "a campaign is already running" }, 409);

    // Claimed before the first await so a concurrent POST sees it.
    const controller = new AbortController();
    current = controller;
    try {
      let body: CampaignBody;
      try {
        body = await c.req.json<CampaignBody>();
      } catch (err) {
        return c.json({ error: `invalid JSON body: ${errorMessage(err)}` }, 400);
      }

      let kinds: DeviceKind[];
      let config: SamplingConfig;
      try {
        kinds = parseDeviceList(Array.isArray(body.devices) ? body.devices.join(",") : body.devices);
        config = resolveSamplingConfig(body);
      } catch (err) {
        if (err instanceof ConfigError) return c.json({ error: err.message, issues: err.issues }, 400);
        throw err;
      }

      ctx.relay.broadcast("campaign:started", { devices: kinds, config });
      const result = await runCampaign({
        endpoints: kinds.map((kind) => endpointFor(kind, ctx.config)),
        config,
        archive: ctx.archive,
        scheduler:
          ctx.scheduler ??
          new SamplingScheduler({
            client: {
              timeoutMs: ctx.config.requestTimeoutMs,
              maxRetries: ctx.config.maxRetries,
              backoffMs: ctx.config.retryBackoffMs,
            },
          }),
        signal: controller.signal,
        onSample: (run, sample) => ctx.relay.broadcastSample(run.id, sample),
      });

      const runs = result.runs.map((run) => ({
        id: run.id,
        kind: run.kind,
        status: run.status,
        stats: run.stats,
      }));
      ctx.relay.broadcast("campaign:finished", { runs });
      return c.json(
        {
          runs,
          ranking: result.ranking,
          archiveErrors: result.archiveErrors.map((e) => ({
            runId: e.runId,
            error: e.error.message,
          })),
        },
        201
      );
    } finally {
      if (current === controller) current = null;
    }
  });

  // -------------------------------------------------------------------------
  // DELETE /api/campaigns/current — operator stop; runs end as interrupted
  // -------------------------------------------------------------------------
  app.delete("/api/campaigns/current", (c) => {
    if (!checkAuth(ctx.config.apiSecret, c.req.header("Authorization"))) {
      return c.json({ error: "unauthorized" }, 401);
    }
    if (!current) return c.json({ error: "no campaign running" }, 404);
    current.abort();
    console.log("[hub] campaign cancelled by operator");
    return c.body(null, 202);
  });

  // -------------------------------------------------------------------------
  // GET /api/campaigns/events — SSE stream of live samples
  // -------------------------------------------------------------------------
  app.get("/api/campaigns/events", (c) => {
    const { readable, client } = createSSEStream((broken) => ctx.relay.clients.delete(broken));
    ctx.relay.clients.add(client);

    c.req.raw.signal.addEventListener("abort", () => {
      ctx.relay.clients.delete(client);
      client.close();
    });

    return new Response(readable, { headers: SSE_HEADERS });
  });
}
