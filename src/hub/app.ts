import { Hono } from "hono";
import { cors } from "hono/cors";
import type { HubContext } from "./context.js";
import { mountRunRoutes } from "./runs.js";
import { mountCampaignRoutes } from "./campaigns.js";

export function createApp(ctx: HubContext): Hono {
  const app = new Hono();

  app.use("*", cors());

  // Health check --------------------------------------------------------------
  app.get("/api/health", (c) => c.json({ ok: true, clients: ctx.relay.clients.size }));

  mountRunRoutes(app, ctx);
  mountCampaignRoutes(app, ctx);

  app.onError((err, c) => {
    console.error(`[hub] ${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ error: "internal error" }, 500);
  });

  return app;
}
