/**
 * Starts the three ammeter emulators on their fixed ports and the HTTP API
 * for campaigns and archived results.
 *
 * Optional env vars:
 *   EMULATOR_HOST        — bind address for the emulators (default 127.0.0.1)
 *   GREENLEE_PORT / ENTES_PORT / CIRCUTOR_PORT — default 5000 / 5001 / 5002
 *   EMULATOR_SEED        — seed every emulator's random source (reproducible runs)
 *   EMULATOR_VERBOSE     — "true" logs the inputs behind every measurement
 *   SQLITE_PATH          — archive database (default ./ammeter-lab.sqlite)
 *   PORT                 — HTTP port (default 3000)
 *   AMMETER_API_SECRET   — bearer token for mutating routes
 */

import { serve } from "@hono/node-server";
import { DEVICE_KINDS } from "./types.js";
import { loadConfig } from "./config.js";
import { randomFor, startEmulators } from "./emulator/emulator.js";
import { SqliteArchive } from "./archive/sqlite.js";
import { createHubContext } from "./hub/context.js";
import { createApp } from "./hub/app.js";

const config = loadConfig();

const fleet = await startEmulators(DEVICE_KINDS, {
  host: config.emulatorHost,
  portFor: (kind) => config.ports[kind],
  randomFor: (kind) => randomFor(kind, config.emulatorSeed),
  verbose: config.emulatorVerbose,
});

const archive = SqliteArchive.open(config.sqlitePath);
const app = createApp(createHubContext({ archive, config }));

const server = serve({ fetch: app.fetch, port: config.httpPort, hostname: "0.0.0.0" }, (info) => {
  console.log(`[ammeter-lab] listening on http://localhost:${info.port}`);
});

// ---------------------------------------------------------------------------
// Graceful shutdown
// ---------------------------------------------------------------------------

async function shutdown(signal: string): Promise<void> {
  console.log(`[ammeter-lab] received ${signal}, shutting down...`);
  server.close();
  await fleet.stop();
  archive.close();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      console.error("[ammeter-lab] shutdown failed:", err);
      process.exit(1);
    });
  });
}
