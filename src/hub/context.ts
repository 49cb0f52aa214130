import type { AppConfig } from "../config.js";
import type { ResultArchive } from "../archive/archive.js";
import type { SamplingScheduler } from "../scheduler/scheduler.js";
import { SampleRelay } from "./relay.js";

export interface HubContext {
  archive: ResultArchive;
  config: AppConfig;
  /** Injected in tests; a default scheduler is built per campaign otherwise. */
  scheduler?: SamplingScheduler;
  relay: SampleRelay;
}

export function createHubContext(input: Omit<HubContext, "relay">): HubContext {
  return { ...input, relay: new SampleRelay() };
}

// ---------------------------------------------------------------------------
// Auth
// ---------------------------------------------------------------------------

export function checkAuth(secret: string | undefined, authHeader: string | undefined): boolean {
  if (!secret) return true; // no secret = open (dev)
  return authHeader === `Bearer ${secret}`;
}
