import type { DeviceEndpoint, DeviceKind } from "./types.js";
import { DEVICE_KINDS, isDeviceKind } from "./types.js";
import { AMMETER_MODELS } from "./emulator/models.js";
import { ConfigError } from "./errors.js";
import type { PartialSamplingConfig } from "./scheduler/config.js";

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

type Env = Record<string, string | undefined>;

export interface AppConfig {
  emulatorHost: string;
  ports: Record<DeviceKind, number>;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  sqlitePath: string;
  httpPort: number;
  apiSecret: string | undefined;
  emulatorSeed: number | undefined;
  emulatorVerbose: boolean;
}

function optionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return Number(value);
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    emulatorHost: env.EMULATOR_HOST ?? "127.0.0.1",
    ports: {
      greenlee: Number(env.GREENLEE_PORT ?? AMMETER_MODELS.greenlee.defaultPort),
      entes: Number(env.ENTES_PORT ?? AMMETER_MODELS.entes.defaultPort),
      circutor: Number(env.CIRCUTOR_PORT ?? AMMETER_MODELS.circutor.defaultPort),
    },
    requestTimeoutMs: Number(env.REQUEST_TIMEOUT_MS ?? 2000),
    maxRetries: Number(env.MAX_RETRIES ?? 2),
    retryBackoffMs: Number(env.RETRY_BACKOFF_MS ?? 100),
    sqlitePath: env.SQLITE_PATH ?? "./ammeter-lab.sqlite",
    httpPort: Number(env.PORT ?? 3000),
    apiSecret: env.AMMETER_API_SECRET,
    emulatorSeed: optionalNumber(env.EMULATOR_SEED),
    emulatorVerbose: env.EMULATOR_VERBOSE === "true",
  };
}

export function endpointFor(kind: DeviceKind, config: AppConfig): DeviceEndpoint {
  return {
    kind,
    host: config.emulatorHost,
    port: config.ports[kind],
    command: AMMETER_MODELS[kind].command,
  };
}

/** "greenlee,entes" → kinds; empty means every device. */
export function parseDeviceList(value: string | undefined): DeviceKind[] {
  if (!value || value.trim() === "") return [...DEVICE_KINDS];
  const kinds: DeviceKind[] = [];
  const unknown: string[] = [];
  for (const raw of value.split(",")) {
    const name = raw.trim().toLowerCase();
    if (name === "") continue;
    if (isDeviceKind(name)) {
      if (!kinds.includes(name)) kinds.push(name);
    } else {
      unknown.push(raw.trim());
    }
  }
  if (unknown.length > 0) {
    throw new ConfigError([`unknown device(s): ${unknown.join(", ")}`]);
  }
  return kinds;
}

/** Campaign settings from the environment; absent values stay undefined. */
export function samplingFromEnv(env: Env = process.env): PartialSamplingConfig {
  return {
    numSamples: optionalNumber(env.NUM_SAMPLES),
    durationSeconds: optionalNumber(env.DURATION_SECONDS),
    frequencyHz: optionalNumber(env.FREQUENCY_HZ),
    maxConsecutiveFailures: optionalNumber(env.MAX_CONSECUTIVE_FAILURES),
  };
}
