export type DeviceKind = "greenlee" | "entes" | "circutor";

export const DEVICE_KINDS: readonly DeviceKind[] = ["greenlee", "entes", "circutor"];

export function isDeviceKind(value: string): value is DeviceKind {
  return DEVICE_KINDS.some((kind) => kind === value);
}

export interface DeviceEndpoint {
  readonly kind: DeviceKind;
  readonly host: string;
  readonly port: number;
  readonly command: string; // sent as one newline-terminated line
}

// ---------------------------------------------------------------------------
// Samples
// ---------------------------------------------------------------------------

export type SampleErrorKind =
  | "connection"
  | "timeout"
  | "protocol"
  | "parse";

export interface Sample {
  readonly kind: DeviceKind;
  readonly index: number;
  readonly timestamp: number; // ms epoch
  readonly value: number | null; // amperes; null when invalid
  readonly valid: boolean;
  readonly error?: SampleErrorKind;
}

export interface SamplingConfig {
  numSamples: number;
  durationSeconds: number; // 0 = no time bound
  frequencyHz: number;
  maxConsecutiveFailures: number;
}

// ---------------------------------------------------------------------------
// Runs
// ---------------------------------------------------------------------------

export type RunStatus =
  | "running"
  | "completed"
  | "degraded"
  | "aborted"
  | "interrupted";

export interface StatsSnapshot {
  count: number;
  mean: number | null;
  median: number | null;
  stdev: number | null;
  min: number | null;
  max: number | null;
}

export interface TestRun {
  id: string;
  kind: DeviceKind;
  endpoint: DeviceEndpoint;
  config: SamplingConfig;
  samples: Sample[];
  status: RunStatus;
  stats: StatsSnapshot | null; // null while running
  createdAt: number;
  finishedAt: number | null;
}

export type FinalStatus = Exclude<RunStatus, "running">;

export const FINAL_STATUSES: readonly FinalStatus[] = ["completed", "degraded", "aborted", "interrupted"];

export function isFinalStatus(value: string): value is FinalStatus {
  return FINAL_STATUSES.some((status) => status === value);
}

export const STAT_METRICS = ["mean", "median", "stdev", "min", "max"] as const;

export type StatMetric = (typeof STAT_METRICS)[number];
