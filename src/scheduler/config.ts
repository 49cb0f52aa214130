import type { SamplingConfig } from "../types.js";
import { ConfigError } from "../errors.js";

export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 3;

// duration × frequency may drift this far from an integer count
const COUNT_TOLERANCE = 1e-3;

/** Throws ConfigError listing every problem; nothing is contacted first. */
export function validateSamplingConfig(config: SamplingConfig): SamplingConfig {
  const issues: string[] = [];
  const { numSamples, durationSeconds, frequencyHz, maxConsecutiveFailures } = config;

  if (!Number.isInteger(numSamples) || numSamples < 1) {
    issues.push(`numSamples must be an integer ≥ 1 (got ${numSamples})`);
  }
  if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
    issues.push(`durationSeconds must be ≥ 0 (got ${durationSeconds})`);
  }
  if (!Number.isFinite(frequencyHz) || frequencyHz <= 0) {
    issues.push(`frequencyHz must be > 0 (got ${frequencyHz})`);
  }
  if (!Number.isInteger(maxConsecutiveFailures) || maxConsecutiveFailures < 1) {
    issues.push(`maxConsecutiveFailures must be an integer ≥ 1 (got ${maxConsecutiveFailures})`);
  }

  if (issues.length > 0) throw new ConfigError(issues);
  return config;
}

export interface PartialSamplingConfig {
  numSamples?: number;
  durationSeconds?: number;
  frequencyHz?: number;
  maxConsecutiveFailures?: number;
}

/**
 * Fills in a sampling config from any two of count, duration and frequency.
 * When all three are given they must agree: count = duration × frequency.
 */
export function resolveSamplingConfig(partial: PartialSamplingConfig): SamplingConfig {
  const { numSamples, durationSeconds, frequencyHz } = partial;
  const maxConsecutiveFailures =
    partial.maxConsecutiveFailures ?? DEFAULT_MAX_CONSECUTIVE_FAILURES;

  const provided = [numSamples, durationSeconds, frequencyHz].filter((v) => v !== undefined);
  if (provided.length < 2) {
    throw new ConfigError([
      "provide at least two of numSamples, durationSeconds, frequencyHz",
    ]);
  }

  let resolved: SamplingConfig;
  if (numSamples === undefined && durationSeconds !== undefined && frequencyHz !== undefined) {
    const expected = durationSeconds * frequencyHz;
    const rounded = Math.round(expected);
    if (Math.abs(expected - rounded) > COUNT_TOLERANCE) {
      throw new ConfigError([
        `durationSeconds × frequencyHz = ${expected} is not a whole number of samples`,
      ]);
    }
    resolved = { numSamples: rounded, durationSeconds, frequencyHz, maxConsecutiveFailures };
  } else if (frequencyHz === undefined && numSamples !== undefined && durationSeconds !== undefined) {
    if (durationSeconds <= 0) {
      throw new ConfigError(["durationSeconds must be > 0 to derive frequencyHz"]);
    }
    resolved = {
      numSamples,
      durationSeconds,
      frequencyHz: numSamples / durationSeconds,
      maxConsecutiveFailures,
    };
  } else if (durationSeconds === undefined && numSamples !== undefined && frequencyHz !== undefined) {
    resolved = {
      numSamples,
      durationSeconds: numSamples / frequencyHz,
      frequencyHz,
      maxConsecutiveFailures,
    };
  } else if (numSamples !== undefined && durationSeconds !== undefined && frequencyHz !== undefined) {
    // durationSeconds = 0 means "no time bound", so there is nothing to cross-check
    const expected = durationSeconds * frequencyHz;
    if (durationSeconds > 0 && Math.abs(expected - numSamples) > COUNT_TOLERANCE) {
      throw new ConfigError([
        `durationSeconds(${durationSeconds}) × frequencyHz(${frequencyHz}) = ${expected}, ` +
          `but numSamples = ${numSamples}`,
      ]);
    }
    resolved = { numSamples, durationSeconds, frequencyHz, maxConsecutiveFailures };
  } else {
    throw new ConfigError(["provide at least two of numSamples, durationSeconds, frequencyHz"]);
  }

  return validateSamplingConfig(resolved);
}
