import type { DeviceKind } from "../types.js";
import { uniform } from "./random.js";
import type { RandomSource } from "./random.js";

// ---------------------------------------------------------------------------
// Physical models
// ---------------------------------------------------------------------------

/** I = V / R */
export function ohmsLaw(voltage: number, resistance: number): number {
  return voltage / resistance;
}

/** I = B × K */
export function hallEffect(fluxDensity: number, calibrationFactor: number): number {
  return fluxDensity * calibrationFactor;
}

/** Discrete Rogowski-coil integration: I = Σ vᵢ·Δtᵢ */
export function rogowskiIntegral(voltages: number[], timeSteps: number[]): number {
  if (voltages.length !== timeSteps.length) {
    throw new RangeError(
      `rogowskiIntegral: ${voltages.length} voltages but ${timeSteps.length} time steps`
    );
  }
  return voltages.reduce((sum, v, i) => sum + v * timeSteps[i], 0);
}

// ---------------------------------------------------------------------------
// Device variants
// ---------------------------------------------------------------------------

export interface Range {
  min: number;
  max: number;
}

export interface Measurement {
  current: number; // A
  inputs: Record<string, number | number[]>;
}

export interface AmmeterModel {
  kind: DeviceKind;
  label: string;
  command: string;
  defaultPort: number;
  /** Every value `measure` can produce lies in this range. */
  plausibleRange: Range;
  measure(rng: RandomSource): Measurement;
}

const GREENLEE_VOLTAGE: Range = { min: 1, max: 10 };
const GREENLEE_RESISTANCE: Range = { min: 0.1, max: 100 };

const ENTES_FLUX: Range = { min: 0.01, max: 0.1 };
const ENTES_CALIBRATION: Range = { min: 500, max: 2000 };

export const CIRCUTOR_WINDOW = 10;
const CIRCUTOR_VOLTAGE: Range = { min: 0.1, max: 1.0 };
const CIRCUTOR_TIME_STEP: Range = { min: 0.001, max: 0.01 };

const draw = (rng: RandomSource, range: Range): number => uniform(rng, range.min, range.max);

export const AMMETER_MODELS: Record<DeviceKind, AmmeterModel> = {
  greenlee: {
    kind: "greenlee",
    label: "Greenlee",
    command: "MEASURE_GREENLEE -get_measurement",
    defaultPort: 5000,
    plausibleRange: {
      min: ohmsLaw(GREENLEE_VOLTAGE.min, GREENLEE_RESISTANCE.max),
      max: ohmsLaw(GREENLEE_VOLTAGE.max, GREENLEE_RESISTANCE.min),
    },
    measure(rng) {
      const voltage = draw(rng, GREENLEE_VOLTAGE);
      const resistance = draw(rng, GREENLEE_RESISTANCE);
      return { current: ohmsLaw(voltage, resistance), inputs: { voltage, resistance } };
    },
  },

  entes: {
    kind: "entes",
    label: "Entes",
    command: "MEASURE_ENTES -get_data",
    defaultPort: 5001,
    plausibleRange: {
      min: hallEffect(ENTES_FLUX.min, ENTES_CALIBRATION.min),
      max: hallEffect(ENTES_FLUX.max, ENTES_CALIBRATION.max),
    },
    measure(rng) {
      const fluxDensity = draw(rng, ENTES_FLUX);
      const calibrationFactor = draw(rng, ENTES_CALIBRATION);
      return {
        current: hallEffect(fluxDensity, calibrationFactor),
        inputs: { fluxDensity, calibrationFactor },
      };
    },
  },

  circutor: {
    kind: "circutor",
    label: "Circutor",
    command: "MEASURE_CIRCUTOR -get_measurement",
    defaultPort: 5002,
    plausibleRange: {
      min: CIRCUTOR_WINDOW * CIRCUTOR_VOLTAGE.min * CIRCUTOR_TIME_STEP.min,
      max: CIRCUTOR_WINDOW * CIRCUTOR_VOLTAGE.max * CIRCUTOR_TIME_STEP.max,
    },
    measure(rng) {
      const voltages: number[] = [];
      const timeSteps: number[] = [];
      for (let i = 0; i < CIRCUTOR_WINDOW; i++) {
        voltages.push(draw(rng, CIRCUTOR_VOLTAGE));
        timeSteps.push(draw(rng, CIRCUTOR_TIME_STEP));
      }
      return { current: rogowskiIntegral(voltages, timeSteps), inputs: { voltages, timeSteps } };
    },
  },
};
