import { describe, expect, it } from "vitest";
import {
  AMMETER_MODELS,
  CIRCUTOR_WINDOW,
  hallEffect,
  ohmsLaw,
  rogowskiIntegral,
} from "../src/emulator/models.js";
import { scriptedRandom, seededRandom, uniform } from "../src/emulator/random.js";
import { parseSample } from "../src/client/client.js";
import { DEVICE_KINDS } from "../src/types.js";

describe("physical models", () => {
  it("applies Ohm's law", () => {
    expect(ohmsLaw(5, 10)).toBe(0.5);
  });

  it("applies the Hall-effect relation", () => {
    expect(hallEffect(0.05, 1000)).toBeCloseTo(50, 9);
  });

  it("integrates voltage over time steps", () => {
    expect(rogowskiIntegral([1, 2], [0.5, 0.25])).toBe(1);
  });

  it("rejects mismatched Rogowski inputs", () => {
    expect(() => rogowskiIntegral([1, 2], [0.1])).toThrow(RangeError);
  });
});

describe("AMMETER_MODELS", () => {
  it("draws Greenlee voltage first, then resistance", () => {
    const m = AMMETER_MODELS.greenlee.measure(scriptedRandom([0, 0.5]));
    expect(m.inputs.voltage).toBe(1);
    expect(m.inputs.resistance).toBeCloseTo(50.05, 9);
    expect(m.current).toBeCloseTo(1 / 50.05, 12);
  });

  it("draws Entes flux first, then calibration", () => {
    const m = AMMETER_MODELS.entes.measure(scriptedRandom([1 / 3, 0]));
    expect(m.inputs.fluxDensity).toBeCloseTo(0.04, 12);
    expect(m.inputs.calibrationFactor).toBe(500);
    expect(m.current).toBeCloseTo(20, 9);
  });

  it("integrates a full Circutor window", () => {
    const m = AMMETER_MODELS.circutor.measure(scriptedRandom([0]));
    expect(m.inputs.voltages).toHaveLength(CIRCUTOR_WINDOW);
    expect(m.inputs.timeSteps).toHaveLength(CIRCUTOR_WINDOW);
    expect(m.current).toBeCloseTo(0.001, 12);
  });

  it("uses each device's fixed command and port", () => {
    expect(AMMETER_MODELS.greenlee.command).toBe("MEASURE_GREENLEE -get_measurement");
    expect(AMMETER_MODELS.entes.command).toBe("MEASURE_ENTES -get_data");
    expect(AMMETER_MODELS.circutor.command).toBe("MEASURE_CIRCUTOR -get_measurement");
    expect(DEVICE_KINDS.map((k) => AMMETER_MODELS[k].defaultPort)).toEqual([5000, 5001, 5002]);
  });

  it.each(DEVICE_KINDS)("keeps every %s reading inside its plausible range", (kind) => {
    const model = AMMETER_MODELS[kind];
    const rng = seededRandom(1234);
    for (let i = 0; i < 500; i++) {
      const { current } = model.measure(rng);
      expect(() => parseSample(String(current), kind)).not.toThrow();
    }
  });
});

describe("random sources", () => {
  it("repeats a sequence for the same seed", () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const drawsA = Array.from({ length: 5 }, () => a.next());
    const drawsB = Array.from({ length: 5 }, () => b.next());
    expect(drawsA).toEqual(drawsB);
  });

  it("diverges for different seeds", () => {
    expect(seededRandom(1).next()).not.toBe(seededRandom(2).next());
  });

  it("stays within [0, 1)", () => {
    const rng = seededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it("cycles a scripted list", () => {
    const rng = scriptedRandom([0.1, 0.2]);
    expect([rng.next(), rng.next(), rng.next()]).toEqual([0.1, 0.2, 0.1]);
  });

  it("refuses an empty script", () => {
    expect(() => scriptedRandom([])).toThrow();
  });

  it("scales draws to a range", () => {
    expect(uniform(scriptedRandom([0.25]), 4, 8)).toBe(5);
  });
});
