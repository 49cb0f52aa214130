import { afterEach, describe, expect, it, vi } from "vitest";
import { createConnection } from "net";
import { connect } from "../src/client/connection.js";
import { DeviceEmulator, MAX_LINE_LENGTH, randomFor, startEmulators } from "../src/emulator/emulator.js";
import type { EmulatorFleet } from "../src/emulator/emulator.js";
import { AMMETER_MODELS } from "../src/emulator/models.js";
import { scriptedRandom, seededRandom } from "../src/emulator/random.js";
import { splitLines } from "../src/lib/lines.js";
import { endpoint } from "./helpers.js";

vi.spyOn(console, "log").mockImplementation(() => {});
vi.spyOn(console, "warn").mockImplementation(() => {});

describe("splitLines", () => {
  it("keeps the unterminated tail", () => {
    expect(splitLines("a\r\nb\nc")).toEqual({ lines: ["a", "b"], rest: "c" });
  });
});

describe("DeviceEmulator.respond", () => {
  it("answers the device's own command with a reading", () => {
    const emulator = new DeviceEmulator("greenlee", { random: scriptedRandom([0, 0]) });
    // 1 V across 0.1 Ω
    expect(emulator.respond("MEASURE_GREENLEE -get_measurement")).toEqual({
      ok: true,
      current: 10,
      line: "10",
    });
  });

  it("rejects any other command", () => {
    const emulator = new DeviceEmulator("entes");
    expect(emulator.respond("MEASURE_GREENLEE -get_measurement")).toEqual({
      ok: false,
      line: 'ERROR unknown command "MEASURE_GREENLEE -get_measurement"',
    });
  });
});

/** Writes raw chunks on a fresh socket and resolves with the first reply line. */
function firstReply(port: number, chunks: string[]): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = createConnection({ host: "127.0.0.1", port }, () => {
      for (const chunk of chunks) socket.write(chunk);
    });
    socket.setEncoding("utf8");
    let buffered = "";
    socket.on("data", (chunk: string) => {
      buffered += chunk;
      const end = buffered.indexOf("\n");
      if (end >= 0) {
        socket.destroy();
        resolve(buffered.slice(0, end));
      }
    });
    socket.on("error", reject);
  });
}

describe("DeviceEmulator over TCP", () => {
  let emulator: DeviceEmulator | null = null;
  let fleet: EmulatorFleet | null = null;

  afterEach(async () => {
    await emulator?.stop();
    await fleet?.stop();
    emulator = null;
    fleet = null;
  });

  it("serves several requests on one connection", async () => {
    emulator = new DeviceEmulator("circutor", { port: 0, random: seededRandom(3) });
    const port = await emulator.start();
    const conn = await connect(endpoint("circutor", port), 1000);

    const { min, max } = AMMETER_MODELS.circutor.plausibleRange;
    for (let i = 0; i < 3; i++) {
      conn.send("MEASURE_CIRCUTOR -get_measurement");
      const value = Number(await conn.nextLine(1000));
      expect(value).toBeGreaterThanOrEqual(min);
      expect(value).toBeLessThanOrEqual(max);
    }
    expect(conn.closed).toBe(false);
    conn.close();
  });

  it("replies with an error line and keeps the connection open", async () => {
    emulator = new DeviceEmulator("greenlee", { port: 0, random: scriptedRandom([0, 0]) });
    const port = await emulator.start();
    const conn = await connect(endpoint("greenlee", port), 1000);

    conn.send("HELLO");
    expect(await conn.nextLine(1000)).toBe('ERROR unknown command "HELLO"');

    conn.send("MEASURE_GREENLEE -get_measurement");
    expect(await conn.nextLine(1000)).toBe("10");
    expect(emulator.connectionCount).toBe(1);
    conn.close();
  });

  it("answers a bare command sent without a newline", async () => {
    emulator = new DeviceEmulator("greenlee", { port: 0, random: scriptedRandom([0, 0]) });
    const port = await emulator.start();
    expect(await firstReply(port, ["MEASURE_GREENLEE -get_measurement"])).toBe("10");
  });

  it("rejects another device's bare command", async () => {
    emulator = new DeviceEmulator("entes", { port: 0 });
    const port = await emulator.start();
    expect(await firstReply(port, ["MEASURE_CIRCUTOR -get_measurement"])).toBe(
      'ERROR unknown command "MEASURE_CIRCUTOR -get_measurement"'
    );
  });

  it("drops an unterminated line past the length cap", async () => {
    emulator = new DeviceEmulator("greenlee", { port: 0 });
    const port = await emulator.start();
    expect(await firstReply(port, ["x".repeat(MAX_LINE_LENGTH + 1)])).toBe("ERROR line too long");
  });

  it("refuses to start twice", async () => {
    emulator = new DeviceEmulator("entes", { port: 0 });
    await emulator.start();
    await expect(emulator.start()).rejects.toThrow("already started");
  });

  it("starts a fleet with one emulator per kind", async () => {
    fleet = await startEmulators(["greenlee", "entes"], {
      portFor: () => 0,
      randomFor: (kind) => randomFor(kind, 99),
    });
    expect(Array.from(fleet.emulators.keys())).toEqual(["greenlee", "entes"]);
    for (const e of fleet.emulators.values()) {
      expect(e.port).toBeGreaterThan(0);
    }
  });
});

describe("randomFor", () => {
  it("offsets a shared seed per device", () => {
    expect(randomFor("entes", 10).next()).toBe(seededRandom(11).next());
    expect(randomFor("greenlee", 10).next()).not.toBe(randomFor("circutor", 10).next());
  });
});
