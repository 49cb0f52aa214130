import { createServer } from "net";
import type { Server, Socket } from "net";
import type { DeviceKind } from "../types.js";
import { DEVICE_KINDS } from "../types.js";
import { splitLines, sleep } from "../lib/lines.js";
import { AMMETER_MODELS } from "./models.js";
import type { AmmeterModel } from "./models.js";
import { seededRandom, systemRandom } from "./random.js";
import type { RandomSource } from "./random.js";

export interface EmulatorOptions {
  host?: string;
  /** Defaults to the device's fixed port; 0 binds any free port. */
  port?: number;
  random?: RandomSource;
  /** Artificial latency before every reply. */
  responseDelayMs?: number;
  /** Log every computed measurement. */
  verbose?: boolean;
}

/** Longest unterminated input kept before the buffer is dropped. */
export const MAX_LINE_LENGTH = 1024;

const KNOWN_COMMANDS = new Set(Object.values(AMMETER_MODELS).map((model) => model.command));

export type EmulatorReply =
  | { ok: true; current: number; line: string }
  | { ok: false; line: string };

// ---------------------------------------------------------------------------
// DeviceEmulator — one TCP service per ammeter
// ---------------------------------------------------------------------------

export class DeviceEmulator {
  readonly kind: DeviceKind;
  readonly model: AmmeterModel;
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly random: RandomSource;
  private readonly responseDelayMs: number;
  private readonly verbose: boolean;
  private readonly tag: string;

  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  private boundPort: number | null = null;

  constructor(kind: DeviceKind, opts: EmulatorOptions = {}) {
    this.kind = kind;
    this.model = AMMETER_MODELS[kind];
    this.host = opts.host ?? "127.0.0.1";
    this.requestedPort = opts.port ?? this.model.defaultPort;
    this.random = opts.random ?? systemRandom();
    this.responseDelayMs = opts.responseDelayMs ?? 0;
    this.verbose = opts.verbose ?? false;
    this.tag = `[emulator:${kind}]`;
  }

  get port(): number | null {
    return this.boundPort;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  /** Binds and starts accepting; resolves with the bound port. */
  start(): Promise<number> {
    if (this.server) {
      return Promise.reject(new Error(`${this.tag} already started`));
    }
    const server = createServer((socket) => this.handleConnection(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once("error", onError);
      server.listen(this.requestedPort, this.host, () => {
        server.off("error", onError);
        server.on("error", (err) => console.error(`${this.tag} server error:`, err));
        const address = server.address();
        this.boundPort = typeof address === "object" && address ? address.port : this.requestedPort;
        console.log(`${this.tag} ${this.model.label} listening on ${this.host}:${this.boundPort}`);
        resolve(this.boundPort);
      });
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    console.log(`${this.tag} stopped`);
    this.boundPort = null;
  }

  /**
   * parsing → computing | rejecting. Only the device's exact command
   * produces a measurement; anything else is rejected with an error line.
   */
  respond(command: string): EmulatorReply {
    if (command.trim() !== this.model.command) {
      return { ok: false, line: `ERROR unknown command "${command.trim()}"` };
    }
    const { current, inputs } = this.model.measure(this.random);
    if (this.verbose) {
      console.log(`${this.tag} inputs=${JSON.stringify(inputs)} current=${current}A`);
    }
    return { ok: true, current, line: String(current) };
  }

  // -------------------------------------------------------------------------
  // Per-connection loop: listening → parsing → … → responding → listening
  // -------------------------------------------------------------------------

  private handleConnection(socket: Socket): void {
    this.sockets.add(socket);
    socket.setEncoding("utf8");

    let pending = "";
    // Replies go out in request order even when a delay is configured.
    let chain: Promise<void> = Promise.resolve();

    socket.on("data", (chunk: string) => {
      const { lines, rest } = splitLines(pending + chunk);
      pending = rest;
      // Clients may send a bare command with no newline.
      if (KNOWN_COMMANDS.has(rest.trim())) {
        lines.push(rest);
        pending = "";
      }
      for (const line of lines) {
        if (line.trim() === "") continue;
        chain = chain.then(() => this.reply(socket, line));
      }
      if (pending.length > MAX_LINE_LENGTH) {
        console.warn(`${this.tag} dropped ${pending.length} unterminated bytes`);
        pending = "";
        chain = chain.then(() => this.send(socket, "ERROR line too long"));
      }
    });

    socket.on("error", (err) => {
      console.warn(`${this.tag} connection error: ${err.message}`);
    });

    socket.on("close", () => {
      this.sockets.delete(socket);
    });
  }

  private async reply(socket: Socket, command: string): Promise<void> {
    const reply = this.respond(command);
    if (!reply.ok) {
      console.warn(`${this.tag} rejected ${JSON.stringify(command)}`);
    }
    if (this.responseDelayMs > 0) await sleep(this.responseDelayMs);
    this.send(socket, reply.line);
  }

  private send(socket: Socket, line: string): void {
    if (socket.destroyed || !socket.writable) return;
    socket.write(`${line}\n`);
  }
}

// ---------------------------------------------------------------------------
// Fleet helpers
// ---------------------------------------------------------------------------

/** Per-device random source; a shared seed is offset so devices never share a sequence. */
export function randomFor(kind: DeviceKind, seed: number | undefined): RandomSource {
  return seed === undefined ? systemRandom() : seededRandom(seed + DEVICE_KINDS.indexOf(kind));
}

export interface EmulatorFleet {
  emulators: Map<DeviceKind, DeviceEmulator>;
  stop(): Promise<void>;
}

/**
 * Starts one emulator per kind. Each gets its own random source from
 * `randomFor`, so no state is shared between devices.
 */
export async function startEmulators(
  kinds: readonly DeviceKind[],
  opts: {
    host?: string;
    portFor?: (kind: DeviceKind) => number;
    randomFor?: (kind: DeviceKind) => RandomSource;
    verbose?: boolean;
  } = {}
): Promise<EmulatorFleet> {
  const emulators = new Map<DeviceKind, DeviceEmulator>();
  for (const kind of kinds) {
    emulators.set(
      kind,
      new DeviceEmulator(kind, {
        host: opts.host,
        port: opts.portFor?.(kind),
        random: opts.randomFor?.(kind),
        verbose: opts.verbose,
      })
    );
  }

  const started = await Promise.allSettled(
    Array.from(emulators.values()).map((emulator) => emulator.start())
  );
  const failed = started.find((r): r is PromiseRejectedResult => r.status === "rejected");

  const stop = async (): Promise<void> => {
    await Promise.all(Array.from(emulators.values()).map((emulator) => emulator.stop()));
  };

  if (failed) {
    await stop();
    throw failed.reason;
  }
  return { emulators, stop };
}
