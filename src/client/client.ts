import type { DeviceEndpoint, DeviceKind } from "../types.js";
import { ParseError, ProtocolError, TimeoutError, isTransient } from "../errors.js";
import { AMMETER_MODELS } from "../emulator/models.js";
import { sleep as defaultSleep } from "../lib/lines.js";
import { connect } from "./connection.js";
import type { DeviceConnection } from "./connection.js";

const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

// Float noise at the edges of a model's range is not a protocol fault.
const RANGE_TOLERANCE = 1e-9;

/**
 * Sends one command and returns the raw reply. A timed-out connection is
 * closed, since a late reply would be paired with the next request.
 */
export async function request(
  connection: DeviceConnection,
  command: string,
  timeoutMs: number
): Promise<string> {
  connection.send(command);
  let line: string;
  try {
    line = await connection.nextLine(timeoutMs);
  } catch (err) {
    if (err instanceof TimeoutError) connection.close();
    throw err;
  }

  const reply = line.trim();
  const kind = connection.endpoint.kind;
  if (reply === "") {
    throw new ProtocolError(`${kind}: empty reply`);
  }
  if (reply.startsWith("ERROR")) {
    throw new ProtocolError(`${kind}: device rejected command: ${reply}`);
  }
  if (/\s/.test(reply)) {
    throw new ProtocolError(`${kind}: unexpected reply ${JSON.stringify(reply)}`);
  }
  return reply;
}

export function parseSample(raw: string, kind: DeviceKind): number {
  const text = raw.trim();
  if (!NUMBER_PATTERN.test(text)) {
    throw new ParseError(`${kind}: not a number: ${JSON.stringify(text)}`);
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw new ParseError(`${kind}: not finite: ${JSON.stringify(text)}`);
  }
  const { min, max } = AMMETER_MODELS[kind].plausibleRange;
  const slack = Math.max(Math.abs(min), Math.abs(max)) * RANGE_TOLERANCE;
  if (value < min - slack || value > max + slack) {
    throw new ParseError(`${kind}: ${value}A outside plausible range [${min}, ${max}]`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// MeasurementClient — connect → request → parse, with retry on transients
// ---------------------------------------------------------------------------

export interface ClientOptions {
  timeoutMs?: number;
  maxRetries?: number;
  backoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface Sampler {
  measure(): Promise<number>;
  close(): void;
}

export class MeasurementClient implements Sampler {
  private connection: DeviceConnection | null = null;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly backoffMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly tag: string;

  constructor(readonly endpoint: DeviceEndpoint, opts: ClientOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 2000;
    this.maxRetries = opts.maxRetries ?? 2;
    this.backoffMs = opts.backoffMs ?? 100;
    this.sleep = opts.sleep ?? ((ms) => defaultSleep(ms));
    this.tag = `[client:${endpoint.kind}]`;
  }

  async measure(): Promise<number> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt();
      } catch (err) {
        if (!isTransient(err)) throw err;
        this.dropConnection();
        if (attempt >= this.maxRetries) throw err;
        const delay = this.backoffMs * 2 ** attempt;
        console.warn(
          `${this.tag} ${err.message}; retry ${attempt + 1}/${this.maxRetries} in ${delay}ms`
        );
        await this.sleep(delay);
      }
    }
  }

  close(): void {
    this.dropConnection();
  }

  private async attempt(): Promise<number> {
    if (!this.connection || this.connection.closed) {
      this.connection = await connect(this.endpoint, this.timeoutMs);
    }
    const raw = await request(this.connection, this.endpoint.command, this.timeoutMs);
    return parseSample(raw, this.endpoint.kind);
  }

  private dropConnection(): void {
    if (this.connection && !this.connection.closed) this.connection.close();
    this.connection = null;
  }
}
