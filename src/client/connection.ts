import { connect as netConnect } from "net";
import type { Socket } from "net";
import type { DeviceEndpoint } from "../types.js";
import { ConnectionError, TimeoutError } from "../errors.js";
import { splitLines } from "../lib/lines.js";

interface Waiter {
  resolve: (line: string) => void;
  reject: (err: Error) => void;
}

/**
 * Line-oriented handle on one device socket. One request may be in flight
 * at a time; replies are matched to requests by order.
 */
export class DeviceConnection {
  private pending = "";
  private readonly lines: string[] = [];
  private waiter: Waiter | null = null;
  private failure: ConnectionError | null = null;

  constructor(
    readonly endpoint: DeviceEndpoint,
    private readonly socket: Socket
  ) {
    socket.setEncoding("utf8");
    socket.on("data", (chunk: string) => {
      const { lines, rest } = splitLines(this.pending + chunk);
      this.pending = rest;
      this.lines.push(...lines);
      this.deliver();
    });
    socket.on("error", (err) => {
      this.fail(new ConnectionError(`${this.address}: ${err.message}`, { cause: err }));
    });
    socket.on("close", () => {
      this.fail(new ConnectionError(`${this.address}: connection closed`));
    });
  }

  get address(): string {
    return `${this.endpoint.host}:${this.endpoint.port}`;
  }

  get closed(): boolean {
    return this.failure !== null;
  }

  send(line: string): void {
    if (this.failure) throw this.failure;
    this.socket.write(`${line}\n`);
  }

  /** Next reply line; rejects with TimeoutError after `timeoutMs`. */
  nextLine(timeoutMs: number): Promise<string> {
    if (this.waiter) {
      return Promise.reject(new Error(`${this.address}: a request is already in flight`));
    }
    const ready = this.lines.shift();
    if (ready !== undefined) return Promise.resolve(ready);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new TimeoutError(`${this.address}: no reply within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiter = {
        resolve: (line) => {
          clearTimeout(timer);
          resolve(line);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
    });
  }

  close(): void {
    this.fail(new ConnectionError(`${this.address}: connection closed by client`));
    this.socket.destroy();
  }

  private deliver(): void {
    if (!this.waiter) return;
    const line = this.lines.shift();
    if (line === undefined) return;
    const waiter = this.waiter;
    this.waiter = null;
    waiter.resolve(line);
  }

  private fail(err: ConnectionError): void {
    if (this.failure) return;
    this.failure = err;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.reject(err);
  }
}

/** Opens a socket to the endpoint; ConnectionError on refusal or timeout. */
export function connect(endpoint: DeviceEndpoint, timeoutMs: number): Promise<DeviceConnection> {
  const address = `${endpoint.host}:${endpoint.port}`;
  return new Promise((resolve, reject) => {
    const socket = netConnect({ host: endpoint.host, port: endpoint.port });

    const timer = setTimeout(() => {
      socket.off("error", onError);
      socket.destroy();
      reject(new ConnectionError(`${address}: connect timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onError = (err: Error) => {
      clearTimeout(timer);
      socket.destroy();
      reject(new ConnectionError(`${address}: ${err.message}`, { cause: err }));
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearTimeout(timer);
      socket.off("error", onError);
      resolve(new DeviceConnection(endpoint, socket));
    });
  });
}
