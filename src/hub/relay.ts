import type { Sample } from "../types.js";

// ---------------------------------------------------------------------------
// SSE client interface
// ---------------------------------------------------------------------------

export interface SSEClient {
  send: (data: string) => void;
  close: () => void;
}

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  "Connection": "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

/** `onBroken` runs once a write fails, typically to drop the client. */
export function createSSEStream(
  onBroken?: (client: SSEClient) => void
): { readable: ReadableStream<Uint8Array>; client: SSEClient } {
  const { readable, writable } = new TransformStream<Uint8Array, Uint8Array>();
  const writer = writable.getWriter();
  const encoder = new TextEncoder();
  const client: SSEClient = {
    send(data: string) {
      writer.write(encoder.encode(data)).catch((err: unknown) => {
        console.warn("[hub] SSE write failed:", err);
        onBroken?.(client);
      });
    },
    close() {
      writer.close().catch((err: unknown) => {
        console.warn("[hub] SSE close failed:", err);
      });
    },
  };
  return { readable, client };
}

// ---------------------------------------------------------------------------
// Sample relay — live samples of the running campaign
// ---------------------------------------------------------------------------

export class SampleRelay {
  readonly clients = new Set<SSEClient>();

  broadcast(event: string, data: unknown): void {
    if (this.clients.size === 0) return;
    const payload = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
    for (const client of this.clients) {
      client.send(payload);
    }
  }

  broadcastSample(runId: string, sample: Sample): void {
    this.broadcast("sample", { runId, ...sample });
  }
}
