import type { Client } from "../hub/client";
import type { Hub } from "../hub/hub";
import { createLogger } from "../lib/logger";
import { isClientMessage, type ServerMessage } from "./types";

const logger = createLogger("ws");

/** The part of a WebSocket a connection writes to. */
export interface FrameSocket {
  readonly readyState: number;
  send(data: string): void;
}

/**
 * One `/ws/stream` connection. Client messages become hub demands; the
 * client's frame queue is drained onto the socket by a single writer.
 */
export class StreamConnection {
  readonly client: Client;
  /** Settles when the writer has drained the client's queue. */
  readonly done: Promise<void>;

  constructor(
    private ws: FrameSocket,
    hub: Pick<Hub, "createClient">,
  ) {
    this.client = hub.createClient();
    this.done = this.drain();
  }

  get id(): string {
    return this.client.id;
  }

  /**
   * Handle one raw text message from the socket.
   */
  handleMessage(raw: string): void {
    if (this.client.closed) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      logger.warn(
        { err, clientId: this.id, raw: raw.slice(0, 500) },
        "failed to parse client message",
      );
      this.send({ type: "error", code: "PARSE_ERROR", message: "Invalid JSON" });
      return;
    }

    if (!isClientMessage(parsed)) {
      this.send({
        type: "error",
        code: "INVALID_MESSAGE",
        message: "Expected {type, cid, resource}",
      });
      return;
    }

    logger.debug(
      { clientId: this.id, type: parsed.type, cid: parsed.cid },
      "ws message",
    );
    if (parsed.type === "subscribe") {
      this.client.subscribe(parsed.resource, parsed.cid);
    } else {
      this.client.unsubscribe(parsed.resource, parsed.cid);
    }
  }

  send(message: ServerMessage): void {
    try {
      if (this.ws.readyState === 1) {
        this.ws.send(JSON.stringify(message));
      }
    } catch (err) {
      logger.error({ err, clientId: this.id }, "send error");
    }
  }

  /**
   * Leave the hub and stop the writer. Idempotent.
   */
  close(): void {
    if (this.client.closed) return;
    this.client.leave();
  }

  private async drain(): Promise<void> {
    for await (const frame of this.client.frames()) {
      this.send(frame);
    }
    logger.debug({ clientId: this.id }, "writer stopped");
  }
}
