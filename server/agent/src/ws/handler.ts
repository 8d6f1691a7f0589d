import type { UpgradeWebSocket } from "hono/ws";
import type { Hub } from "../hub/hub";
import { createLogger } from "../lib/logger";
import { type FrameSocket, StreamConnection } from "./connection";

const logger = createLogger("ws");

export interface StreamHandlerDeps {
  hub: Pick<Hub, "createClient">;
}

export function decodeMessage(data: unknown): string {
  if (typeof data === "string") return data;
  if (data instanceof ArrayBuffer) return new TextDecoder().decode(data);
  if (Buffer.isBuffer(data)) return data.toString();
  return "";
}

/**
 * Socket lifecycle for one `/ws/stream` connection: a hub client is created
 * on open and leaves the hub on close or error.
 */
export function streamEvents(deps: StreamHandlerDeps) {
  let connection: StreamConnection | null = null;

  return {
    onOpen(_evt: unknown, ws: FrameSocket) {
      connection = new StreamConnection(ws, deps.hub);
      logger.info({ clientId: connection.id }, "ws open");
    },

    onMessage(evt: { data: unknown }, _ws: FrameSocket) {
      connection?.handleMessage(decodeMessage(evt.data));
    },

    onClose() {
      if (!connection) return;
      logger.info(
        { clientId: connection.id, dropped: connection.client.dropped },
        "ws closed",
      );
      connection.close();
    },

    onError(evt: unknown) {
      logger.error({ clientId: connection?.id, error: String(evt) }, "ws error");
      connection?.close();
    },

    /** The live connection, null before open. */
    get connection(): StreamConnection | null {
      return connection;
    },
  };
}

/**
 * `GET /ws/stream`: one hub client per socket.
 */
export function createStreamHandler(
  upgradeWebSocket: UpgradeWebSocket,
  deps: StreamHandlerDeps,
) {
  return upgradeWebSocket(() => streamEvents(deps));
}
