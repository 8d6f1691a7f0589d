import { isResourceKind, type ResourceKind, type ResponseFrame } from "../hub/types";
import { isRecord } from "../lib/guards";

// ============================================================================
// Client -> Server
// ============================================================================

export interface ClientMessage {
  type: "subscribe" | "unsubscribe";
  cid: string;
  resource: ResourceKind;
}

// ============================================================================
// Server -> Client
// ============================================================================

export type ErrorCode = "PARSE_ERROR" | "INVALID_MESSAGE";

export type ServerMessage =
  | ResponseFrame
  | { type: "error"; code: ErrorCode; message: string };

export function isClientMessage(data: unknown): data is ClientMessage {
  if (!isRecord(data)) return false;
  return (
    (data.type === "subscribe" || data.type === "unsubscribe") &&
    typeof data.cid === "string" &&
    data.cid.length > 0 &&
    isResourceKind(data.resource)
  );
}
