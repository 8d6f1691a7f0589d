/**
 * Errors raised by the inventory and the persistence sink. Both carry the
 * failing operation and the underlying engine/driver error as `cause`, so
 * callers that only log them keep the full chain.
 */

export type InventoryOperation = "init" | "add" | "stop" | "remove";

export class InventoryError extends Error {
  constructor(
    message: string,
    public readonly operation: InventoryOperation,
    public readonly containerId?: string,
    options?: { cause?: unknown },
  ) {
    const scope = containerId
      ? `[Op: ${operation}] [Container: ${containerId}]`
      : `[Op: ${operation}]`;
    super(`${scope} ${message}`, options);
    this.name = "InventoryError";
  }
}

export class SinkWriteError extends Error {
  constructor(
    message: string,
    public readonly itemCount: number,
    options?: { cause?: unknown },
  ) {
    super(`[Sink] [Items: ${itemCount}] ${message}`, options);
    this.name = "SinkWriteError";
  }
}

/**
 * Docker engine responses carry the HTTP status on `statusCode`.
 */
export function isNotFound(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "statusCode" in err &&
    err.statusCode === 404
  );
}
