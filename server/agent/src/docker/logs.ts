export type LogStream = "stdout" | "stderr";

export interface LogEntry {
  stream: LogStream;
  /** RFC 3339 timestamp added by the engine, empty when absent. */
  timestamp: string;
  message: string;
}

const ENGINE_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T[\d:.]+(Z|[+-]\d{2}:\d{2})$/;

/**
 * Split a `timestamps: true` log line into its timestamp and message.
 */
export function parseLogLine(line: string, stream: LogStream): LogEntry {
  const space = line.indexOf(" ");
  if (space > 0) {
    const head = line.slice(0, space);
    if (ENGINE_TIMESTAMP.test(head)) {
      return { stream, timestamp: head, message: line.slice(space + 1) };
    }
  }
  return { stream, timestamp: "", message: line };
}
