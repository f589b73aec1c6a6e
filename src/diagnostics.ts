/**
 * Diagnostic messages in `<stream>:<line>:<column>: error: <message>` form,
 * and a pluggable logger to report them.
 */

import { JsonParseError, type JsonReadError } from './errors.js';

export interface LogEntry {
  timestamp: number;
  level: 'info' | 'warn' | 'error' | 'debug';
  event: string;
  message: string;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

/** Writes to stderr; info and debug go to stdout. */
export const consoleLogger: Logger = (entry) => {
  const write = entry.level === 'error' || entry.level === 'warn' ? console.error : console.log;
  write(entry.message);
};

export function formatDiagnostic(error: JsonReadError): string {
  if (error instanceof JsonParseError) return error.toString();
  return `${error.streamName}: error: ${error.message}`;
}

/** Log a read error as a single diagnostic line. */
export function reportError(error: JsonReadError, logger: Logger = consoleLogger): void {
  const data: Record<string, unknown> =
    error instanceof JsonParseError
      ? { kind: error.kind, ...error.context }
      : { kind: 'stream_error', streamName: error.streamName };
  logger({
    timestamp: Date.now(),
    level: 'error',
    event: 'json:read-error',
    message: formatDiagnostic(error),
    data,
  });
}
