/**
 * Logging provider interface.
 * Wraps external log sinks (Axiom, console, etc).
 */

/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** A structured log event. */
export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

export type OperationOutcome = 'ok' | 'rejected' | 'failed';

/** Emitted once per engine operation (ingest, edit, metrics). */
export interface OperationLogEvent extends LogEvent {
  /** Operation name, e.g. `ingest` or `updateProject`. */
  operation: string;
  /** `rejected` is an expected domain failure; `failed` is a fault. */
  outcome: OperationOutcome;
  durationMs: number;
  /** Error kind for rejected operations. */
  errorKind?: string;
  actor?: string;
}

export interface ILogProvider {
  /** Enqueue a structured log event for delivery. */
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}
