/**
 * Operation logging.
 * Wraps every engine operation and emits one event with its name, outcome,
 * duration and actor to the configured ILogProvider (Axiom, console, etc).
 *
 * Level mapping:
 *   ok       → info
 *   rejected → warn   (expected domain failure, returned as a Result)
 *   failed   → error  (fault, re-thrown)
 */

import type { ILogProvider, LogLevel, OperationLogEvent, OperationOutcome } from '../providers/ILogProvider.js';
import type { Result } from '../types/api.js';

const LEVEL_FOR_OUTCOME: Record<OperationOutcome, LogLevel> = {
  ok: 'info',
  rejected: 'warn',
  failed: 'error',
};

export interface OperationInfo {
  operation: string;
  actor?: string;
  /** Extra structured fields, e.g. the snapshot date being ingested. */
  fields?: Record<string, unknown>;
}

export type OperationRunner = <T>(info: OperationInfo, run: () => Promise<Result<T>>) => Promise<Result<T>>;

export function createOperationLogger(logProvider: ILogProvider): OperationRunner {
  return async (info, run) => {
    const start = performance.now();

    try {
      const result = await run();
      const durationMs = Math.round(performance.now() - start);
      const outcome: OperationOutcome = result.ok ? 'ok' : 'rejected';

      const event: OperationLogEvent = {
        level: LEVEL_FOR_OUTCOME[outcome],
        message: result.ok
          ? `${info.operation} → ok (${durationMs}ms)`
          : `${info.operation} → ${result.error.kind} (${durationMs}ms)`,
        operation: info.operation,
        outcome,
        durationMs,
        ...(info.actor && { actor: info.actor }),
        ...(!result.ok && { errorKind: result.error.kind }),
        fields: {
          ...info.fields,
          ...(!result.ok && { error: result.error.message, detail: result.error.detail }),
        },
      };

      logProvider.log(event);
      return result;
    } catch (err) {
      const durationMs = Math.round(performance.now() - start);

      const event: OperationLogEvent = {
        level: LEVEL_FOR_OUTCOME.failed,
        message: `${info.operation} → failed (${durationMs}ms)`,
        operation: info.operation,
        outcome: 'failed',
        durationMs,
        ...(info.actor && { actor: info.actor }),
        fields: {
          ...info.fields,
          error: err instanceof Error ? err.message : String(err),
        },
      };

      logProvider.log(event);
      throw err;
    }
  };
}
