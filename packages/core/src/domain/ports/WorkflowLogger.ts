/** Structured fields attached to a log line. */
export type LogFields = Record<string, unknown>;

/**
 * Leveled logger used by the workflow.
 *
 * The argument order matches pino, so a `pino.Logger<'notice'>` can be passed directly.
 */
export interface WorkflowLogger {
  info(fields: LogFields, message: string): void;
  notice(fields: LogFields, message: string): void;
  error(fields: LogFields, message: string): void;
}
