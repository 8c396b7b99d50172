/** Identifies one workflow invocation in logs and events. */
export interface RunContext {
  readonly jobId: string;
  readonly serverName?: string;
  readonly workerName?: string;
}

/** Suffix appended to every log message so lines from different workers can be told apart. */
export function correlationSuffix(ctx: RunContext): string {
  return `Job: ${ctx.jobId}, Server: ${ctx.serverName ?? 'n/a'}, Worker: ${ctx.workerName ?? 'n/a'}`;
}
