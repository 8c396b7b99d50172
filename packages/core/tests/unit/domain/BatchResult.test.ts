import { describe, it, expect } from 'vitest';
import { emptyBatchResult, isCleanBatch, isCleanRun } from '../../../src/domain/model/BatchResult.js';
import { correlationSuffix } from '../../../src/domain/model/RunContext.js';

describe('BatchResult helpers', () => {
  it('should start every counter at zero', () => {
    expect(emptyBatchResult(7)).toEqual({ retrieved: 0, saved: 0, skipped: 0, failed: 0, malformed: 0, queued: 7 });
  });

  it('should treat skipped and malformed items as clean', () => {
    expect(isCleanBatch({ retrieved: 3, saved: 1, skipped: 1, failed: 0, malformed: 1, queued: 3 })).toBe(true);
  });

  it('should report a run with one failed item as not clean', () => {
    const summary = {
      jobId: 'job-1',
      results: [
        {
          queueName: 'signatures_pending_validation_queue',
          table: 'signatures_pending_validation' as const,
          result: emptyBatchResult(),
        },
        {
          queueName: 'validations_queue',
          table: 'validations' as const,
          result: { retrieved: 1, saved: 0, skipped: 0, failed: 1, malformed: 0, queued: 1 },
        },
      ],
    };

    expect(isCleanRun(summary)).toBe(false);
  });
});

describe('correlationSuffix', () => {
  it('should name job, server and worker', () => {
    expect(correlationSuffix({ jobId: 'job-1', serverName: 'web-1', workerName: 'worker-2' })).toBe(
      'Job: job-1, Server: web-1, Worker: worker-2',
    );
  });

  it('should fall back to n/a for missing names', () => {
    expect(correlationSuffix({ jobId: 'job-1' })).toBe('Job: job-1, Server: n/a, Worker: n/a');
  });
});
