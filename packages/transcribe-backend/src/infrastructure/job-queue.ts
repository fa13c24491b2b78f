// packages/transcribe-backend/src/infrastructure/job-queue.ts
// In-process job queue with a fixed pool of worker loops.
// - submit() never waits for a free worker.
// - Each loop runs one job at a time, to completion, before taking the next.
// - shutdown() stops intake and lets running jobs finish; waiting jobs stay queued.
import { QueueClosedError, type QueueStatsDto } from '@media-scribe/contracts';

import { createComponentLogger, type Logger } from './logger.js';

/**
 * Unbounded FIFO with awaitable take(). A waiting taker is handed the item
 * directly, so two takers can never receive the same item.
 */
export class AsyncWorkQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T | null) => void> = [];
  private closed = false;

  get length(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) throw new QueueClosedError();
    const taker = this.takers.shift();
    if (taker) {
      taker(item);
    } else {
      this.items.push(item);
    }
  }

  /** Resolves with the next item, or null once the queue is closed. */
  take(): Promise<T | null> {
    if (this.closed) return Promise.resolve(null);
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) return Promise.resolve(item);
    }
    return new Promise<T | null>((resolve) => {
      this.takers.push(resolve);
    });
  }

  /** Wake every waiting taker with null. Items still queued are left in place. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const taker of this.takers.splice(0)) taker(null);
  }

  pending(): T[] {
    return [...this.items];
  }
}

export type JobProcessor = (jobId: string, workerId: string) => Promise<unknown>;

export interface JobQueueOptions {
  concurrency: number;
  processor: JobProcessor;
  logger?: Logger;
}

export class JobQueue {
  private readonly queue = new AsyncWorkQueue<string>();
  private readonly concurrency: number;
  private readonly processor: JobProcessor;
  private readonly logger: Logger;
  private loops: Promise<void>[] = [];
  private active = 0;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: JobQueueOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer (got ${options.concurrency})`);
    }
    this.concurrency = options.concurrency;
    this.processor = options.processor;
    this.logger = createComponentLogger('job-queue', options.logger);
  }

  get accepting(): boolean {
    return this.shutdownPromise === null;
  }

  // submit.declaration()
  submit(jobId: string): void {
    if (this.shutdownPromise !== null || this.queue.isClosed) {
      throw new QueueClosedError();
    }
    this.queue.push(jobId);
    this.logger.debug('Job enqueued', { event: 'job_enqueued', jobId, queued: this.queue.length });
  }

  /** Launch the worker loops. Calling it again is a no-op. */
  start(): void {
    if (this.loops.length > 0) return;
    if (this.shutdownPromise !== null) {
      throw new QueueClosedError('Job queue cannot be restarted after shutdown');
    }

    for (let index = 1; index <= this.concurrency; index += 1) {
      this.loops.push(this.runLoop(`worker-${index}`));
    }
    this.logger.info('Worker pool started', {
      event: 'worker_pool_started',
      concurrency: this.concurrency,
    });
  }

  shutdown(): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;

    this.logger.info('Worker pool shutting down', {
      event: 'worker_pool_stopping',
      active: this.active,
      queued: this.queue.length,
    });
    this.queue.close();
    this.shutdownPromise = Promise.all(this.loops).then(() => {
      this.logger.info('Worker pool stopped', {
        event: 'worker_pool_stopped',
        leftQueued: this.queue.length,
      });
    });
    return this.shutdownPromise;
  }

  getStats(): QueueStatsDto {
    return {
      concurrency: this.concurrency,
      active: this.active,
      queued: this.queue.length,
      accepting: this.accepting,
    };
  }

  /** Job ids still waiting for a worker, oldest first. */
  pendingJobIds(): string[] {
    return this.queue.pending();
  }

  private async runLoop(workerId: string): Promise<void> {
    for (;;) {
      const jobId = await this.queue.take();
      if (jobId === null) return;

      this.active += 1;
      try {
        await this.processor(jobId, workerId);
      } catch (error) {
        this.logger.error(error instanceof Error ? error : String(error), {
          event: 'job_processor_crashed',
          jobId,
          workerId,
        });
      } finally {
        this.active -= 1;
      }
    }
  }
}
