import { logger } from '../logger.js';
import { fail, type RemoteResult } from './result.js';

interface QueuedJob {
  start: () => void;
  abandoned: boolean;
}

export interface WorkerPoolOptions {
  concurrency: number;
  timeoutMs: number;
}

/**
 * Bounded pool for slow remote calls. At most `concurrency` jobs run at once;
 * the rest wait in FIFO order. Each job gets `timeoutMs` from submission:
 * past that the caller receives a timeout result and the job is abandoned.
 * A job abandoned while queued never starts; one abandoned mid-flight keeps
 * its slot until it settles on its own.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private active = 0;
  private readonly queue: QueuedJob[] = [];

  constructor(options: WorkerPoolOptions) {
    this.concurrency = Number.isFinite(options.concurrency)
      ? Math.max(1, Math.floor(options.concurrency))
      : 1;
    this.timeoutMs = options.timeoutMs;
  }

  get running(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.filter((job) => !job.abandoned).length;
  }

  run<T>(fn: () => Promise<RemoteResult<T>>): Promise<RemoteResult<T>> {
    return new Promise<RemoteResult<T>>((resolve) => {
      let settled = false;
      const finish = (result: RemoteResult<T>) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const job: QueuedJob = {
        abandoned: false,
        start: () => {
          this.active++;
          fn()
            .then(finish, (err: unknown) => {
              finish(fail('network', err instanceof Error ? err.message : String(err)));
            })
            .finally(() => {
              this.active--;
              this.drain();
            });
        },
      };

      const timer = setTimeout(() => {
        job.abandoned = true;
        logger.warn({ timeoutMs: this.timeoutMs }, 'Remote call timed out, abandoning');
        finish(fail('timeout', `Timed out after ${this.timeoutMs}ms`));
      }, this.timeoutMs);

      this.queue.push(job);
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next || next.abandoned) continue;
      next.start();
    }
  }
}
