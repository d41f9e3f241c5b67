import { errorMessage, logError } from "../observability/logger.js";

type Job = {
  label: string;
  run: () => Promise<void>;
};

/**
 * Bounded in-process runner for lifecycle workflows. Jobs are expected to
 * record their own failures; anything that still escapes is logged here.
 */
export class WorkflowQueue {
  private readonly pending: Job[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Workflow concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  enqueue(label: string, run: () => Promise<void>): void {
    this.pending.push({ label, run });
    this.drain();
  }

  get size(): number {
    return this.pending.length + this.running;
  }

  /** Resolves once nothing is queued or running. */
  onIdle(): Promise<void> {
    if (this.size === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.running < this.concurrency && this.pending.length > 0) {
      const job = this.pending.shift();
      if (!job) break;
      this.running += 1;
      void this.execute(job);
    }
    if (this.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async execute(job: Job): Promise<void> {
    try {
      await job.run();
    } catch (error) {
      logError("workflow job escaped its handler", { data: { job: job.label, error: errorMessage(error) } });
    } finally {
      this.running -= 1;
      this.drain();
    }
  }
}
