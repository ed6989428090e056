/**
 * Where queued runs execute: in this process (InlineJobRunner) or on
 * BullMQ workers (see lib/queue).
 */

import { errorMessage } from '@/lib/errors';

export interface JobRunner {
  readonly name: string;
  enqueue(documentId: string, run: number): Promise<void>;
  close(): Promise<void>;
}

export type RunFn = (documentId: string) => Promise<unknown>;

interface Pending {
  documentId: string;
  run: number;
}

/** Bounded in-process execution, used when Redis is not configured or not reachable. */
export class InlineJobRunner implements JobRunner {
  readonly name = 'inline';
  private readonly pending: Pending[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly runFn: RunFn,
    private readonly concurrency = 2
  ) {}

  async enqueue(documentId: string, run: number): Promise<void> {
    this.pending.push({ documentId, run });
    this.pump();
  }

  /** Resolves once nothing is queued or running. */
  async drain(): Promise<void> {
    if (this.active === 0 && this.pending.length === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  async close(): Promise<void> {
    this.pending.length = 0;
    await this.drain();
  }

  private pump(): void {
    while (this.active < Math.max(1, this.concurrency)) {
      const next = this.pending.shift();
      if (!next) break;
      this.active++;
      void this.execute(next);
    }
  }

  private async execute(item: Pending): Promise<void> {
    try {
      await this.runFn(item.documentId);
    } catch (error) {
      console.error(`[Runner] Run ${item.run} of ${item.documentId} crashed: ${errorMessage(error)}`);
    } finally {
      this.active--;
      this.pump();
      if (this.active === 0 && this.pending.length === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
      }
    }
  }
}
