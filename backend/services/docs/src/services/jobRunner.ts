// backend/services/docs/src/services/jobRunner.ts
import type { Logger } from "pino";

export type Job = () => Promise<void>;

/**
 * In-process background jobs. A job starts after the current tick so the
 * request that scheduled it can respond first. Failures are logged, never
 * rethrown.
 */
export class JobRunner {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly log: Pick<Logger, "debug" | "error">) {}

  get pending(): number {
    return this.inFlight.size;
  }

  schedule(name: string, job: Job): void {
    const run = new Promise<void>((resolve) => setImmediate(resolve))
      .then(job)
      .then(
        () => this.log.debug({ job: name }, "job done"),
        (err: unknown) => this.log.error({ job: name, err }, "job failed")
      )
      .finally(() => this.inFlight.delete(run));
    this.inFlight.add(run);
  }

  /** Resolves once every scheduled job (including ones scheduled meanwhile) settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
