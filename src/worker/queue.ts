import PQueue from "p-queue";

export type JobStatus = "pending" | "running";

/**
 * FIFO queue that runs one job at a time.
 *
 * Swaps share the executing party's custody and its venue authorization, so
 * two of them must never interleave.
 */
export interface ExecutionQueue {
  run: <T>(id: string, fn: () => Promise<T>) => Promise<T>;
  /** Status of a job still in the queue; `null` once it has finished. */
  getStatus: (id: string) => JobStatus | null;
  getPendingCount: () => number;
  /** Refuse new jobs and wait for the queued ones to finish. */
  close: () => Promise<void>;
  isClosed: () => boolean;
}

export class QueueClosedError extends Error {
  constructor(message = "Execution queue is closed") {
    super(message);
    this.name = "QueueClosedError";
  }
}

export const createExecutionQueue = (): ExecutionQueue => {
  const queue = new PQueue({ concurrency: 1 });
  const jobs = new Map<string, JobStatus>();
  let closed = false;

  const run = <T>(id: string, fn: () => Promise<T>): Promise<T> => {
    if (closed) {
      return Promise.reject(new QueueClosedError());
    }

    jobs.set(id, "pending");
    return queue.add(
      async () => {
        jobs.set(id, "running");
        try {
          return await fn();
        } finally {
          jobs.delete(id);
        }
      },
      { throwOnTimeout: true },
    );
  };

  const close = async (): Promise<void> => {
    closed = true;
    await queue.onIdle();
  };

  return {
    run,
    getStatus: (id) => jobs.get(id) ?? null,
    getPendingCount: () => queue.size + queue.pending,
    close,
    isClosed: () => closed,
  };
};
