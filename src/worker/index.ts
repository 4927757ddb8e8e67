export { startWorker } from "./start-worker";
export type { StartWorkerConfig, WorkerHandle } from "./start-worker";
export { QueueClosedError, createExecutionQueue } from "./queue";
export type { ExecutionQueue, JobStatus } from "./queue";
export * from "./execution";
