export { TaskQueue } from "./taskQueue";
export { WorkerPool } from "./workerPool";
export type { WorkerPoolDeps } from "./workerPool";
