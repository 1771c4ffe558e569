export { KeyedWorkerPool } from "./keyed-worker-pool.js";
export type { KeyedWorkerPoolConfig, ShutdownReport } from "./keyed-worker-pool.js";
