export * from "./executor.types";
export { SyncExecutor } from "./executor";
export { RunContext, defaultSleep, type RunContextOptions } from "./run-context";
export { Semaphore } from "./semaphore";
export { Throttle } from "./throttle";
