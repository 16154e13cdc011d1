/**
 * Sync module
 *
 * Drives a full run from repository listing to summary.
 */

export * from "./sync.types";
export { runSync, mapWithWorkers } from "./sync";
