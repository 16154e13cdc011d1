export * from "./report.types";
export {
  summarizeRun,
  hasFailures,
  formatActionLine,
  formatActionWarning,
  formatOutcomeLine,
  formatSelectionSummary,
  formatRunSummary,
} from "./reporter";
