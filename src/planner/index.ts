export * from "./planner.types";
export { planTag, planRepository, isMutating, countActions } from "./planner";
