export { evaluateTrigger, hasProjectRole, isEmptyExternalKey, shouldFire } from "./evaluator";
export type { SkipReason, TriggerDecision } from "./types";
