export { createIntent, resolveScope, describeIntent } from './scope.js';
export type { StepScope, IntentOptions } from './scope.js';
export { decideAction, isHaltingAction, buildRunPlan } from './plan.js';
export type { PlannedAction, StepAction, PlanEntry, RunPlan } from './plan.js';
