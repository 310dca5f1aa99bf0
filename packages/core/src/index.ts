// Types (re-exported from shared)
export type {
    PeriodContext,
    StepRun,
    StepConfig,
    PipelineConfig,
    StalenessDecision,
    FileStamp,
    StalenessVerdict,
    StepStatus,
    RunOutcome,
    RunIntent,
    StepRecord,
    RunReport,
} from './types/index.js';

// Errors
export { ConfigurationError, MissingInputsError, StepExecutionError } from './errors.js';
export type { ConfigurationErrorCode } from './errors.js';

// Period
export {
    PERIOD_TOKENS,
    isPeriodToken,
    createPeriod,
    previousPeriod,
    periodTag,
    formatPeriod,
    periodTokens,
} from './period/index.js';
export type { PeriodToken } from './period/index.js';

// Paths
export {
    expandTemplate,
    validateTemplate,
    templateTokens,
    hasWildcard,
    compileWildcard,
    matchesWildcard,
    isIgnoredEntry,
} from './paths/index.js';

// Graph
export { buildDag, findStep, getStep, predecessors, successors, ancestors, nextStep } from './graph/index.js';
export type { StepDefinition, DagEdge, Dag } from './graph/index.js';

// Staleness
export { decideStaleness, newestStamp, oldestStamp } from './staleness/index.js';
export type { StalenessInput } from './staleness/index.js';

// Plan
export {
    createIntent,
    resolveScope,
    describeIntent,
    decideAction,
    isHaltingAction,
    buildRunPlan,
} from './plan/index.js';
export type { StepScope, IntentOptions, PlannedAction, StepAction, PlanEntry, RunPlan } from './plan/index.js';
