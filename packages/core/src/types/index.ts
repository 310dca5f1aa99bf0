/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@closeflow/shared';
