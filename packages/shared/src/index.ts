// Schemas
export {
    PeriodContextSchema,
    StepRunSchema,
    StepConfigSchema,
    PipelineConfigSchema,
    StalenessDecisionSchema,
    FileStampSchema,
    StalenessVerdictSchema,
    StepStatusSchema,
    RunOutcomeSchema,
    RunIntentSchema,
    StepRecordSchema,
    RunReportSchema,
} from './schemas.js';

// Types
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
} from './schemas.js';

// Constants
export {
    MONTH_NAMES,
    EXIT_CODES,
    WORKSPACE_CONFIG_FILENAME,
    ENV_PREFIX,
    PERIOD_LIMITS,
} from './constants.js';

export type { ExitCode } from './constants.js';
