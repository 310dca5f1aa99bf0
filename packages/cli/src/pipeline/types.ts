import type {
    FileStamp,
    PeriodContext,
    RunIntent,
    RunOutcome,
    StalenessVerdict,
    StepRecord,
} from '@closeflow/shared';
import type { Dag, StepDefinition } from '@closeflow/core';

/**
 * Result of resolving and judging one step against the filesystem.
 */
export interface Evaluation {
    verdict: StalenessVerdict;
    inputs: FileStamp[];
    outputs: FileStamp[];
    /** Output templates, expanded and absolute, whether they exist or not */
    expectedOutputs: string[];
    /** Output templates (expanded, relative as declared) that resolved to nothing */
    missingOutputs: string[];
}

export type Evaluator = (step: StepDefinition, period: PeriodContext, root: string) => Promise<Evaluation>;

export interface InvocationContext {
    step: StepDefinition;
    period: PeriodContext;
    storageRoot: string;
    scriptsDir: string;
    inputs: string[];
    outputs: string[];
}

export interface InvocationResult {
    /** null when the process was killed by a signal */
    exitCode: number | null;
    signal: NodeJS.Signals | null;
    durationMs: number;
}

export type StepExecutor = (context: InvocationContext) => Promise<InvocationResult>;

export interface RunContext {
    dag: Dag;
    period: PeriodContext;
    storageRoot: string;
    scriptsDir: string;
    intent: RunIntent;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

export interface ManualPause {
    step: string;
    instructions: string;
    /** Step to pass to --start-from once the operator is done */
    resumeFrom?: string;
}

/**
 * Central state object accumulated while the orchestrator walks the graph.
 */
export interface PipelineState extends RunContext {
    records: StepRecord[];
    warnings: string[];
    errors: PipelineError[];
    outcome: RunOutcome;
    haltedAt?: string;
    pause?: ManualPause;
}

export interface RunnerDeps {
    evaluate?: Evaluator;
    execute?: StepExecutor;
}
