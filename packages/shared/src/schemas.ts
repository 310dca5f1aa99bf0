/**
 * Zod schemas for closeflow data structures.
 *
 * Keys read from YAML are snake_case; the validated config is consumed as-is
 * by the CLI and mapped to core types at the registry boundary.
 */

import { z } from 'zod';
import { PERIOD_LIMITS } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * Step key: lowercase, digits, underscore or dash.
 */
const stepKey = z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'Must be lowercase letters, digits, "_" or "-"');

/**
 * Path template, e.g. "clean/{period}/R_Estoq_fdm_{period}.xlsx".
 */
const pathTemplate = z.string().min(1);

// ============================================================================
// Period
// ============================================================================

export const PeriodContextSchema = z.object({
    year: z.number().int().min(PERIOD_LIMITS.MIN_YEAR).max(PERIOD_LIMITS.MAX_YEAR),
    month: z.number().int().min(1).max(12),
});

export type PeriodContext = z.infer<typeof PeriodContextSchema>;

// ============================================================================
// Registry
// ============================================================================

/**
 * External executable of an automatic step.
 * `args` and `env` values are path templates too.
 */
export const StepRunSchema = z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    cwd: z.string().optional(),
    env: z.record(z.string(), z.string()).default({}),
});

export type StepRun = z.infer<typeof StepRunSchema>;

export const StepConfigSchema = z
    .object({
        key: stepKey,
        description: z.string().optional(),
        run: StepRunSchema.optional(),
        inputs: z.array(pathTemplate).min(1),
        outputs: z.array(pathTemplate).min(1),
        manual: z.boolean().default(false),
        optional: z.boolean().default(false),
        after: z.array(stepKey).default([]),
        instructions: z.string().optional(),
    })
    .superRefine((step, ctx) => {
        if (step.manual && step.run) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['run'],
                message: 'A manual step cannot declare an executable',
            });
        }
        if (!step.manual && !step.run) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['run'],
                message: 'An automatic step must declare an executable',
            });
        }
        if (step.manual && !step.instructions) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['instructions'],
                message: 'A manual step must carry operator instructions',
            });
        }
    });

export type StepConfig = z.infer<typeof StepConfigSchema>;

export const PipelineConfigSchema = z.object({
    name: z.string().min(1),
    storage_roots: z.array(z.string().min(1)).min(1),
    scripts_dir: z.string().default('.'),
    steps: z.array(StepConfigSchema).min(1),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

// ============================================================================
// Staleness & Run Report
// ============================================================================

export const StalenessDecisionSchema = z.enum(['STALE', 'FRESH', 'MISSING_INPUTS']);

export type StalenessDecision = z.infer<typeof StalenessDecisionSchema>;

export const FileStampSchema = z.object({
    path: z.string(),
    mtimeMs: z.number(),
});

export type FileStamp = z.infer<typeof FileStampSchema>;

export const StalenessVerdictSchema = z.object({
    key: stepKey,
    decision: StalenessDecisionSchema,
    reason: z.string(),
    newestInput: FileStampSchema.optional(),
    oldestOutput: FileStampSchema.optional(),
});

export type StalenessVerdict = z.infer<typeof StalenessVerdictSchema>;

export const StepStatusSchema = z.enum([
    'PENDING',
    'SKIPPED_OUT_OF_SCOPE',
    'SKIPPED_FRESH',
    'SKIPPED_OPTIONAL',
    'MISSING_INPUTS',
    'RUNNING',
    'SUCCEEDED',
    'FAILED',
    'AWAITING_MANUAL_CONFIRMATION',
]);

export type StepStatus = z.infer<typeof StepStatusSchema>;

export const RunOutcomeSchema = z.enum(['succeeded', 'failed', 'missing-inputs', 'awaiting-manual']);

export type RunOutcome = z.infer<typeof RunOutcomeSchema>;

export const RunIntentSchema = z.object({
    mode: z.enum(['full', 'step', 'start-from']),
    target: stepKey.optional(),
    force: z.boolean(),
});

export type RunIntent = z.infer<typeof RunIntentSchema>;

export const StepRecordSchema = z.object({
    key: stepKey,
    status: StepStatusSchema,
    decision: StalenessDecisionSchema.optional(),
    reason: z.string().optional(),
    exitCode: z.number().int().optional(),
    durationMs: z.number().min(0).optional(),
    warnings: z.array(z.string()),
});

export type StepRecord = z.infer<typeof StepRecordSchema>;

/**
 * Written by `run --report <file>`. Audit output only; never read back.
 */
export const RunReportSchema = z.object({
    period: PeriodContextSchema,
    storageRoot: z.string(),
    intent: RunIntentSchema,
    outcome: RunOutcomeSchema,
    haltedAt: stepKey.optional(),
    steps: z.array(StepRecordSchema),
    startedAt: z.string(),
    finishedAt: z.string(),
});

export type RunReport = z.infer<typeof RunReportSchema>;
