import type { StepRecord } from '@closeflow/shared';
import {
    MissingInputsError,
    StepExecutionError,
    decideAction,
    expandTemplate,
    nextStep,
    resolveScope,
    type StepDefinition,
} from '@closeflow/core';
import { evaluateStep } from './evaluate.js';
import { isMissingExecutable, spawnStep } from './invoke.js';
import type {
    Evaluation,
    Evaluator,
    InvocationResult,
    PipelineState,
    RunContext,
    RunnerDeps,
    StepExecutor,
} from './types.js';
import { arrow, describeError, fail, info, log, pause, success, warn } from '../utils/console.js';

type StepResult = 'continue' | 'halt';

function addWarning(state: PipelineState, record: StepRecord, message: string): void {
    record.warnings.push(message);
    state.warnings.push(message);
    warn(message);
}

function haltMissingInputs(state: PipelineState, step: StepDefinition, record: StepRecord): StepResult {
    const patterns = step.inputs.map(p => expandTemplate(p, state.period));
    const err = new MissingInputsError(step.key, patterns);
    record.status = 'MISSING_INPUTS';
    state.errors.push({ step: step.key, message: err.message, fatal: true, error: err });
    state.outcome = 'missing-inputs';
    fail(err.message);
    return 'halt';
}

function awaitManual(state: PipelineState, step: StepDefinition, record: StepRecord): StepResult {
    const resume = nextStep(state.dag, step.key);
    const instructions = expandTemplate(step.instructions ?? `Complete "${step.key}" by hand.`, state.period);

    record.status = 'AWAITING_MANUAL_CONFIRMATION';
    state.pause = { step: step.key, instructions, resumeFrom: resume?.key };
    state.outcome = 'awaiting-manual';

    pause(`Manual step "${step.key}" needs you:`);
    for (const line of instructions.split('\n')) {
        if (line.trim()) arrow(line.trim());
    }
    if (resume) {
        info(`When done, resume with: --start-from ${resume.key}`);
    } else {
        info('This is the last step; nothing to resume.');
    }
    return 'halt';
}

function failStep(state: PipelineState, record: StepRecord, err: StepExecutionError): StepResult {
    record.status = 'FAILED';
    state.errors.push({ step: err.step, message: err.message, fatal: true, error: err });
    state.outcome = 'failed';
    fail(err.message);
    return 'halt';
}

async function executeStep(
    state: PipelineState,
    step: StepDefinition,
    record: StepRecord,
    evaluation: Evaluation,
    evaluate: Evaluator,
    execute: StepExecutor
): Promise<StepResult> {
    record.status = 'RUNNING';
    arrow(`Running ${step.key}...`);

    let result: InvocationResult;
    try {
        result = await execute({
            step,
            period: state.period,
            storageRoot: state.storageRoot,
            scriptsDir: state.scriptsDir,
            inputs: evaluation.inputs.map(s => s.path),
            outputs: evaluation.expectedOutputs,
        });
    } catch (err) {
        if (step.optional && isMissingExecutable(err)) {
            record.status = 'SKIPPED_OPTIONAL';
            addWarning(state, record, `Optional step "${step.key}" skipped: executable "${step.run?.command}" not found`);
            return 'continue';
        }
        const cause = err instanceof StepExecutionError
            ? err
            : new StepExecutionError(step.key, null, `Step "${step.key}" could not start: ${describeError(err)}`);
        return failStep(state, record, cause);
    }

    record.durationMs = result.durationMs;
    if (result.exitCode !== null) record.exitCode = result.exitCode;

    if (result.exitCode !== 0) {
        const how = result.signal ? `was killed by ${result.signal}` : `exited with code ${result.exitCode}`;
        return failStep(state, record, new StepExecutionError(step.key, result.exitCode, `Step "${step.key}" ${how}`));
    }

    record.status = 'SUCCEEDED';
    success(`${step.key} completed in ${(result.durationMs / 1000).toFixed(1)}s`);

    // Outputs are only checked, never required: the next run judges them.
    const after = await evaluate(step, state.period, state.storageRoot);
    for (const missing of after.missingOutputs) {
        addWarning(state, record, `Step "${step.key}" finished but did not produce ${missing}`);
    }
    return 'continue';
}

/**
 * Walks the graph in declared order, judging each step just before acting on
 * it, so every mtime read happens after all earlier writers have finished.
 * Stops at the first failure, missing input or manual pause.
 */
export async function runPipeline(context: RunContext, deps: RunnerDeps = {}): Promise<PipelineState> {
    const evaluate = deps.evaluate ?? evaluateStep;
    const execute = deps.execute ?? spawnStep;
    const { dag, intent } = context;

    const state: PipelineState = {
        ...context,
        records: dag.steps.map((step): StepRecord => ({ key: step.key, status: 'PENDING', warnings: [] })),
        warnings: [],
        errors: [],
        outcome: 'succeeded',
    };

    const scopes = resolveScope(dag, intent);

    for (let i = 0; i < dag.steps.length; i++) {
        const step = dag.steps[i];
        const record = state.records[i];

        if (scopes.get(step.key) !== 'in-scope') {
            record.status = 'SKIPPED_OUT_OF_SCOPE';
            continue;
        }

        log(`\n→ Step ${i + 1}/${dag.steps.length}: ${step.key}${step.manual ? ' (manual)' : ''}`);

        const evaluation = await evaluate(step, state.period, state.storageRoot);
        const { verdict } = evaluation;
        record.decision = verdict.decision;
        record.reason = verdict.reason;

        const action = decideAction(step, verdict.decision, intent.force);
        let result: StepResult = 'continue';

        switch (action) {
            case 'skip-fresh':
                record.status = 'SKIPPED_FRESH';
                info(`Fresh: ${verdict.reason}`);
                break;
            case 'skip-optional':
                record.status = 'SKIPPED_OPTIONAL';
                addWarning(state, record, `Optional step "${step.key}" skipped: ${verdict.reason}`);
                break;
            case 'halt-missing-inputs':
                result = haltMissingInputs(state, step, record);
                break;
            case 'await-manual':
                result = awaitManual(state, step, record);
                break;
            case 'execute':
                info(intent.force && verdict.decision === 'FRESH' ? 'Forced run' : `Stale: ${verdict.reason}`);
                result = await executeStep(state, step, record, evaluation, evaluate, execute);
                break;
        }

        if (result === 'halt') {
            state.haltedAt = step.key;
            break;
        }
    }

    return state;
}
