import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { EXIT_CODES, RunReportSchema, type ExitCode, type RunOutcome, type RunReport } from '@closeflow/shared';
import { describeIntent, formatPeriod, type PlannedAction, type RunPlan } from '@closeflow/core';
import type { PipelineState } from './types.js';
import { arrow, log, success, warn, fail, pause } from '../utils/console.js';

export function exitCodeFor(outcome: RunOutcome): ExitCode {
    switch (outcome) {
        case 'succeeded':
            return EXIT_CODES.SUCCESS;
        case 'failed':
            return EXIT_CODES.STEP_FAILED;
        case 'missing-inputs':
            return EXIT_CODES.MISSING_INPUTS;
        case 'awaiting-manual':
            return EXIT_CODES.AWAITING_MANUAL;
    }
}

export function toRunReport(state: PipelineState, startedAt: Date, finishedAt: Date): RunReport {
    return RunReportSchema.parse({
        period: state.period,
        storageRoot: state.storageRoot,
        intent: state.intent,
        outcome: state.outcome,
        haltedAt: state.haltedAt,
        steps: state.records,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
    });
}

export async function writeReport(path: string, report: RunReport): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(report, null, 2));
}

/**
 * Counts of planned (in-scope), executed, skipped and untouched steps after a run.
 */
export function summarize(state: PipelineState): { planned: number; executed: number; skipped: number; notRun: number } {
    let planned = 0;
    let executed = 0;
    let skipped = 0;
    let notRun = 0;
    for (const record of state.records) {
        if (record.status === 'SKIPPED_OUT_OF_SCOPE') continue;
        planned++;
        switch (record.status) {
            case 'SUCCEEDED':
            case 'FAILED':
            case 'RUNNING':
                executed++;
                break;
            case 'SKIPPED_FRESH':
            case 'SKIPPED_OPTIONAL':
                skipped++;
                break;
            default:
                notRun++;
        }
    }
    return { planned, executed, skipped, notRun };
}

export function printSummary(state: PipelineState): void {
    log(`\n--- Run Summary (${formatPeriod(state.period)}, ${describeIntent(state.intent)}) ---`);

    const width = Math.max(...state.records.map(r => r.key.length));
    for (const record of state.records) {
        const reason = record.reason ? `  ${record.reason}` : '';
        log(`  ${record.key.padEnd(width)}  ${record.status}${reason}`);
    }

    const { planned, executed, skipped, notRun } = summarize(state);
    log('');
    arrow(`Planned: ${planned}, executed: ${executed}, skipped: ${skipped}, not run: ${notRun}`);

    for (const w of state.warnings) {
        warn(w);
    }

    switch (state.outcome) {
        case 'succeeded':
            success(`Pipeline complete for ${formatPeriod(state.period)}.`);
            break;
        case 'awaiting-manual':
            pause(`Paused at manual step "${state.pause?.step ?? state.haltedAt}".`);
            if (state.pause?.resumeFrom) {
                arrow(
                    `Resume: closeflow run --year ${state.period.year} --month ${state.period.month} ` +
                        `--start-from ${state.pause.resumeFrom}`
                );
            }
            break;
        default:
            for (const e of state.errors) {
                fail(`ERROR [${e.step}]: ${e.message}`);
            }
            log(`\n✖ Pipeline stopped at "${state.haltedAt}".`);
    }
}

const ACTION_LABELS: Record<PlannedAction, string> = {
    'execute': 'run',
    'skip-fresh': 'skip (fresh)',
    'skip-optional': 'skip (optional, no inputs)',
    'await-manual': 'await manual step',
    'halt-missing-inputs': 'halt (missing inputs)',
    'out-of-scope': 'out of scope',
    'not-reached': 'not reached',
};

export function printPlan(plan: RunPlan): void {
    log(`\n--- Run Plan (${describeIntent(plan.intent)}) ---`);
    const width = Math.max(...plan.entries.map(e => e.step.key.length));
    for (const entry of plan.entries) {
        const label = ACTION_LABELS[entry.action] + (entry.provisional ? ' (after upstream)' : '');
        const reason = entry.verdict && entry.action !== 'not-reached' ? `  ${entry.verdict.reason}` : '';
        log(`  ${entry.step.key.padEnd(width)}  ${label}${reason}`);
    }
    const planned = plan.entries.filter(e => e.willExecute).length;
    log('');
    arrow(`${planned} step(s) would run.`);
    log('\n[DRY RUN] Nothing was executed.');
}
