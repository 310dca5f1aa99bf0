import { mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { vi } from 'vitest';
import type { StalenessDecision, StepConfig } from '@closeflow/shared';
import type { Evaluator, StepExecutor } from '../src/pipeline/types.js';

export function makeTempDir(): string {
    return mkdtempSync(join(tmpdir(), 'closeflow-'));
}

export function removeDir(dir: string): void {
    rmSync(dir, { recursive: true, force: true });
}

/**
 * Writes a file under root with the given mtime, in seconds since the epoch.
 */
export function touch(root: string, relative: string, mtime: number): string {
    const path = join(root, relative);
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, relative);
    utimesSync(path, mtime, mtime);
    return path;
}

export function silenceConsole(): void {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
}

export function stepConfig(key: string, overrides: Partial<StepConfig> = {}): StepConfig {
    return {
        key,
        run: { command: 'true', args: [], env: {} },
        inputs: [`in/${key}.txt`],
        outputs: [`out/${key}.txt`],
        manual: false,
        optional: false,
        after: [],
        ...overrides,
    };
}

/**
 * Monthly close: two creation branches converging on the entries update,
 * then inventory, a manual review and the report.
 */
export function closingSteps(): StepConfig[] {
    return [
        stepConfig('step1_nfi'),
        stepConfig('step1_nf', { optional: true }),
        stepConfig('step2_nf_agg', { after: ['step1_nf'] }),
        stepConfig('step2_nfi_agg', { after: ['step1_nfi'] }),
        stepConfig('step3_update_entradas', { after: ['step2_nf_agg', 'step2_nfi_agg'] }),
        stepConfig('step4_inventory', { after: ['step3_update_entradas'] }),
        stepConfig('step4b_review_inventory', {
            after: ['step4_inventory'],
            manual: true,
            run: undefined,
            instructions: 'Open the {period} inventory workbook.\nSave and close it.',
        }),
        stepConfig('step5_report', { after: ['step4b_review_inventory'] }),
    ];
}

/**
 * Evaluator answering from a table (FRESH by default) and recording every call.
 * `missingAfter` feeds the outputs reported as missing.
 */
export function stubEvaluator(
    decisions: Record<string, StalenessDecision> = {},
    missingAfter: Record<string, string[]> = {}
): { evaluate: Evaluator; calls: string[] } {
    const calls: string[] = [];
    const evaluate: Evaluator = async (step) => {
        calls.push(step.key);
        return {
            verdict: { key: step.key, decision: decisions[step.key] ?? 'FRESH', reason: 'test' },
            inputs: [],
            outputs: [],
            expectedOutputs: [],
            missingOutputs: missingAfter[step.key] ?? [],
        };
    };
    return { evaluate, calls };
}

/**
 * Executor exiting with the tabled code (0 by default) and recording every call.
 */
export function stubExecutor(exitCodes: Record<string, number> = {}): { execute: StepExecutor; calls: string[] } {
    const calls: string[] = [];
    const execute: StepExecutor = async ({ step }) => {
        calls.push(step.key);
        return { exitCode: exitCodes[step.key] ?? 0, signal: null, durationMs: 5 };
    };
    return { execute, calls };
}

/**
 * Executor that writes every declared output, stamping each write with the
 * next tick of a fake clock so mtimes always move forward.
 */
export function writingExecutor(startAt: number): { execute: StepExecutor; calls: string[]; now: () => number } {
    let clock = startAt;
    const calls: string[] = [];
    const execute: StepExecutor = async ({ step, outputs }) => {
        calls.push(step.key);
        clock += 10;
        for (const output of outputs) {
            mkdirSync(dirname(output), { recursive: true });
            writeFileSync(output, step.key);
            utimesSync(output, clock, clock);
        }
        return { exitCode: 0, signal: null, durationMs: 1 };
    };
    return { execute, calls, now: () => clock };
}

export function enoent(message: string): Error {
    return Object.assign(new Error(message), { code: 'ENOENT' });
}

export function everyStep(decision: StalenessDecision): Record<string, StalenessDecision> {
    const decisions: Record<string, StalenessDecision> = {};
    for (const step of closingSteps()) decisions[step.key] = decision;
    return decisions;
}
