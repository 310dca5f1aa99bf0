/**
 * Staleness decision on resolved file stamps.
 *
 * Rule: a step is stale when its newest input is strictly newer than its
 * oldest output. Equal timestamps count as fresh, so copies that preserve
 * mtimes do not trigger re-runs.
 */

import type { FileStamp, StalenessVerdict } from '@closeflow/shared';

export interface StalenessInput {
    key: string;
    inputs: readonly FileStamp[];
    outputs: readonly FileStamp[];
    /** Output patterns that resolved to nothing */
    missingOutputs: readonly string[];
}

function describe(stamp: FileStamp): string {
    return `${stamp.path} (${new Date(stamp.mtimeMs).toISOString()})`;
}

export function newestStamp(stamps: readonly FileStamp[]): FileStamp | undefined {
    let newest: FileStamp | undefined;
    for (const stamp of stamps) {
        if (!newest || stamp.mtimeMs > newest.mtimeMs) newest = stamp;
    }
    return newest;
}

export function oldestStamp(stamps: readonly FileStamp[]): FileStamp | undefined {
    let oldest: FileStamp | undefined;
    for (const stamp of stamps) {
        if (!oldest || stamp.mtimeMs < oldest.mtimeMs) oldest = stamp;
    }
    return oldest;
}

export function decideStaleness({ key, inputs, outputs, missingOutputs }: StalenessInput): StalenessVerdict {
    const newestInput = newestStamp(inputs);
    if (!newestInput) {
        return { key, decision: 'MISSING_INPUTS', reason: 'no inputs found' };
    }

    const oldestOutput = oldestStamp(outputs);
    if (!oldestOutput) {
        return { key, decision: 'STALE', reason: 'no outputs found', newestInput };
    }

    if (missingOutputs.length > 0) {
        return {
            key,
            decision: 'STALE',
            reason: `output ${missingOutputs[0]} not found`,
            newestInput,
            oldestOutput,
        };
    }

    if (newestInput.mtimeMs > oldestOutput.mtimeMs) {
        return {
            key,
            decision: 'STALE',
            reason: `input ${describe(newestInput)} is newer than output ${describe(oldestOutput)}`,
            newestInput,
            oldestOutput,
        };
    }

    return {
        key,
        decision: 'FRESH',
        reason: `outputs up to date (newest input ${describe(newestInput)})`,
        newestInput,
        oldestOutput,
    };
}
