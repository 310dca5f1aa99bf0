import type { FileStamp, PeriodContext } from '@closeflow/shared';
import { decideStaleness, expandTemplate, type StepDefinition } from '@closeflow/core';
import { expandPattern, resolvePatternStamps, resolveStamps } from './resolve.js';
import type { Evaluation } from './types.js';

/**
 * Resolves a step's inputs and outputs and judges its staleness.
 * Read-only: existence, listings and mtimes.
 */
export async function evaluateStep(step: StepDefinition, period: PeriodContext, root: string): Promise<Evaluation> {
    const inputs = await resolveStamps(step.inputs, period, root);

    const outputs: FileStamp[] = [];
    const missingOutputs: string[] = [];
    for (const pattern of step.outputs) {
        const found = await resolvePatternStamps(pattern, period, root);
        if (found.length === 0) {
            missingOutputs.push(expandTemplate(pattern, period));
        } else {
            outputs.push(...found);
        }
    }

    const verdict = decideStaleness({ key: step.key, inputs, outputs, missingOutputs });

    return {
        verdict,
        inputs,
        outputs,
        expectedOutputs: step.outputs.map(pattern => expandPattern(pattern, period, root)),
        missingOutputs,
    };
}
