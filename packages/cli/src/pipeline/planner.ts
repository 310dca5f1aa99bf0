import type { PeriodContext, RunIntent, StalenessVerdict } from '@closeflow/shared';
import { buildRunPlan, resolveScope, type Dag, type RunPlan } from '@closeflow/core';
import { evaluateStep } from './evaluate.js';
import type { Evaluator } from './types.js';

/**
 * Evaluates every in-scope step against the current filesystem and builds
 * the plan. Steps out of scope are never resolved.
 */
export async function planRun(
    dag: Dag,
    period: PeriodContext,
    storageRoot: string,
    intent: RunIntent,
    evaluate: Evaluator = evaluateStep
): Promise<RunPlan> {
    const scopes = resolveScope(dag, intent);
    const verdicts = new Map<string, StalenessVerdict>();

    for (const step of dag.steps) {
        if (scopes.get(step.key) !== 'in-scope') continue;
        const evaluation = await evaluate(step, period, storageRoot);
        verdicts.set(step.key, evaluation.verdict);
    }

    return buildRunPlan(dag, intent, verdicts);
}
