/**
 * Run plan: what the orchestrator is expected to do with each step, computed
 * from the current verdicts before anything executes.
 */

import type { RunIntent, StalenessDecision, StalenessVerdict } from '@closeflow/shared';
import { ancestors, type Dag, type StepDefinition } from '../graph/dag.js';
import { resolveScope, type StepScope } from './scope.js';

export type PlannedAction =
    | 'execute'
    | 'skip-fresh'
    | 'skip-optional'
    | 'await-manual'
    | 'halt-missing-inputs'
    | 'out-of-scope'
    | 'not-reached';

/**
 * What a step in scope can come to; the other actions only describe plan
 * entries.
 */
export type StepAction = Exclude<PlannedAction, 'out-of-scope' | 'not-reached'>;

export interface PlanEntry {
    step: StepDefinition;
    scope: StepScope;
    verdict?: StalenessVerdict;
    action: PlannedAction;
    willExecute: boolean;
    /**
     * An upstream step will execute first, so this step's inputs are about to
     * change and its current verdict is only a forecast.
     */
    provisional: boolean;
}

export interface RunPlan {
    intent: RunIntent;
    entries: PlanEntry[];
}

/**
 * The per-step decision table, shared by the planner and the orchestrator.
 * Force turns FRESH into a run but never overrides missing inputs.
 */
export function decideAction(step: StepDefinition, decision: StalenessDecision, force: boolean): StepAction {
    if (decision === 'MISSING_INPUTS') {
        return step.optional ? 'skip-optional' : 'halt-missing-inputs';
    }
    const stale = force || decision === 'STALE';
    if (step.manual) {
        return stale ? 'await-manual' : 'skip-fresh';
    }
    return stale ? 'execute' : 'skip-fresh';
}

export function isHaltingAction(action: PlannedAction): boolean {
    return action === 'await-manual' || action === 'halt-missing-inputs';
}

/**
 * @param verdicts current verdict of every in-scope step
 */
export function buildRunPlan(
    dag: Dag,
    intent: RunIntent,
    verdicts: ReadonlyMap<string, StalenessVerdict>
): RunPlan {
    const scopes = resolveScope(dag, intent);
    const executing = new Set<string>();
    const entries: PlanEntry[] = [];
    let halted = false;

    for (const step of dag.steps) {
        const scope = scopes.get(step.key) ?? 'not-selected';

        if (scope !== 'in-scope') {
            entries.push({ step, scope, action: 'out-of-scope', willExecute: false, provisional: false });
            continue;
        }

        const verdict = verdicts.get(step.key);
        if (!verdict) {
            throw new Error(`No staleness verdict for in-scope step "${step.key}"`);
        }

        if (halted) {
            entries.push({ step, scope, verdict, action: 'not-reached', willExecute: false, provisional: false });
            continue;
        }

        const upstream = ancestors(dag, step.key);
        const provisional = [...upstream].some(key => executing.has(key));
        const decision: StalenessDecision = provisional ? 'STALE' : verdict.decision;
        const action = decideAction(step, decision, intent.force);
        const willExecute = action === 'execute';

        if (willExecute) executing.add(step.key);
        if (isHaltingAction(action)) halted = true;

        entries.push({ step, scope, verdict, action, willExecute, provisional });
    }

    return { intent, entries };
}
