import type { RunIntent } from '@closeflow/shared';
import { ConfigurationError } from '../errors.js';
import { getStep, type Dag } from '../graph/dag.js';

/**
 * Why a step is or is not part of the current run.
 * - before-start: declared before the --start-from target
 * - not-selected: not the --step target
 */
export type StepScope = 'in-scope' | 'before-start' | 'not-selected';

export interface IntentOptions {
    step?: string;
    startFrom?: string;
    force?: boolean;
}

/**
 * @throws ConfigurationError (ConflictingIntent)
 */
export function createIntent(options: IntentOptions): RunIntent {
    const force = options.force ?? false;
    if (options.step !== undefined && options.startFrom !== undefined) {
        throw new ConfigurationError('ConflictingIntent', '--step and --start-from cannot be combined');
    }
    // An empty key is still a key; getStep rejects it later
    if (options.step !== undefined) {
        return { mode: 'step', target: options.step, force };
    }
    if (options.startFrom !== undefined) {
        return { mode: 'start-from', target: options.startFrom, force };
    }
    return { mode: 'full', force };
}

/**
 * Classifies every step for the intent, in declared order.
 * @throws ConfigurationError (UnknownStep)
 */
export function resolveScope(dag: Dag, intent: RunIntent): Map<string, StepScope> {
    const scopes = new Map<string, StepScope>();

    if (intent.mode === 'full' || intent.target === undefined) {
        for (const step of dag.steps) scopes.set(step.key, 'in-scope');
        return scopes;
    }

    const target = getStep(dag, intent.target);
    for (const step of dag.steps) {
        if (intent.mode === 'step') {
            scopes.set(step.key, step.key === target.key ? 'in-scope' : 'not-selected');
        } else {
            scopes.set(step.key, step.ordinal < target.ordinal ? 'before-start' : 'in-scope');
        }
    }
    return scopes;
}

export function describeIntent(intent: RunIntent): string {
    const base =
        intent.mode === 'full'
            ? 'full run'
            : intent.mode === 'step'
              ? `single step ${intent.target}`
              : `start from ${intent.target}`;
    return intent.force ? `${base} (forced)` : base;
}
