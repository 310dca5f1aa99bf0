/**
 * Step registry as an explicit graph.
 *
 * Nodes keep their declared order; edges come from each step's `after` list
 * and must point from an earlier step to a later one, so the declared order
 * is always a valid topological order.
 */

import type { StepConfig, StepRun } from '@closeflow/shared';
import { ConfigurationError } from '../errors.js';
import { validateTemplate } from '../paths/template.js';

export interface StepDefinition {
    key: string;
    /** Position in the declared order, starting at 0 */
    ordinal: number;
    description?: string;
    /** Absent for manual steps */
    run?: StepRun;
    inputs: readonly string[];
    outputs: readonly string[];
    manual: boolean;
    optional: boolean;
    after: readonly string[];
    instructions?: string;
}

export interface DagEdge {
    from: string;
    to: string;
}

export interface Dag {
    steps: readonly StepDefinition[];
    edges: readonly DagEdge[];
}

function templatesOf(step: StepConfig): string[] {
    const templates = [...step.inputs, ...step.outputs];
    if (step.run) {
        templates.push(...step.run.args, ...Object.values(step.run.env));
        if (step.run.cwd) templates.push(step.run.cwd);
    }
    return templates;
}

/**
 * Builds and validates the graph.
 * @throws ConfigurationError (InvalidGraph | InvalidTemplate)
 */
export function buildDag(configs: readonly StepConfig[]): Dag {
    const ordinals = new Map<string, number>();
    const steps: StepDefinition[] = [];
    const edges: DagEdge[] = [];

    configs.forEach((config, ordinal) => {
        if (ordinals.has(config.key)) {
            throw new ConfigurationError('InvalidGraph', `Duplicate step key "${config.key}"`);
        }

        for (const dep of config.after) {
            if (dep === config.key) {
                throw new ConfigurationError('InvalidGraph', `Step "${config.key}" cannot run after itself`);
            }
            const depOrdinal = ordinals.get(dep);
            if (depOrdinal === undefined) {
                const declaredLater = configs.some(c => c.key === dep);
                throw new ConfigurationError(
                    'InvalidGraph',
                    declaredLater
                        ? `Step "${config.key}" runs after "${dep}", which is declared later`
                        : `Step "${config.key}" runs after unknown step "${dep}"`
                );
            }
            edges.push({ from: dep, to: config.key });
        }

        for (const template of templatesOf(config)) {
            validateTemplate(template);
        }

        ordinals.set(config.key, ordinal);
        steps.push({
            key: config.key,
            ordinal,
            description: config.description,
            run: config.run,
            inputs: config.inputs,
            outputs: config.outputs,
            manual: config.manual,
            optional: config.optional,
            after: config.after,
            instructions: config.instructions,
        });
    });

    return { steps, edges };
}

export function findStep(dag: Dag, key: string): StepDefinition | undefined {
    return dag.steps.find(s => s.key === key);
}

/**
 * @throws ConfigurationError (UnknownStep)
 */
export function getStep(dag: Dag, key: string): StepDefinition {
    const step = findStep(dag, key);
    if (!step) {
        const known = dag.steps.map(s => s.key).join(', ');
        throw new ConfigurationError('UnknownStep', `Unknown step "${key}". Known steps: ${known}`);
    }
    return step;
}

export function predecessors(dag: Dag, key: string): string[] {
    return dag.edges.filter(e => e.to === key).map(e => e.from);
}

export function successors(dag: Dag, key: string): string[] {
    return dag.edges.filter(e => e.from === key).map(e => e.to);
}

/**
 * Transitive predecessors of a step.
 */
export function ancestors(dag: Dag, key: string): Set<string> {
    const seen = new Set<string>();
    const queue = predecessors(dag, key);
    while (queue.length > 0) {
        const current = queue.shift();
        if (current === undefined || seen.has(current)) continue;
        seen.add(current);
        queue.push(...predecessors(dag, current));
    }
    return seen;
}

/**
 * The step following `key` in declared order, used for the resume hint
 * after a manual pause.
 */
export function nextStep(dag: Dag, key: string): StepDefinition | undefined {
    const step = getStep(dag, key);
    return dag.steps[step.ordinal + 1];
}
