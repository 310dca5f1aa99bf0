import { spawn } from 'node:child_process';
import { resolve } from 'node:path';
import { ENV_PREFIX } from '@closeflow/shared';
import { StepExecutionError, expandTemplate, periodTag } from '@closeflow/core';
import type { InvocationContext, InvocationResult, StepExecutor } from './types.js';

/**
 * Environment handed to a step executable, on top of the operator's own.
 */
export function buildStepEnv(context: InvocationContext): Record<string, string> {
    const { step, period } = context;
    const env: Record<string, string> = {
        [`${ENV_PREFIX}STEP`]: step.key,
        [`${ENV_PREFIX}YEAR`]: String(period.year),
        [`${ENV_PREFIX}MONTH`]: String(period.month),
        [`${ENV_PREFIX}PERIOD`]: periodTag(period),
        [`${ENV_PREFIX}ROOT`]: context.storageRoot,
        [`${ENV_PREFIX}INPUTS`]: JSON.stringify(context.inputs),
        [`${ENV_PREFIX}OUTPUTS`]: JSON.stringify(context.outputs),
    };
    for (const [name, value] of Object.entries(step.run?.env ?? {})) {
        env[name] = expandTemplate(value, period);
    }
    return env;
}

export function isMissingExecutable(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Spawns the step's executable with the operator's terminal attached, so
 * scripts that prompt still work, and waits for it to exit.
 * Rejects when the process cannot be started.
 */
export const spawnStep: StepExecutor = (context) => {
    const { step, period } = context;
    const run = step.run;
    if (!run) {
        return Promise.reject(new StepExecutionError(step.key, null, `Step "${step.key}" has no executable`));
    }

    const args = run.args.map(arg => expandTemplate(arg, period));
    const cwd = run.cwd ? resolve(context.scriptsDir, expandTemplate(run.cwd, period)) : context.scriptsDir;
    const startedAt = Date.now();

    return new Promise<InvocationResult>((resolvePromise, reject) => {
        const child = spawn(run.command, args, {
            cwd,
            env: { ...process.env, ...buildStepEnv(context) },
            stdio: 'inherit',
        });

        child.once('error', reject);
        child.once('close', (code, signal) => {
            resolvePromise({ exitCode: code, signal, durationMs: Date.now() - startedAt });
        });
    });
};
