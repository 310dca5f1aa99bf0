import { EXIT_CODES, type ExitCode } from '@closeflow/shared';
import { ConfigurationError, predecessors } from '@closeflow/core';
import { resolveConfigPath } from '../workspace/paths.js';
import { loadWorkspace } from '../workspace/config.js';
import { log, fail, describeError } from '../utils/console.js';
import type { StepsOptions } from '../types.js';

/**
 * Lists the registry in execution order with its edges.
 */
export async function stepsCommand(options: StepsOptions): Promise<ExitCode> {
    try {
        const workspace = loadWorkspace(resolveConfigPath(options.config));
        log(`\n${workspace.config.name} (${workspace.configPath})\n`);

        for (const step of workspace.dag.steps) {
            const flags = [step.manual ? 'manual' : '', step.optional ? 'optional' : '']
                .filter(Boolean)
                .map(f => `[${f}]`)
                .join(' ');
            log(`${String(step.ordinal + 1).padStart(2)}. ${step.key}${flags ? ` ${flags}` : ''}`);
            if (step.description) log(`    ${step.description}`);
            const after = predecessors(workspace.dag, step.key);
            if (after.length > 0) log(`    after: ${after.join(', ')}`);
            log(`    inputs:  ${step.inputs.join(', ')}`);
            log(`    outputs: ${step.outputs.join(', ')}`);
        }
        return EXIT_CODES.SUCCESS;
    } catch (err) {
        if (err instanceof ConfigurationError) {
            fail(`Configuration error (${err.code}): ${err.message}`);
            return EXIT_CODES.CONFIGURATION_ERROR;
        }
        fail(`Unexpected error: ${describeError(err)}`);
        return EXIT_CODES.STEP_FAILED;
    }
}
