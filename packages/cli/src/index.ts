#!/usr/bin/env node
/**
 * closeflow CLI entry point.
 *
 * Exit codes:
 *   0 success, 1 step failed, 2 configuration or usage error,
 *   3 missing inputs, 4 paused at a manual step
 */

import { CommanderError } from 'commander';
import { EXIT_CODES } from '@closeflow/shared';
import { buildProgram, usageExitCode } from './program.js';
import { describeError, fail } from './utils/console.js';

async function main(): Promise<void> {
    const program = buildProgram();
    try {
        await program.parseAsync(process.argv);
    } catch (err) {
        if (err instanceof CommanderError) {
            process.exitCode = usageExitCode(err);
            return;
        }
        throw err;
    }
}

main().catch((err: unknown) => {
    fail(`Fatal error: ${describeError(err)}`);
    process.exitCode = EXIT_CODES.STEP_FAILED;
});
