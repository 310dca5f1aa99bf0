import { EXIT_CODES, type ExitCode } from '@closeflow/shared';
import { ConfigurationError, createIntent, createPeriod, formatPeriod, resolveScope } from '@closeflow/core';
import { resolveConfigPath } from '../workspace/paths.js';
import { loadWorkspace } from '../workspace/config.js';
import { selectStorageRoot } from '../workspace/detect.js';
import { planRun } from '../pipeline/planner.js';
import { runPipeline } from '../pipeline/runner.js';
import { exitCodeFor, printPlan, printSummary, toRunReport, writeReport } from '../pipeline/report.js';
import { log, success, arrow, fail, describeError } from '../utils/console.js';
import type { RunnerDeps } from '../pipeline/types.js';
import type { RunOptions } from '../types.js';

/**
 * Runs (or, with --dry-run, plans) the pipeline for one period.
 * Returns the process exit code; configuration problems are reported before
 * any step is touched.
 */
export async function runCommand(options: RunOptions, deps: RunnerDeps = {}): Promise<ExitCode> {
    try {
        const period = createPeriod(options.year, options.month);
        const intent = createIntent(options);
        log(`\ncloseflow - Period ${formatPeriod(period)}`);

        // 1. Registry
        arrow('Loading pipeline config...');
        const workspace = loadWorkspace(resolveConfigPath(options.config));
        success(`Config: ${workspace.configPath} (${workspace.dag.steps.length} steps)`);

        // 2. Unknown --step / --start-from targets fail here, before any I/O on data
        resolveScope(workspace.dag, intent);

        // 3. Storage root
        const storageRoot = selectStorageRoot(options.root ? [options.root] : workspace.storageRoots);
        success(`Storage root: ${storageRoot}`);

        if (options.dryRun) {
            const plan = await planRun(workspace.dag, period, storageRoot, intent, deps.evaluate);
            printPlan(plan);
            return EXIT_CODES.SUCCESS;
        }

        // 4. Run
        const startedAt = new Date();
        const state = await runPipeline(
            { dag: workspace.dag, period, storageRoot, scriptsDir: workspace.scriptsDir, intent },
            deps
        );
        const finishedAt = new Date();

        printSummary(state);

        if (options.report) {
            await writeReport(options.report, toRunReport(state, startedAt, finishedAt));
            arrow(`Report saved to: ${options.report}`);
        }

        return exitCodeFor(state.outcome);
    } catch (err) {
        if (err instanceof ConfigurationError) {
            fail(`Configuration error (${err.code}): ${err.message}`);
            return EXIT_CODES.CONFIGURATION_ERROR;
        }
        fail(`Unexpected error: ${describeError(err)}`);
        return EXIT_CODES.STEP_FAILED;
    }
}
