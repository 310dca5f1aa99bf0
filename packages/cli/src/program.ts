import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { EXIT_CODES, type ExitCode } from '@closeflow/shared';
import { runCommand } from './commands/run.js';
import { stepsCommand } from './commands/steps.js';
import type { RunOptions, StepsOptions } from './types.js';

export const VERSION = '1.0.0';

export interface CommandHandlers {
    run: (options: RunOptions) => Promise<ExitCode>;
    steps: (options: StepsOptions) => Promise<ExitCode>;
}

interface RawRunOptions {
    year: number;
    month: number;
    step?: string;
    startFrom?: string;
    force?: boolean;
    dryRun?: boolean;
    config?: string;
    root?: string;
    report?: string;
}

function parseInteger(value: string): number {
    if (!/^\d+$/.test(value.trim())) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return Number.parseInt(value, 10);
}

/**
 * Exit code for an error thrown by commander under exitOverride:
 * help and version exit cleanly, every other parse failure is a usage error.
 */
export function usageExitCode(err: CommanderError): ExitCode {
    return err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIGURATION_ERROR;
}

export function buildProgram(handlers: CommandHandlers = { run: runCommand, steps: stepsCommand }): Command {
    const program = new Command();

    // Set before subcommands are added so they inherit it
    program
        .name('closeflow')
        .description('Runs the monthly closing pipeline, skipping steps whose outputs are up to date')
        .version(VERSION)
        .exitOverride();

    program
        .command('run')
        .description('Run the pipeline for one period')
        .requiredOption('-y, --year <year>', 'Period year (e.g. 2024)', parseInteger)
        .requiredOption('-m, --month <month>', 'Period month, 1-12', parseInteger)
        .addOption(new Option('--step <key>', 'Run only this step').conflicts('startFrom'))
        .option('--start-from <key>', 'Run this step and every later one')
        .option('-f, --force', 'Run in-scope steps even when their outputs are fresh', false)
        .option('--dry-run', 'Print the plan without running anything', false)
        .option('-c, --config <path>', 'Pipeline registry (default: nearest closeflow.yaml, else the bundled one)')
        .option('-r, --root <dir>', 'Storage root, instead of probing the registry candidates')
        .addOption(new Option('--report <file>', 'Write a JSON run report to this file').conflicts('dryRun'))
        .action(async (raw: RawRunOptions) => {
            process.exitCode = await handlers.run({
                year: raw.year,
                month: raw.month,
                step: raw.step,
                startFrom: raw.startFrom,
                force: raw.force ?? false,
                dryRun: raw.dryRun ?? false,
                config: raw.config,
                root: raw.root,
                report: raw.report,
            });
        });

    program
        .command('steps')
        .description('List the registered steps and their dependencies')
        .option('-c, --config <path>', 'Pipeline registry')
        .action(async (raw: StepsOptions) => {
            process.exitCode = await handlers.steps({ config: raw.config });
        });

    return program;
}
