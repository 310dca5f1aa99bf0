import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { CommanderError } from 'commander';
import { EXIT_CODES, type ExitCode } from '@closeflow/shared';
import { buildProgram, usageExitCode, type CommandHandlers } from '../src/program.js';
import type { RunOptions, StepsOptions } from '../src/types.js';

function handlers(code: ExitCode = EXIT_CODES.SUCCESS) {
    return {
        run: vi.fn(async (_options: RunOptions): Promise<ExitCode> => code),
        steps: vi.fn(async (_options: StepsOptions): Promise<ExitCode> => code),
    } satisfies CommandHandlers;
}

async function parseError(argv: string[]): Promise<CommanderError> {
    try {
        await buildProgram(handlers()).parseAsync(argv, { from: 'user' });
    } catch (err) {
        if (err instanceof CommanderError) return err;
        throw err;
    }
    throw new Error('expected a CommanderError');
}

beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
});

describe('run command', () => {
    it('should pass parsed options to the handler', async () => {
        const h = handlers();

        await buildProgram(h).parseAsync(
            ['run', '-y', '2024', '-m', '10', '--start-from', 'step3_update_entradas', '--force', '--report', 'r.json'],
            { from: 'user' }
        );

        expect(h.run).toHaveBeenCalledWith({
            year: 2024,
            month: 10,
            startFrom: 'step3_update_entradas',
            force: true,
            dryRun: false,
            report: 'r.json',
        });
    });

    it('should set the exit code from the handler', async () => {
        await buildProgram(handlers(EXIT_CODES.AWAITING_MANUAL)).parseAsync(['run', '--year', '2024', '--month', '1'], {
            from: 'user',
        });

        expect(process.exitCode).toBe(4);
    });

    it('should reject a non-numeric month', async () => {
        const err = await parseError(['run', '-y', '2024', '-m', 'oct']);
        expect(err.code).toBe('commander.invalidArgument');
        expect(usageExitCode(err)).toBe(2);
    });

    it('should require the period', async () => {
        const err = await parseError(['run', '-y', '2024']);
        expect(err.code).toBe('commander.missingMandatoryOptionValue');
        expect(usageExitCode(err)).toBe(2);
    });

    it('should refuse --step with --start-from', async () => {
        const err = await parseError(['run', '-y', '2024', '-m', '10', '--step', 'a', '--start-from', 'b']);
        expect(err.code).toBe('commander.conflictingOption');
        expect(usageExitCode(err)).toBe(2);
    });

    it('should refuse --report with --dry-run', async () => {
        const err = await parseError(['run', '-y', '2024', '-m', '10', '--dry-run', '--report', 'r.json']);
        expect(err.code).toBe('commander.conflictingOption');
        expect(usageExitCode(err)).toBe(2);
    });
});

describe('steps command', () => {
    it('should pass the config path', async () => {
        const h = handlers();

        await buildProgram(h).parseAsync(['steps', '--config', 'pipeline.yaml'], { from: 'user' });

        expect(h.steps).toHaveBeenCalledWith({ config: 'pipeline.yaml' });
    });
});

describe('usageExitCode', () => {
    it('should exit cleanly for --version', async () => {
        const err = await parseError(['--version']);
        expect(err.code).toBe('commander.version');
        expect(usageExitCode(err)).toBe(0);
    });
});
