/**
 * Error taxonomy shared by the core and the CLI.
 * A manual pause is not an error: it is a step status.
 */

export type ConfigurationErrorCode =
    | 'NoStorageRootFound'
    | 'UnknownStep'
    | 'InvalidPeriod'
    | 'InvalidConfig'
    | 'InvalidTemplate'
    | 'InvalidGraph'
    | 'ConflictingIntent';

/**
 * Fatal before any step runs.
 */
export class ConfigurationError extends Error {
    readonly code: ConfigurationErrorCode;

    constructor(code: ConfigurationErrorCode, message: string) {
        super(message);
        this.name = 'ConfigurationError';
        this.code = code;
    }
}

/**
 * A required step resolved zero input files.
 */
export class MissingInputsError extends Error {
    readonly step: string;
    readonly patterns: readonly string[];

    constructor(step: string, patterns: readonly string[]) {
        super(`Step "${step}" has no input files (looked for: ${patterns.join(', ')})`);
        this.name = 'MissingInputsError';
        this.step = step;
        this.patterns = patterns;
    }
}

/**
 * The external executable exited non-zero or could not be started.
 * `exitCode` is null when the process never ran or was killed by a signal.
 */
export class StepExecutionError extends Error {
    readonly step: string;
    readonly exitCode: number | null;

    constructor(step: string, exitCode: number | null, message: string) {
        super(message);
        this.name = 'StepExecutionError';
        this.step = step;
        this.exitCode = exitCode;
    }
}
