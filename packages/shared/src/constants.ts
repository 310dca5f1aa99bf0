/**
 * Constants for closeflow.
 */

/**
 * Month names used by the invoice source folders ("10-Outubro").
 * Index 0 is January.
 */
export const MONTH_NAMES = [
    'Janeiro',
    'Fevereiro',
    'Março',
    'Abril',
    'Maio',
    'Junho',
    'Julho',
    'Agosto',
    'Setembro',
    'Outubro',
    'Novembro',
    'Dezembro',
] as const;

/**
 * Process exit codes returned by the run controller.
 */
export const EXIT_CODES = {
    SUCCESS: 0,
    STEP_FAILED: 1,
    CONFIGURATION_ERROR: 2,
    MISSING_INPUTS: 3,
    AWAITING_MANUAL: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Name of the workspace registry file searched for upward from the cwd.
 */
export const WORKSPACE_CONFIG_FILENAME = 'closeflow.yaml';

/**
 * Prefix of the environment variables handed to step executables.
 */
export const ENV_PREFIX = 'CLOSEFLOW_';

/**
 * Valid period range.
 */
export const PERIOD_LIMITS = {
    MIN_YEAR: 2000,
    MAX_YEAR: 2999,
} as const;
