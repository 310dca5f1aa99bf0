/**
 * closeflow CLI - Core Types
 */

import type { PipelineConfig } from '@closeflow/shared';
import type { Dag } from '@closeflow/core';

export interface RunOptions {
    year: number;
    month: number;
    step?: string;
    startFrom?: string;
    force: boolean;
    dryRun: boolean;
    config?: string;
    root?: string;
    report?: string;
}

export interface StepsOptions {
    config?: string;
}

/**
 * A loaded registry file and everything resolved relative to it.
 */
export interface Workspace {
    configPath: string;
    config: PipelineConfig;
    dag: Dag;
    /** Working directory of step executables */
    scriptsDir: string;
    /** Candidate storage roots, in probe order */
    storageRoots: string[];
}
