import { existsSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { WORKSPACE_CONFIG_FILENAME } from '@closeflow/shared';
import { ConfigurationError } from '@closeflow/core';

/**
 * Searches for a workspace registry ('closeflow.yaml').
 * Starts at startPath and bubbles up to the root.
 */
export function detectWorkspaceConfig(startPath: string = process.cwd()): string | null {
    let current = resolve(startPath);
    while (true) {
        const configPath = join(current, WORKSPACE_CONFIG_FILENAME);
        if (existsSync(configPath)) {
            return configPath;
        }
        const parent = dirname(current);
        if (parent === current) {
            break;
        }
        current = parent;
    }
    return null;
}

/**
 * Picks the first candidate that exists and is a directory.
 * @throws ConfigurationError (NoStorageRootFound)
 */
export function selectStorageRoot(candidates: readonly string[]): string {
    for (const candidate of candidates) {
        if (existsSync(candidate) && statSync(candidate).isDirectory()) {
            return resolve(candidate);
        }
    }
    const listing = candidates.map(c => `  - ${c}`).join('\n');
    throw new ConfigurationError(
        'NoStorageRootFound',
        `No storage root found. None of the candidate directories exist:\n${listing}`
    );
}
