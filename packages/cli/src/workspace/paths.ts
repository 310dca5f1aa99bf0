import { join, dirname, resolve, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { homedir } from 'node:os';
import { existsSync } from 'node:fs';
import { detectWorkspaceConfig } from './detect.js';
import { warn } from '../utils/console.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * The registry shipped with the CLI.
 */
export function resolveDefaultConfigPath(): string {
    // In dev: packages/cli/src/workspace/paths.ts -> __dirname = packages/cli/src/workspace
    const pkgRoot = join(__dirname, '..', '..');
    const path = join(pkgRoot, 'assets', 'pipeline.yaml');

    if (!existsSync(path)) {
        warn(`Default pipeline config not found at ${path}. Pass --config.`);
    }

    return path;
}

/**
 * --config, else the nearest closeflow.yaml, else the packaged default.
 */
export function resolveConfigPath(explicit?: string, cwd: string = process.cwd()): string {
    if (explicit) {
        return resolve(cwd, explicit);
    }
    return detectWorkspaceConfig(cwd) ?? resolveDefaultConfigPath();
}

export function expandHome(path: string): string {
    if (path === '~') {
        return homedir();
    }
    if (path.startsWith('~/')) {
        return join(homedir(), path.slice(2));
    }
    return path;
}

/**
 * Resolves a path from the registry file against the file's own directory.
 */
export function resolveFromConfig(configPath: string, path: string): string {
    const expanded = expandHome(path);
    return isAbsolute(expanded) ? expanded : resolve(dirname(configPath), expanded);
}
