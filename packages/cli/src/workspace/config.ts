import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { PipelineConfigSchema, type PipelineConfig } from '@closeflow/shared';
import { ConfigurationError, buildDag } from '@closeflow/core';
import { resolveFromConfig } from './paths.js';
import { describeError } from '../utils/console.js';
import type { Workspace } from '../types.js';

/**
 * Loads and validates a pipeline registry (YAML).
 * @throws ConfigurationError (InvalidConfig)
 */
export function loadPipelineConfig(path: string): PipelineConfig {
    if (!existsSync(path)) {
        throw new ConfigurationError('InvalidConfig', `Pipeline config not found: ${path}`);
    }
    const content = readFileSync(path, 'utf-8');

    let data: unknown;
    try {
        data = parse(content);
    } catch (err) {
        throw new ConfigurationError('InvalidConfig', `Failed to parse ${path}: ${describeError(err)}`);
    }

    const result = PipelineConfigSchema.safeParse(data);
    if (!result.success) {
        const issues = result.error.issues
            .map(i => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
            .join('\n');
        throw new ConfigurationError('InvalidConfig', `Invalid pipeline config ${path}:\n${issues}`);
    }
    return result.data;
}

/**
 * Loads the registry and builds its graph.
 * Relative storage roots and scripts_dir resolve against the config file.
 */
export function loadWorkspace(configPath: string): Workspace {
    const config = loadPipelineConfig(configPath);
    const dag = buildDag(config.steps);

    return {
        configPath,
        config,
        dag,
        scriptsDir: resolveFromConfig(configPath, config.scripts_dir),
        storageRoots: config.storage_roots.map(root => resolveFromConfig(configPath, root)),
    };
}
