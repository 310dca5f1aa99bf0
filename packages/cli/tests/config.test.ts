import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { stringify } from 'yaml';
import { ConfigurationError } from '@closeflow/core';
import { loadPipelineConfig, loadWorkspace } from '../src/workspace/config.js';
import { selectStorageRoot } from '../src/workspace/detect.js';
import { makeTempDir, removeDir, stepConfig } from './helpers.js';

let dir: string;

beforeEach(() => {
    dir = makeTempDir();
});

afterEach(() => {
    removeDir(dir);
});

function writeConfig(data: unknown): string {
    const path = join(dir, 'closeflow.yaml');
    writeFileSync(path, typeof data === 'string' ? data : stringify(data));
    return path;
}

function errorOf(fn: () => unknown): ConfigurationError {
    try {
        fn();
    } catch (err) {
        if (err instanceof ConfigurationError) return err;
        throw err;
    }
    throw new Error('expected a ConfigurationError');
}

describe('selectStorageRoot', () => {
    it('should pick the first existing directory', () => {
        mkdirSync(join(dir, 'second'));
        mkdirSync(join(dir, 'third'));

        const root = selectStorageRoot([join(dir, 'first'), join(dir, 'second'), join(dir, 'third')]);
        expect(root).toBe(join(dir, 'second'));
    });

    it('should skip candidates that are files', () => {
        writeFileSync(join(dir, 'file'), 'x');
        mkdirSync(join(dir, 'data'));

        expect(selectStorageRoot([join(dir, 'file'), join(dir, 'data')])).toBe(join(dir, 'data'));
    });

    it('should list every candidate when none exists', () => {
        const err = errorOf(() => selectStorageRoot([join(dir, 'a'), join(dir, 'b')]));
        expect(err.code).toBe('NoStorageRootFound');
        expect(err.message).toContain(`  - ${join(dir, 'a')}\n  - ${join(dir, 'b')}`);
    });
});

describe('loadPipelineConfig', () => {
    it('should apply defaults', () => {
        const path = writeConfig({
            name: 'close',
            storage_roots: ['data'],
            steps: [{ key: 'a', run: { command: 'python3' }, inputs: ['in.txt'], outputs: ['out.txt'] }],
        });

        const config = loadPipelineConfig(path);
        expect(config.scripts_dir).toBe('.');
        expect(config.steps[0]).toMatchObject({
            key: 'a',
            run: { command: 'python3', args: [], env: {} },
            manual: false,
            optional: false,
            after: [],
        });
    });

    it('should reject a missing file', () => {
        const err = errorOf(() => loadPipelineConfig(join(dir, 'missing.yaml')));
        expect(err.code).toBe('InvalidConfig');
        expect(err.message).toBe(`Pipeline config not found: ${join(dir, 'missing.yaml')}`);
    });

    it('should reject malformed YAML', () => {
        const err = errorOf(() => loadPipelineConfig(writeConfig('name: [unclosed')));
        expect(err.code).toBe('InvalidConfig');
        expect(err.message).toContain('Failed to parse');
    });

    it('should list schema issues by path', () => {
        const path = writeConfig({
            name: 'close',
            storage_roots: [],
            steps: [{ key: 'review', manual: true, inputs: ['a'], outputs: ['b'] }],
        });

        const err = errorOf(() => loadPipelineConfig(path));
        expect(err.code).toBe('InvalidConfig');
        expect(err.message).toContain('  - storage_roots:');
        expect(err.message).toContain('  - steps.0.instructions: A manual step must carry operator instructions');
    });
});

describe('loadWorkspace', () => {
    it('should build the graph and resolve paths against the config file', () => {
        const path = writeConfig({
            name: 'close',
            storage_roots: ['data', '/mnt/data'],
            scripts_dir: 'scripts',
            steps: [stepConfig('a'), stepConfig('b', { after: ['a'] })],
        });

        const workspace = loadWorkspace(path);
        expect(workspace.configPath).toBe(path);
        expect(workspace.scriptsDir).toBe(join(dir, 'scripts'));
        expect(workspace.storageRoots).toEqual([join(dir, 'data'), '/mnt/data']);
        expect(workspace.dag.steps.map(s => s.key)).toEqual(['a', 'b']);
        expect(workspace.dag.edges).toEqual([{ from: 'a', to: 'b' }]);
    });

    it('should reject an invalid graph', () => {
        const path = writeConfig({
            name: 'close',
            storage_roots: ['data'],
            steps: [stepConfig('a', { after: ['ghost'] })],
        });

        const err = errorOf(() => loadWorkspace(path));
        expect(err.code).toBe('InvalidGraph');
        expect(err.message).toBe('Step "a" runs after unknown step "ghost"');
    });

    it('should reject unknown template tokens', () => {
        const path = writeConfig({
            name: 'close',
            storage_roots: ['data'],
            steps: [stepConfig('a', { outputs: ['out/{quarter}.txt'] })],
        });

        expect(errorOf(() => loadWorkspace(path)).code).toBe('InvalidTemplate');
    });
});
