import { readdir, stat } from 'node:fs/promises';
import { isAbsolute, join, normalize, parse, sep } from 'node:path';
import type { FileStamp, PeriodContext } from '@closeflow/shared';
import { expandTemplate, hasWildcard, matchesWildcard } from '@closeflow/core';

function isMissingPath(err: unknown): boolean {
    return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Expands a template to an absolute path, still possibly containing wildcards.
 */
export function expandPattern(pattern: string, period: PeriodContext, root: string): string {
    const expanded = expandTemplate(pattern, period);
    return normalize(isAbsolute(expanded) ? expanded : join(root, expanded));
}

async function statFile(path: string): Promise<FileStamp | undefined> {
    try {
        const s = await stat(path);
        return s.isFile() ? { path, mtimeMs: s.mtimeMs } : undefined;
    } catch (err) {
        if (isMissingPath(err)) return undefined;
        throw err;
    }
}

async function listDirectory(path: string): Promise<string[]> {
    try {
        return (await readdir(path)).sort();
    } catch (err) {
        if (isMissingPath(err)) return [];
        throw err;
    }
}

/**
 * Resolves one pattern to the existing files it names, sorted.
 * Wildcard segments are matched against directory listings one level at a time.
 */
export async function resolvePatternStamps(
    pattern: string,
    period: PeriodContext,
    root: string
): Promise<FileStamp[]> {
    const absolute = expandPattern(pattern, period, root);
    const fsRoot = parse(absolute).root;
    const segments = absolute.slice(fsRoot.length).split(sep).filter(s => s.length > 0);

    let candidates = [fsRoot];
    for (const segment of segments) {
        const next: string[] = [];
        for (const base of candidates) {
            if (!hasWildcard(segment)) {
                next.push(join(base, segment));
                continue;
            }
            for (const name of await listDirectory(base)) {
                if (matchesWildcard(segment, name)) {
                    next.push(join(base, name));
                }
            }
        }
        candidates = next;
    }

    const stamps: FileStamp[] = [];
    for (const candidate of candidates) {
        const stamp = await statFile(candidate);
        if (stamp) stamps.push(stamp);
    }
    return stamps;
}

/**
 * Resolves a set of patterns, deduplicated and sorted by path.
 */
export async function resolveStamps(
    patterns: readonly string[],
    period: PeriodContext,
    root: string
): Promise<FileStamp[]> {
    const byPath = new Map<string, FileStamp>();
    for (const pattern of patterns) {
        for (const stamp of await resolvePatternStamps(pattern, period, root)) {
            byPath.set(stamp.path, stamp);
        }
    }
    return [...byPath.values()].sort((a, b) => a.path.localeCompare(b.path));
}

export async function resolvePaths(
    patterns: readonly string[],
    period: PeriodContext,
    root: string
): Promise<string[]> {
    return (await resolveStamps(patterns, period, root)).map(s => s.path);
}
