/**
 * Single-segment wildcard matching ("*" and "?").
 * The CLI walks the filesystem segment by segment and uses these to filter
 * directory entries.
 */

const REGEX_SPECIALS = /[.+^${}()|[\]\\]/g;

export function hasWildcard(segment: string): boolean {
    return segment.includes('*') || segment.includes('?');
}

export function compileWildcard(segment: string): RegExp {
    const body = segment
        .replace(REGEX_SPECIALS, '\\$&')
        .replace(/\*/g, '[^/]*')
        .replace(/\?/g, '[^/]');
    return new RegExp(`^${body}$`);
}

/**
 * Hidden files and office lock files ("~$T_Entradas.xlsx") never match.
 */
export function isIgnoredEntry(name: string): boolean {
    return name.startsWith('.') || name.startsWith('~');
}

export function matchesWildcard(segment: string, name: string): boolean {
    if (isIgnoredEntry(name)) {
        return false;
    }
    return compileWildcard(segment).test(name);
}
