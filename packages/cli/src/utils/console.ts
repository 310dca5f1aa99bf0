/**
 * Formatted console output helpers
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function fail(message: string): void {
    console.error(`✖ ${message}`);
}

export function pause(message: string): void {
    console.log(`⏸ ${message}`);
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
