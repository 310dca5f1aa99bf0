import type { PeriodContext } from '@closeflow/shared';
import { ConfigurationError } from '../errors.js';
import { isPeriodToken, periodTokens } from '../period/period.js';

const TOKEN_PATTERN = /\{([^{}]*)\}/g;

/**
 * Returns the token names referenced by a template, in order of appearance.
 */
export function templateTokens(template: string): string[] {
    return Array.from(template.matchAll(TOKEN_PATTERN), m => m[1]);
}

/**
 * Checks a template without a period, so bad registries fail at load time.
 * @throws ConfigurationError (InvalidTemplate)
 */
export function validateTemplate(template: string): void {
    for (const name of templateTokens(template)) {
        if (!isPeriodToken(name)) {
            throw new ConfigurationError(
                'InvalidTemplate',
                `Unknown token "{${name}}" in template "${template}"`
            );
        }
    }
}

/**
 * Substitutes period tokens. Wildcards are left untouched.
 * @throws ConfigurationError (InvalidTemplate)
 */
export function expandTemplate(template: string, period: PeriodContext): string {
    const tokens = periodTokens(period);
    return template.replace(TOKEN_PATTERN, (match, name: string) => {
        if (!isPeriodToken(name)) {
            throw new ConfigurationError('InvalidTemplate', `Unknown token "${match}" in template "${template}"`);
        }
        return tokens[name];
    });
}
