/**
 * Period context and the template tokens derived from it.
 */

import { MONTH_NAMES, PeriodContextSchema, type PeriodContext } from '@closeflow/shared';
import { ConfigurationError } from '../errors.js';

/**
 * Every token a path template may reference, e.g. "{month_dir}".
 */
export const PERIOD_TOKENS = [
    'year',
    'yy',
    'month',
    'mm',
    'month_name',
    'month_dir',
    'period',
    'ano_mes',
    'prev_year',
    'prev_mm',
    'prev_period',
] as const;

export type PeriodToken = (typeof PERIOD_TOKENS)[number];

export function isPeriodToken(name: string): name is PeriodToken {
    return PERIOD_TOKENS.some(token => token === name);
}

/**
 * Validates and freezes a period.
 * @throws ConfigurationError (InvalidPeriod)
 */
export function createPeriod(year: number, month: number): PeriodContext {
    const result = PeriodContextSchema.safeParse({ year, month });
    if (!result.success) {
        const details = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigurationError('InvalidPeriod', `Invalid period ${year}-${month} (${details})`);
    }
    return Object.freeze(result.data);
}

export function previousPeriod(period: PeriodContext): PeriodContext {
    if (period.month === 1) {
        return Object.freeze({ year: period.year - 1, month: 12 });
    }
    return Object.freeze({ year: period.year, month: period.month - 1 });
}

function pad2(value: number): string {
    return String(value).padStart(2, '0');
}

/**
 * "2024_10" - the folder suffix used under clean/.
 */
export function periodTag(period: PeriodContext): string {
    return `${period.year}_${pad2(period.month)}`;
}

/**
 * "2024-10" for display.
 */
export function formatPeriod(period: PeriodContext): string {
    return `${period.year}-${pad2(period.month)}`;
}

export function periodTokens(period: PeriodContext): Readonly<Record<PeriodToken, string>> {
    const prev = previousPeriod(period);
    const mm = pad2(period.month);
    const yy = pad2(period.year % 100);
    const monthName = MONTH_NAMES[period.month - 1];

    return {
        year: String(period.year),
        yy,
        month: String(period.month),
        mm,
        month_name: monthName,
        month_dir: `${mm}-${monthName}`,
        period: periodTag(period),
        ano_mes: `${yy}${mm}`,
        prev_year: String(prev.year),
        prev_mm: pad2(prev.month),
        prev_period: periodTag(prev),
    };
}
