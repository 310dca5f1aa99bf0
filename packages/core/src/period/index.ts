export {
    PERIOD_TOKENS,
    isPeriodToken,
    createPeriod,
    previousPeriod,
    periodTag,
    formatPeriod,
    periodTokens,
} from './period.js';
export type { PeriodToken } from './period.js';
