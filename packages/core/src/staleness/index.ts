export { decideStaleness, newestStamp, oldestStamp } from './decide.js';
export type { StalenessInput } from './decide.js';
