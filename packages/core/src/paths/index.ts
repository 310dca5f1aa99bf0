export { expandTemplate, validateTemplate, templateTokens } from './template.js';
export { hasWildcard, compileWildcard, matchesWildcard, isIgnoredEntry } from './wildcard.js';
