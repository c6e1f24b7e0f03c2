export { normalizeText, stripNoiseSuffixes, toCategoryToken, containsPhrase } from './normalize.js';
export { formatDollars, formatRate, formatMultiplier } from './format.js';
export { formatIssues } from './issues.js';
