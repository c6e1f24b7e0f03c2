/**
 * Matcher module: earning rules that apply to a resolved query.
 */

export { matchAll, matchesResolution, indexCards, isEligibleCard } from './match-rules.js';
export { ruleSpecificity, buildRuleIndex, findBestRule, findBestRules } from './specificity.js';
export type { MatchOptions, MatchedRule, BestRuleResult, RuleIndex } from './types.js';
