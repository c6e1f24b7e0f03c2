export {
    parseRewardText,
    toEarningRule,
    splitSentences,
    extractCap,
    extractCategories,
    extractKeywords,
} from './reward-text.js';
export type { RewardTextResult } from './reward-text.js';
