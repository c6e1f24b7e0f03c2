export { rank, sortByRate } from './rank.js';
export { rewardPhrase, explainScore, collectNotes, overallExplanation } from './explain.js';
export type { RankCandidate, RankInput } from './types.js';
