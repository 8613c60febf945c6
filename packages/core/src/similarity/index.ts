export { tokenSet, textSimilarity } from './jaccard.js';
