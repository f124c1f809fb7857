/**
 * Classifier module: first-match-wins keyword classification.
 */

export { classify, classifyKeyword, classifyAll } from './classify.js';
