/**
 * tbforge Extract — Public API
 */

export { candidateSchema, parseCandidate, specFromCandidate, extractJson, extractSpec, DEFAULT_TEXT_FEATURES } from './candidate.js';
export type { CandidateInput, SpecCandidate, SpecExtractor } from './candidate.js';
export { quickExtract, quickExtractor } from './quick.js';
