/**
 * tbforge coverage — Public API
 */

export {
  parseCoverageDocument, rankCoverageGaps, binPercentage, severityOf, matchTarget,
} from './gaps.js';
export type {
  CoverageBin, CoverageReport, CoverageGap, CoverageGapReport, GapSeverity, GapTarget,
} from './gaps.js';
