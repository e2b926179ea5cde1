/**
 * Half-open calendar month `[windowStart, windowEnd)` in UTC
 */
export interface AnalysisWindow {
  windowStart: Date;
  windowEnd: Date;
}
