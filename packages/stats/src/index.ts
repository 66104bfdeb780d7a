export { StatsAggregator, type StatsOptions } from './aggregator';
export { applyRecord, emptySnapshot, flowKey, DEFAULT_HISTOGRAM_BOUNDS } from './aggregate';
export { dayKey, isoWeekKey, monthKey } from './buckets';
export {
  toStatsReport,
  renderStatsHtml,
  escapeHtml,
  type StatsReport,
  type TotalsReport,
  type SelectorReport,
  type FlowReport,
  type HtmlReportOptions,
} from './report';
export type {
  StatsSnapshot,
  RunTotals,
  SelectorStats,
  DurationStats,
  HistogramBucket,
} from './types';
