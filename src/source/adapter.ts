/**
 * Lookback windows, in the order a run walks them.
 */
export const TIMEFRAMES = ['day', 'week', 'month'] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

/**
 * Source of articles for a run. Implement for each CMS.
 * Entries are returned as decoded; the run validates each one.
 */
export interface ArticleSource {
  fetchByTimeframe(timeframe: Timeframe): Promise<unknown[]>;
}
