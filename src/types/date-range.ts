/**
 * Calendar date range for a run. Both ends are ISO dates (YYYY-MM-DD, UTC)
 * and inclusive.
 */
export interface DateRange {
  startDate: string;
  endDate: string;
}
