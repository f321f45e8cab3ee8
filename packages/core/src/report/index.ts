/**
 * Report module: period filtering and aggregations.
 */

export { monthPeriod, lastDaysPeriod, inPeriod, filterByPeriod } from './period.js';
export {
    computeTotals,
    currentBalance,
    categoryBreakdown,
    dailyTrend,
    monthlyComparison,
    recentTransactions,
} from './summary.js';
