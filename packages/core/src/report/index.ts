export {
  formatHourlyCounts,
  formatMonthlyCounts,
  formatSummary,
  monthName,
} from './format.js';
