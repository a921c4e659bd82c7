export type { AccessSummary } from './types.js';
export { LogAnalyzer } from './logAnalyzer.js';
