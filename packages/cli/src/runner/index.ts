export { renderCase, runCases, type CaseResult, type CaseRunOptions } from './executor';
export { colors, firstDifference, getExitCode, reportResults, type ReporterOptions } from './reporter';
