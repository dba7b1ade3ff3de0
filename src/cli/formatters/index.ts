export { JsonFormatter, formatReportJson } from './json.js';
export { HumanFormatter, formatReportConsole } from './human.js';
export type { IFormatter, FormatOptions } from './types.js';
