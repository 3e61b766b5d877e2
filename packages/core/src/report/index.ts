export { buildIdReport, renderIdReport } from './list-ids.js';
export type { IdReportEntry } from './list-ids.js';
