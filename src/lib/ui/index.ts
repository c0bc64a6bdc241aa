/**
 * Shared UI primitives for CLI output
 */

export { icons, box, statusBadge } from './theme.js';

export { setJsonMode, isJsonMode, print, printErr, printJson } from './output.js';

export {
  printStatus,
  printHeader,
  printDetail,
  printDim,
  printReports,
  printItem,
  printRunSummary,
} from './status.js';

export { printTable } from './table.js';
export type { TableOptions } from './table.js';

export { printError, errorToDisplay } from './error.js';
export type { ErrorDisplayOptions } from './error.js';
