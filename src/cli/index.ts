/**
 * CLI Module Exports
 *
 * Re-exports all CLI commands and utilities.
 */

// Commands
export { extractCommand, mainPages } from './extract.js';
export { pageCommand } from './page.js';
export { expandCommand } from './expand.js';
export { openSession } from './session.js';
export type { Session, SessionOptions } from './session.js';

// Utilities
export {
  CONFIG_FILE,
  color,
  supportsColor,
  formatDuration,
  formatNumber,
  loadConfig,
  fatal,
  warn,
  parseList,
  parseCount,
  resolvePath,
} from './utils.js';

export type { CliConfig } from './utils.js';
