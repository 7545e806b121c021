/**
 * Reporting Module
 */

export type { ResultReporter } from './types.js';
export { attachReporter } from './types.js';
export { MemoryReporter } from './memory-reporter.js';
export { ConsoleReporter, GLYPHS, formatDetails } from './console-reporter.js';
