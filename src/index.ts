/**
 * kvconf — typed `key=value` configuration files.
 */

export * from './core/index.js';
export * from './schema/index.js';
export { generateJSON, generateMarkdown, serializeJSON } from './report/index.js';
export { LIMITS } from './config/index.js';
