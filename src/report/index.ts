/**
 * Report module — renders a loaded store for humans (Markdown) and tools (JSON).
 */

export { generateJSON, generateMarkdown, serializeJSON } from './reporter.js';
export type { JsonOutput, JsonOutputEntry } from './reporter.js';
