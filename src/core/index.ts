/**
 * Core module — parse-and-infer engine and the typed store.
 * Pure apart from file reads; never logs.
 */

export { ConfigStore, loadConfig, freeConfig } from './store.js';
export { ConfigLoadError } from './errors.js';
export type { ConfigLoadErrorCode } from './errors.js';
export { parseConfigText, parseLine } from './parser.js';
export type { LineResult } from './parser.js';
export { scanNumber, inferNumber, classifyNumber } from './numeric.js';
export type { NumberScan, NumericValue } from './numeric.js';
