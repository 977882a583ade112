export { formatPattern, resolvePattern, referencedParameters } from './format.js';
export type { PatternResolution } from './format.js';
