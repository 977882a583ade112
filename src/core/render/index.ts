export { ContentRenderer, DEFAULT_FRAGMENT_SUFFIX } from './renderer.js';
export type { ContentRendererOptions } from './renderer.js';
