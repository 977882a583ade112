export { ParameterCollector } from './collector.js';
export type { ParameterCollectorOptions } from './collector.js';
export type { PromptProvider } from './prompt-provider.js';
