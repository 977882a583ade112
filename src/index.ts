/**
 * seedling - scaffold projects from built-in templates.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Template catalog
export * from './core/catalog/index.js';

// Placeholder substitution
export * from './core/placeholders/index.js';

// Parameter collection
export * from './core/params/index.js';

// Rendering
export * from './core/render/index.js';

// Hooks
export * from './core/hooks/index.js';

// Project creation
export * from './core/project/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
export { runWizard } from './cli/commands/wizard.js';
export type { WizardOptions, WizardDependencies } from './cli/commands/wizard.js';
export { InquirerPromptProvider, isPromptCancellation } from './cli/prompts.js';
