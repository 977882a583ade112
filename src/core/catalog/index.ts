/**
 * Template catalog exports barrel file.
 */
export { CATALOG_TABLE, getTemplate, listTemplateNames, loadCatalog, normalizeTemplate } from './catalog.js';
export { ParameterEntrySchema, TemplateEntrySchema } from './schema.js';
export type { ParameterEntry, TemplateEntry } from './schema.js';
export {
  TEMPLATE_NAMES,
  PARAMETER_KINDS,
  isTemplateName,
  isParameterKind,
} from './types.js';
export type {
  TemplateName,
  ParameterKind,
  ParameterValue,
  ParameterContext,
  ParameterSpec,
  TemplateDefinition,
} from './types.js';
