/**
 * Built-in template catalog.
 *
 * The table is static: it is validated and normalized once, on first access,
 * and never mutated afterwards.
 */
import { ErrorCodes, TemplateError } from '../../utils/errors.js';
import { formatZodError } from '../../utils/yaml.js';
import {
  TemplateEntrySchema,
  type ParameterEntry,
  type ParsedTemplateEntry,
  type TemplateEntry,
} from './schema.js';
import {
  TEMPLATE_NAMES,
  isTemplateName,
  type ParameterSpec,
  type TemplateDefinition,
  type TemplateName,
} from './types.js';

const PROJECT_NAME_PARAM = {
  type: 'text',
  name: 'project_name',
  message: 'What is your project named?',
  default: 'my-app',
} satisfies ParameterEntry;

export const CATALOG_TABLE = {
  python: {
    project: [
      '{project_name}/__init__.py',
      '{project_name}/cmdline.py',
      '{project_name}/templates',
      '.gitignore',
      'pyproject.toml',
      'README.md',
      'requirements.txt',
    ],
    params: [PROJECT_NAME_PARAM],
  },
  nodejs: {
    project: ['tsconfig.json', 'package.json', 'src/index.ts', '.gitignore'],
    params: [PROJECT_NAME_PARAM],
    hook: ['yarn install', 'yarn upgrade --latest', 'yarn start'],
  },
  swift: {
    project: [
      'Application',
      'Extensions',
      'Helpers',
      'Models',
      'Services',
      'ViewModels',
      'SwiftData/Models',
      'Views',
    ],
  },
  react: {
    project: ['models', 'viewmodels', 'views', 'services', 'hooks', 'contexts', 'types'],
  },
  flutter: {
    project: ['models', 'viewmodels', 'views', 'services', 'repositories', 'widgets', 'utils'],
  },
  android: {
    project: [
      'data/model',
      'data/remote',
      'data/local',
      'data/repository',
      'ui/screen',
      'ui/component',
      'ui/navigation',
      'di',
    ],
  },
} satisfies Record<TemplateName, TemplateEntry>;

let catalog: ReadonlyMap<TemplateName, TemplateDefinition> | undefined;

/**
 * Validate a catalog entry and turn it into a TemplateDefinition.
 */
export function normalizeTemplate(name: TemplateName, entry: TemplateEntry): TemplateDefinition {
  const result = TemplateEntrySchema.safeParse(entry);
  if (!result.success) {
    throw new TemplateError(
      ErrorCodes.INVALID_CATALOG,
      `Invalid catalog entry '${name}': ${formatZodError(result.error)}`,
      { template: name, errors: result.error.issues }
    );
  }
  return toDefinition(name, result.data);
}

function toDefinition(name: TemplateName, entry: ParsedTemplateEntry): TemplateDefinition {
  const parameterSpecs: ParameterSpec[] = entry.params.map((param) => ({
    kind: param.type,
    name: param.name,
    prompt: param.message ?? param.name,
    default: param.default ?? (param.type === 'confirm' ? false : ''),
    ...(param.choices ? { choices: Object.freeze([...param.choices]) } : {}),
  }));

  return Object.freeze({
    name,
    pathEntries: Object.freeze([...entry.project]),
    parameterSpecs: Object.freeze(parameterSpecs.map((spec) => Object.freeze(spec))),
    hookCommands: Object.freeze([...entry.hook]),
  });
}

/**
 * Load the catalog, validating the table on first use.
 */
export function loadCatalog(): ReadonlyMap<TemplateName, TemplateDefinition> {
  if (!catalog) {
    const entries = new Map<TemplateName, TemplateDefinition>();
    for (const name of TEMPLATE_NAMES) {
      entries.set(name, normalizeTemplate(name, CATALOG_TABLE[name]));
    }
    catalog = entries;
  }
  return catalog;
}

/**
 * Names of every template, in catalog order.
 */
export function listTemplateNames(): TemplateName[] {
  return [...loadCatalog().keys()];
}

/**
 * Look up a template by name (case-insensitive).
 *
 * @throws TemplateError (UNKNOWN_TEMPLATE) when no template has that name
 */
export function getTemplate(name: string): TemplateDefinition {
  const key = name.toLowerCase();
  const definition = isTemplateName(key) ? loadCatalog().get(key) : undefined;
  if (!definition) {
    throw new TemplateError(ErrorCodes.UNKNOWN_TEMPLATE, `Unsupported template type: ${key}`, {
      template: key,
      available: [...TEMPLATE_NAMES],
    });
  }
  return definition;
}
