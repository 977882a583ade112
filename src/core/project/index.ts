export { ProjectCreator } from './creator.js';
export type { ProjectCreatorOptions } from './creator.js';
export { PathMaterializer, classifyPath, isCreationSuccessful } from './materializer.js';
export type { PathMaterializerOptions } from './materializer.js';
export type {
  CreationResult,
  CreationFailureReason,
  PathKind,
  ProjectCreationOutcome,
} from './types.js';
