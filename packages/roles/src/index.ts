/**
 * @ace/roles - Generator, Reflector and Curator
 *
 * Three roles over one completion capability, each with its own prompt
 * builder and structured-output parser.
 */

export {
  extractJsonObject,
  checkSchema,
  parseStructured,
  completeStructured,
  RETRY_HINT,
  type ParseOutcome,
  type StructuredCall,
  type StructuredResult,
  type StructuredSuccess,
} from './structured.js';

export {
  buildGeneratorPrompt,
  buildReflectorPrompt,
  buildCuratorPrompt,
  EMPTY_PLAYBOOK,
  type RolePrompt,
  type GeneratorPromptInput,
  type ReflectorPromptInput,
  type CuratorPromptInput,
} from './prompts.js';

export {
  Generator,
  parseGeneratorOutput,
  type GenerateParams,
  type GeneratorOutput,
  type RoleOptions,
} from './generator.js';

export {
  Reflector,
  parseReflectorOutput,
  serializeReflection,
  isLowConfidence,
  type BulletTagging,
  type ReflectParams,
  type ReflectorOutput,
} from './reflector.js';

export {
  Curator,
  applyContextBudget,
  type ContextBudget,
  type CurateParams,
  type CuratorOutput,
  type DroppedOperation,
} from './curator.js';
