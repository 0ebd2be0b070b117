/**
 * @ace/core - TypeBox schema for ace.json configuration
 *
 * Sections: models, roles, playbook, adaptation
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const ModelsSchema = Type.Object({
  primary: Type.String({ description: 'Format: provider/model' }),
  fallbacks: Type.Array(Type.String(), { default: [] }),
  temperature: Type.Number({ minimum: 0, maximum: 2, default: 0 }),
  maxTokens: Type.Number({ minimum: 1, default: 1024 }),
  timeoutMs: Type.Number({ minimum: 0, default: 60000 }),
  maxRetries: Type.Number({ minimum: 0, default: 3, description: 'Provider retries per model' }),
  initialDelayMs: Type.Number({ minimum: 0, default: 1000 }),
  baseUrl: Type.Optional(Type.String()),
});

const RolesSchema = Type.Object({
  maxRetries: Type.Number({
    minimum: 1,
    default: 3,
    description: 'Completions attempted per role call when output is malformed',
  }),
});

const ContextBudgetSchema = Type.Object({
  maxNewBullets: Type.Number({ minimum: 0, default: 3 }),
  maxNewTokens: Type.Number({ minimum: 0, default: 400 }),
});

const PlaybookSchema = Type.Object({
  storage: Type.Union([Type.Literal('memory'), Type.Literal('json'), Type.Literal('sqlite')], {
    default: 'json',
  }),
  path: Type.Optional(Type.String()),
  maxBullets: Type.Number({ minimum: 1, default: 500 }),
  similarity: Type.Union([Type.Literal('normalized'), Type.Literal('token-overlap')], {
    default: 'normalized',
  }),
  similarityThreshold: Type.Number({ exclusiveMinimum: 0, maximum: 1, default: 0.85 }),
  pruneMargin: Type.Number({ minimum: 0, default: 3 }),
  minEvidence: Type.Number({ minimum: 0, default: 10 }),
});

const AdaptationSchema = Type.Object({
  epochs: Type.Number({ minimum: 1, default: 1 }),
  maxRefinementRounds: Type.Number({ minimum: 1, default: 1 }),
  reflectionWindow: Type.Number({ minimum: 0, default: 3 }),
  confidenceThreshold: Type.Number({ minimum: 0, maximum: 1, default: 0.5 }),
  contextBudget: ContextBudgetSchema,
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const AceConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  models: ModelsSchema,
  roles: RolesSchema,
  playbook: PlaybookSchema,
  adaptation: AdaptationSchema,
});

export type AceConfig = Static<typeof AceConfigSchema>;
export type ModelsConfig = Static<typeof ModelsSchema>;
export type PlaybookConfig = Static<typeof PlaybookSchema>;
export type AdaptationConfig = Static<typeof AdaptationSchema>;
export type ContextBudgetConfig = Static<typeof ContextBudgetSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: AceConfig = {
  version: 1,
  models: {
    primary: 'openai/gpt-4o-mini',
    fallbacks: [],
    temperature: 0,
    maxTokens: 1024,
    timeoutMs: 60000,
    maxRetries: 3,
    initialDelayMs: 1000,
  },
  roles: {
    maxRetries: 3,
  },
  playbook: {
    storage: 'json',
    maxBullets: 500,
    similarity: 'normalized',
    similarityThreshold: 0.85,
    pruneMargin: 3,
    minEvidence: 10,
  },
  adaptation: {
    epochs: 1,
    maxRefinementRounds: 1,
    reflectionWindow: 3,
    confidenceThreshold: 0.5,
    contextBudget: {
      maxNewBullets: 3,
      maxNewTokens: 400,
    },
  },
};
