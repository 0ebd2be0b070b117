/**
 * @ace/core - Configuration validator
 *
 * Validates an AceConfig object using TypeBox, then applies business rules
 * (model id format, duplicate fallbacks, budget sanity).
 */

import { Value } from '@sinclair/typebox/value';
import { AceConfigSchema, type AceConfig } from './schema.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** Decoded config; absent when the schema check failed. */
  config: AceConfig | undefined;
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Model identifier format regex: provider/model-name */
const MODEL_FORMAT_RE = /^[a-zA-Z0-9_-]+\/[a-zA-Z0-9._:/-]+$/;

/**
 * Validate and normalise a raw config object.
 *
 * 1. Fill TypeBox defaults
 * 2. TypeBox schema check
 * 3. Business rules
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const candidate = Value.Default(AceConfigSchema, Value.Clone(raw));

  if (!Value.Check(AceConfigSchema, candidate)) {
    for (const err of Value.Errors(AceConfigSchema, candidate)) {
      errors.push({ path: err.path, message: err.message });
    }
    return { valid: false, errors, warnings, config: undefined };
  }

  const config = candidate;

  // ----- Models -----
  if (!MODEL_FORMAT_RE.test(config.models.primary)) {
    errors.push({
      path: '/models/primary',
      message: `Model "${config.models.primary}" must be in provider/model format (e.g. openai/gpt-4o-mini)`,
    });
  }

  config.models.fallbacks.forEach((fb, i) => {
    if (!MODEL_FORMAT_RE.test(fb)) {
      errors.push({
        path: `/models/fallbacks/${i}`,
        message: `Fallback model "${fb}" must be in provider/model format`,
      });
    }
    if (fb === config.models.primary) {
      warnings.push({
        path: `/models/fallbacks/${i}`,
        message: `Fallback "${fb}" duplicates the primary model`,
      });
    }
  });

  // ----- Playbook -----
  if (config.playbook.storage !== 'memory' && config.playbook.path === undefined) {
    warnings.push({
      path: '/playbook/path',
      message: `No playbook path set; the default location under ACE_HOME will be used`,
    });
  }

  // ----- Adaptation -----
  const budget = config.adaptation.contextBudget;
  if (budget.maxNewBullets === 0 || budget.maxNewTokens === 0) {
    warnings.push({
      path: '/adaptation/contextBudget',
      message: 'Context budget of zero: the curator will never add or rewrite bullets',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config,
  };
}

/**
 * Validate a single model identifier string.
 */
export function isValidModelFormat(model: string): boolean {
  return MODEL_FORMAT_RE.test(model);
}
