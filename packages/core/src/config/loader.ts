/**
 * @ace/core - Configuration loader
 *
 * Loads ace.json from ACE_HOME (or an explicit path), merges it over the
 * defaults, fills TypeBox defaults and validates.
 */

import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { AceError } from '../errors/index.js';
import { deepMerge, isPlainObject } from '../utils/index.js';
import { DEFAULT_CONFIG, type AceConfig } from './schema.js';
import { validateConfig, type ValidationIssue } from './validator.js';
import { buildPaths } from './paths.js';

export interface LoadedConfig {
  config: AceConfig;
  warnings: ValidationIssue[];
  path: string;
}

function readRawConfig(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2), 'utf-8');
    return {};
  }

  const text = readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new AceError(
      'CONFIG_INVALID',
      `Failed to parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new AceError('CONFIG_INVALID', `${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Merge user overrides over the defaults and validate the result.
 *
 * @throws AceError(CONFIG_INVALID) listing every schema or rule violation
 */
export function resolveConfig(overrides: Record<string, unknown>, source = '<inline>'): LoadedConfig {
  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), overrides);
  const validation = validateConfig(merged);

  if (!validation.valid || validation.config === undefined) {
    const details = validation.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new AceError('CONFIG_INVALID', `Invalid configuration in ${source}: ${details}`);
  }

  return { config: validation.config, warnings: validation.warnings, path: source };
}

/**
 * Load the ACE configuration.
 *
 * 1. Read ace.json (create with defaults if missing)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Fill TypeBox defaults and validate
 */
export function loadConfig(configPath: string = buildPaths().config): LoadedConfig {
  const raw = readRawConfig(configPath);
  return resolveConfig(raw, configPath);
}
