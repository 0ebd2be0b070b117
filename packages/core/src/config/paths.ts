/**
 * @ace/core - Path resolution
 *
 * Resolves ACE_HOME. The storage backends create their own parent
 * directories.
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

/**
 * Resolve the ACE home directory.
 * Priority: ACE_HOME env var > ~/.ace
 */
export function resolveAceHome(): string {
  const fromEnv = process.env['ACE_HOME'];
  if (fromEnv) {
    return resolve(fromEnv);
  }
  return join(homedir(), '.ace');
}

/** Resolved path map */
export interface AcePaths {
  home: string;
  config: string; // ace.json
  playbooks: string;
}

/** Build the full set of ACE paths. */
export function buildPaths(home: string = resolveAceHome()): AcePaths {
  return {
    home,
    config: join(home, 'ace.json'),
    playbooks: join(home, 'playbooks'),
  };
}

/**
 * Default on-disk location of the playbook for a storage backend.
 */
export function defaultPlaybookPath(storage: 'json' | 'sqlite', paths?: AcePaths): string {
  const p = paths ?? buildPaths();
  return join(p.playbooks, storage === 'sqlite' ? 'playbook.db' : 'playbook.json');
}
