/**
 * ACE - Composition root
 *
 * Wires the subsystems together:
 *   1. Resolve configuration (ace.json or inline overrides)
 *   2. Build the completion client (retry + failover across models)
 *   3. Open the playbook from its storage backend
 *   4. Create the merger, the three roles and both drivers
 */

import { existsSync } from 'node:fs';
import { pino, type Logger } from 'pino';
import {
  defaultPlaybookPath,
  loadConfig,
  resolveConfig,
  type AceConfig,
  type LoadedConfig,
} from '@ace/core';
import { createResilientClient, type CompletionClient } from '@ace/models';
import {
  createSimilarity,
  DeltaMerger,
  JsonPlaybookFile,
  Playbook,
  PlaybookDatabase,
  type MergeJournal,
  type PlaybookStorage,
  type PlaybookView,
} from '@ace/playbook';
import { Curator, Generator, Reflector } from '@ace/roles';
import { OfflineAdapter, OnlineAdapter } from '@ace/adaptation';

const log = pino({ name: 'ace:main' });

export interface CreateAceOptions {
  /** Read configuration from this ace.json. */
  configPath?: string;
  /** Inline overrides merged over the defaults when no configPath is given. */
  overrides?: Record<string, unknown>;
  /** Completion client to use instead of the configured models. */
  client?: CompletionClient;
  /** Start from this playbook instead of the stored one. */
  playbook?: Playbook;
  logger?: Logger;
}

export interface Ace {
  config: AceConfig;
  client: CompletionClient;
  playbook: PlaybookView;
  merger: DeltaMerger;
  generator: Generator;
  reflector: Reflector;
  curator: Curator;
  offline: OfflineAdapter;
  online: OnlineAdapter;
  /** SQLite backend, when configured; exposes the merge journal. */
  database: PlaybookDatabase | null;
  close(): void;
}

interface OpenedPlaybook {
  playbook: Playbook;
  storage?: PlaybookStorage;
  journal?: MergeJournal;
  database: PlaybookDatabase | null;
}

function openPlaybook(config: AceConfig, initial: Playbook | undefined, logger: Logger): OpenedPlaybook {
  const { storage, path } = config.playbook;

  switch (storage) {
    case 'memory':
      return { playbook: initial ?? new Playbook(), database: null };

    case 'json': {
      const file = new JsonPlaybookFile(path ?? defaultPlaybookPath('json'));
      const playbook = initial ?? (existsSync(file.filePath) ? file.load() : new Playbook());
      logger.info({ storage, path: file.filePath, bullets: playbook.size }, 'Playbook opened');
      return { playbook, storage: file, database: null };
    }

    case 'sqlite': {
      const database = new PlaybookDatabase(path ?? defaultPlaybookPath('sqlite'));
      const playbook = initial ?? database.load();
      logger.info({ storage, path: database.dbPath, bullets: playbook.size }, 'Playbook opened');
      return { playbook, storage: database, journal: database, database };
    }
  }
}

/**
 * Build a fully wired ACE instance.
 *
 * @throws AceError CONFIG_INVALID, PLAYBOOK_FORMAT
 */
export function createAce(options: CreateAceOptions = {}): Ace {
  const logger = options.logger ?? log;

  const loaded: LoadedConfig = options.configPath
    ? loadConfig(options.configPath)
    : resolveConfig(options.overrides ?? {});
  const { config } = loaded;
  for (const warning of loaded.warnings) {
    logger.warn({ path: warning.path }, `Config warning: ${warning.message}`);
  }

  const client = options.client ?? createResilientClient(config.models);
  const opened = openPlaybook(config, options.playbook, logger);

  const merger = new DeltaMerger(opened.playbook, {
    similarity: createSimilarity(config.playbook.similarity, config.playbook.similarityThreshold),
    maxBullets: config.playbook.maxBullets,
    pruneMargin: config.playbook.pruneMargin,
    minEvidence: config.playbook.minEvidence,
    ...(opened.storage ? { storage: opened.storage } : {}),
    ...(opened.journal ? { journal: opened.journal } : {}),
  });

  const roleOptions = {
    maxRetries: config.roles.maxRetries,
    completion: { temperature: config.models.temperature, maxTokens: config.models.maxTokens },
  };
  const generator = new Generator(client, roleOptions);
  const reflector = new Reflector(client, roleOptions);
  const curator = new Curator(client, roleOptions);

  const adapterOptions = {
    merger,
    generator,
    reflector,
    curator,
    maxRefinementRounds: config.adaptation.maxRefinementRounds,
    reflectionWindow: config.adaptation.reflectionWindow,
    confidenceThreshold: config.adaptation.confidenceThreshold,
    contextBudget: config.adaptation.contextBudget,
  };

  logger.info(
    { client: `${client.name}/${client.model}`, storage: config.playbook.storage },
    'ACE ready',
  );

  return {
    config,
    client,
    playbook: merger.playbook,
    merger,
    generator,
    reflector,
    curator,
    offline: new OfflineAdapter({ ...adapterOptions, epochs: config.adaptation.epochs }),
    online: new OnlineAdapter(adapterOptions),
    database: opened.database,
    close: () => opened.database?.close(),
  };
}

export * from '@ace/core';
export * from '@ace/playbook';
export * from '@ace/models';
export * from '@ace/roles';
export * from '@ace/adaptation';
