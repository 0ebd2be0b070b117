/**
 * @ace/playbook - JSON persistence
 *
 * Serializes a Playbook to a versioned JSON document and back. Loading
 * reproduces identical sections, bullet order, ids, content, counters and
 * the id counter, so ids allocated after a reload never collide.
 */

import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { pino } from 'pino';
import { AceError, errorMessage } from '@ace/core';
import type { PlaybookStorage } from './merger.js';
import { Playbook, type PlaybookOptions, type PlaybookState } from './playbook.js';

const logger = pino({ name: 'ace:playbook:serializer' });

export const PLAYBOOK_FORMAT_VERSION = 1;

// ---------------------------------------------------------------------------
// Document schema
// ---------------------------------------------------------------------------

const CountersSchema = Type.Object({
  helpful: Type.Integer({ minimum: 0 }),
  harmful: Type.Integer({ minimum: 0 }),
  neutral: Type.Integer({ minimum: 0 }),
});

const BulletDocumentSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  content: Type.String(),
  counters: CountersSchema,
  metadata: Type.Record(Type.String(), Type.Unknown()),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});

export const PlaybookDocumentSchema = Type.Object({
  version: Type.Literal(PLAYBOOK_FORMAT_VERSION),
  nextId: Type.Integer({ minimum: 1, maximum: Number.MAX_SAFE_INTEGER }),
  sections: Type.Array(
    Type.Object({
      name: Type.String({ minLength: 1 }),
      bullets: Type.Array(BulletDocumentSchema),
    }),
  ),
});

export type PlaybookDocument = Static<typeof PlaybookDocumentSchema>;

// ---------------------------------------------------------------------------
// In-memory conversion
// ---------------------------------------------------------------------------

export function toDocument(playbook: Playbook): PlaybookDocument {
  const state = playbook.toState();
  return {
    version: PLAYBOOK_FORMAT_VERSION,
    nextId: state.nextId,
    sections: state.sections.map((section) => ({
      name: section.name,
      bullets: section.bullets.map((bullet) => ({
        id: bullet.id,
        content: bullet.content,
        counters: { ...bullet.counters },
        metadata: bullet.metadata,
        createdAt: bullet.createdAt,
        updatedAt: bullet.updatedAt,
      })),
    })),
  };
}

/**
 * @throws AceError PLAYBOOK_FORMAT when the document does not match the schema
 */
export function fromDocument(data: unknown, options: PlaybookOptions = {}): Playbook {
  if (!Value.Check(PlaybookDocumentSchema, data)) {
    const first = Value.Errors(PlaybookDocumentSchema, data).First();
    const where = first ? `${first.path || '/'}: ${first.message}` : 'unknown error';
    throw new AceError('PLAYBOOK_FORMAT', `Invalid playbook document (${where})`);
  }

  const state: PlaybookState = {
    nextId: data.nextId,
    sections: data.sections.map((section) => ({
      name: section.name,
      bullets: section.bullets.map((bullet) => ({ ...bullet, section: section.name })),
    })),
  };

  try {
    return Playbook.fromState(state, options);
  } catch (err) {
    throw new AceError('PLAYBOOK_FORMAT', `Invalid playbook document (${errorMessage(err)})`, {
      cause: err,
    });
  }
}

export function dumps(playbook: Playbook): string {
  return JSON.stringify(toDocument(playbook), null, 2);
}

/**
 * @throws AceError PLAYBOOK_FORMAT on malformed JSON or schema mismatch
 */
export function loads(text: string, options: PlaybookOptions = {}): Playbook {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new AceError('PLAYBOOK_FORMAT', `Playbook is not valid JSON: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  return fromDocument(data, options);
}

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

/**
 * Write the playbook to `filePath`. The document is written to a temporary
 * sibling first and renamed over the target, so readers never observe a
 * half-written file.
 */
export function saveToFile(playbook: Playbook, filePath: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tmpPath, dumps(playbook) + '\n', 'utf-8');
  renameSync(tmpPath, filePath);
  logger.debug({ filePath, bullets: playbook.size }, 'Playbook saved');
}

/**
 * @throws AceError PLAYBOOK_NOT_FOUND when the file does not exist
 * @throws AceError PLAYBOOK_FORMAT when its contents are invalid
 */
export function loadFromFile(filePath: string, options: PlaybookOptions = {}): Playbook {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new AceError('PLAYBOOK_NOT_FOUND', `Playbook file not found: ${filePath}`, {
      cause: err,
    });
  }
  const playbook = loads(text, options);
  logger.info({ filePath, bullets: playbook.size }, 'Playbook loaded');
  return playbook;
}

/** Storage backend that rewrites a JSON file after every merge. */
export class JsonPlaybookFile implements PlaybookStorage {
  constructor(readonly filePath: string) {}

  save(playbook: Playbook): void {
    saveToFile(playbook, this.filePath);
  }

  load(options: PlaybookOptions = {}): Playbook {
    return loadFromFile(this.filePath, options);
  }
}
