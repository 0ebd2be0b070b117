/**
 * @ace/playbook - SQLite persistence
 *
 * Stores the playbook (sections, bullets, id counter) and a journal of
 * applied delta batches in one SQLite file.
 *
 * Tables: sections, bullets, meta, merge_log.
 * DB location: ACE_HOME/playbooks/playbook.db unless a path is given.
 * Pass ':memory:' for a throwaway database.
 */

import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { pino } from 'pino';
import { AceError, defaultPlaybookPath, isPlainObject } from '@ace/core';
import type { DeltaBatch } from './delta.js';
import type { MergeJournal, MergeReport, PlaybookStorage } from './merger.js';
import { Playbook, type PlaybookOptions, type PlaybookState } from './playbook.js';
import type { Bullet } from './types.js';

const logger = pino({ name: 'ace:playbook:database' });

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

interface SectionRow {
  name: string;
  position: number;
}

interface BulletRow {
  id: string;
  section: string;
  position: number;
  content: string;
  helpful: number;
  harmful: number;
  neutral: number;
  metadata: string;
  created_at: string;
  updated_at: string;
}

interface MergeLogRow {
  batch_id: string;
  applied_at: string;
  reasoning: string | null;
  operation_count: number;
  added_ids: string;
  anomaly_count: number;
  bullet_count: number;
}

export interface MergeLogEntry {
  batchId: string;
  appliedAt: string;
  reasoning: string | null;
  operationCount: number;
  addedIds: string[];
  anomalyCount: number;
  bulletCount: number;
}

function parseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return null;
  }
}

function rowToBullet(row: BulletRow): Bullet {
  const metadata = parseJson(row.metadata);
  return {
    id: row.id,
    section: row.section,
    content: row.content,
    counters: { helpful: row.helpful, harmful: row.harmful, neutral: row.neutral },
    metadata: isPlainObject(metadata) ? metadata : {},
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToMergeLog(row: MergeLogRow): MergeLogEntry {
  const added = parseJson(row.added_ids);
  return {
    batchId: row.batch_id,
    appliedAt: row.applied_at,
    reasoning: row.reasoning,
    operationCount: row.operation_count,
    addedIds: Array.isArray(added) ? added.filter((id): id is string => typeof id === 'string') : [],
    anomalyCount: row.anomaly_count,
    bulletCount: row.bullet_count,
  };
}

// ---------------------------------------------------------------------------
// PlaybookDatabase
// ---------------------------------------------------------------------------

export class PlaybookDatabase implements PlaybookStorage, MergeJournal {
  private db: Database.Database;
  readonly dbPath: string;

  constructor(dbPath?: string) {
    this.dbPath = dbPath ?? defaultPlaybookPath('sqlite');

    if (this.dbPath !== ':memory:') {
      const dir = dirname(this.dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (this.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');

    this.initSchema();
    logger.info({ dbPath: this.dbPath }, 'PlaybookDatabase initialized');
  }

  // -------------------------------------------------------------------------
  // Schema
  // -------------------------------------------------------------------------

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS sections (
        name     TEXT PRIMARY KEY,
        position INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS bullets (
        id         TEXT PRIMARY KEY,
        section    TEXT NOT NULL REFERENCES sections(name) ON DELETE CASCADE,
        position   INTEGER NOT NULL,
        content    TEXT NOT NULL,
        helpful    INTEGER NOT NULL DEFAULT 0,
        harmful    INTEGER NOT NULL DEFAULT 0,
        neutral    INTEGER NOT NULL DEFAULT 0,
        metadata   TEXT NOT NULL DEFAULT '{}',
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS meta (
        key   TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS merge_log (
        batch_id        TEXT PRIMARY KEY,
        applied_at      TEXT NOT NULL,
        reasoning       TEXT,
        operation_count INTEGER NOT NULL,
        added_ids       TEXT NOT NULL DEFAULT '[]',
        anomaly_count   INTEGER NOT NULL DEFAULT 0,
        bullet_count    INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_bullets_section    ON bullets(section, position);
      CREATE INDEX IF NOT EXISTS idx_merge_log_applied  ON merge_log(applied_at);
    `);
  }

  // -------------------------------------------------------------------------
  // Playbook snapshot
  // -------------------------------------------------------------------------

  /**
   * Replace the stored playbook with `playbook` in a single transaction.
   */
  save(playbook: Playbook): void {
    const state = playbook.toState();

    const insertSection = this.db.prepare<[string, number]>(
      'INSERT INTO sections (name, position) VALUES (?, ?)',
    );
    const insertBullet = this.db.prepare<
      [string, string, number, string, number, number, number, string, string, string]
    >(`
      INSERT INTO bullets (id, section, position, content, helpful, harmful, neutral, metadata, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const setMeta = this.db.prepare<[string, string]>(
      'INSERT INTO meta (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value',
    );

    const write = this.db.transaction((snapshot: PlaybookState) => {
      this.db.exec('DELETE FROM bullets; DELETE FROM sections;');
      snapshot.sections.forEach((section, sectionPos) => {
        insertSection.run(section.name, sectionPos);
        section.bullets.forEach((bullet, bulletPos) => {
          insertBullet.run(
            bullet.id,
            section.name,
            bulletPos,
            bullet.content,
            bullet.counters.helpful,
            bullet.counters.harmful,
            bullet.counters.neutral,
            JSON.stringify(bullet.metadata),
            bullet.createdAt,
            bullet.updatedAt,
          );
        });
      });
      setMeta.run('next_id', String(snapshot.nextId));
    });

    write(state);
    logger.debug({ bullets: playbook.size }, 'Playbook saved');
  }

  /**
   * Load the stored playbook. An empty database yields an empty playbook.
   *
   * @throws AceError PLAYBOOK_FORMAT when stored rows are inconsistent
   */
  load(options: PlaybookOptions = {}): Playbook {
    const sections = this.db
      .prepare<[], SectionRow>('SELECT name, position FROM sections ORDER BY position')
      .all();
    const rows = this.db
      .prepare<[string], BulletRow>('SELECT * FROM bullets WHERE section = ? ORDER BY position');
    const nextIdRow = this.db
      .prepare<[string], { value: string }>('SELECT value FROM meta WHERE key = ?')
      .get('next_id');

    const storedNextId = nextIdRow ? Number.parseInt(nextIdRow.value, 10) : 1;

    const state: PlaybookState = {
      nextId: Number.isSafeInteger(storedNextId) && storedNextId >= 1 ? storedNextId : 1,
      sections: sections.map((section) => ({
        name: section.name,
        bullets: rows.all(section.name).map(rowToBullet),
      })),
    };

    try {
      return Playbook.fromState(state, options);
    } catch (err) {
      throw new AceError('PLAYBOOK_FORMAT', `Stored playbook is inconsistent: ${String(err)}`, {
        cause: err,
      });
    }
  }

  // -------------------------------------------------------------------------
  // Merge journal
  // -------------------------------------------------------------------------

  recordMerge(batch: DeltaBatch, report: MergeReport): void {
    this.db
      .prepare<[string, string, string | null, number, string, number, number]>(`
        INSERT OR REPLACE INTO merge_log
          (batch_id, applied_at, reasoning, operation_count, added_ids, anomaly_count, bullet_count)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `)
      .run(
        report.batchId,
        report.appliedAt,
        batch.reasoning ?? null,
        batch.operations.length,
        JSON.stringify(report.addedIds),
        report.anomalies.length,
        report.bulletCount,
      );
  }

  /**
   * Most recent merges first.
   */
  getMergeHistory(limit = 50): MergeLogEntry[] {
    return this.db
      .prepare<[number], MergeLogRow>(
        'SELECT * FROM merge_log ORDER BY applied_at DESC, rowid DESC LIMIT ?',
      )
      .all(limit)
      .map(rowToMergeLog);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  close(): void {
    this.db.close();
    logger.info('PlaybookDatabase closed');
  }
}
