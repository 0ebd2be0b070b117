/**
 * @ace/playbook - Delta merger
 *
 * The single serialization point for playbook mutation. Batches are applied
 * one at a time in submission order; each is a transaction: either every
 * valid operation (plus any maintenance pass and the autosave) lands, or the
 * playbook is restored to exactly its state before the batch.
 *
 * Operations that reference a missing bullet, or carry an invalid amount,
 * are skipped and reported as MERGE_ANOMALY entries; they never abort the
 * rest of the batch.
 */

import { nanoid } from 'nanoid';
import { pino, type Logger } from 'pino';
import type { DeltaBatch, DeltaOperation } from './delta.js';
import { growAndRefine, type MaintenanceReport } from './maintenance.js';
import type { Playbook } from './playbook.js';
import { renderPlaybook } from './render.js';
import { NormalizedTextSimilarity, type SimilarityStrategy } from './similarity.js';
import type { PlaybookView } from './types.js';

const defaultLog = pino({ name: 'ace:playbook:merger' });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MergeAnomalyReason = 'missing_bullet' | 'invalid_amount' | 'empty_content' | 'empty_section';

export interface MergeAnomaly {
  code: 'MERGE_ANOMALY';
  /** Position of the operation in its batch. */
  index: number;
  operation: DeltaOperation;
  reason: MergeAnomalyReason;
  message: string;
}

export type OperationOutcome =
  | { index: number; type: 'ADD'; status: 'added' | 'deduplicated'; bulletId: string }
  | { index: number; type: 'UPDATE' | 'TAG' | 'REMOVE'; status: 'applied'; bulletId: string }
  | { index: number; type: DeltaOperation['type']; status: 'anomaly'; anomaly: MergeAnomaly };

export interface MergeReport {
  batchId: string;
  appliedAt: string;
  outcomes: OperationOutcome[];
  anomalies: MergeAnomaly[];
  /** Ids created by ADDs in this batch. */
  addedIds: string[];
  /** Every id the batch created, reproposed, updated or tagged. */
  touchedIds: string[];
  maintenance: MaintenanceReport | null;
  bulletCount: number;
  /** Rendered playbook as of this batch, taken before the next batch runs. */
  snapshot: string;
}

/** Synchronous persistence backend written inside the merge transaction. */
export interface PlaybookStorage {
  save(playbook: Playbook): void;
}

/** Audit sink for applied batches. */
export interface MergeJournal {
  recordMerge(batch: DeltaBatch, report: MergeReport): void;
}

export interface DeltaMergerOptions {
  similarity?: SimilarityStrategy;
  /** Bullet cap that triggers grow-and-refine (default 500). */
  maxBullets?: number;
  pruneMargin?: number;
  minEvidence?: number;
  storage?: PlaybookStorage;
  journal?: MergeJournal;
  /** Time source for `appliedAt`. */
  clock?: () => Date;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// AsyncMutex
// ---------------------------------------------------------------------------

/**
 * FIFO async mutex: waiters are released in the order they called acquire().
 */
export class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  get pending(): number {
    return this.queue.length;
  }
}

// ---------------------------------------------------------------------------
// DeltaMerger
// ---------------------------------------------------------------------------

export class DeltaMerger {
  private readonly target: Playbook;
  private readonly similarity: SimilarityStrategy;
  private readonly maxBullets: number;
  private readonly pruneMargin: number;
  private readonly minEvidence: number;
  private readonly storage: PlaybookStorage | undefined;
  private readonly journal: MergeJournal | undefined;
  private readonly clock: () => Date;
  private readonly log: Logger;
  private readonly mutex = new AsyncMutex();

  constructor(playbook: Playbook, options: DeltaMergerOptions = {}) {
    this.target = playbook;
    this.similarity = options.similarity ?? new NormalizedTextSimilarity();
    this.maxBullets = options.maxBullets ?? 500;
    this.pruneMargin = options.pruneMargin ?? 3;
    this.minEvidence = options.minEvidence ?? 10;
    this.storage = options.storage;
    this.journal = options.journal;
    this.clock = options.clock ?? (() => new Date());
    this.log = options.logger ?? defaultLog;
  }

  /** Read-only handle on the playbook this merger owns. */
  get playbook(): PlaybookView {
    return this.target;
  }

  /** Batches waiting behind the one currently being applied. */
  get pending(): number {
    return this.mutex.pending;
  }

  /**
   * Apply a batch. Concurrent callers are serialized first-come,
   * first-applied; when the returned promise resolves the playbook reflects
   * the batch and any maintenance it triggered.
   */
  async apply(batch: DeltaBatch): Promise<MergeReport> {
    await this.mutex.acquire();
    try {
      return this.applyLocked(batch);
    } finally {
      this.mutex.release();
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private applyLocked(batch: DeltaBatch): MergeReport {
    const batchId = batch.id ?? nanoid(10);
    const checkpoint = this.target.checkpoint();

    let report: MergeReport;
    try {
      report = this.applyOperations(batchId, batch.operations);
      this.storage?.save(this.target);
    } catch (err) {
      this.target.restore(checkpoint);
      this.log.error({ err, batchId }, 'Merge failed, playbook restored to pre-batch state');
      throw err;
    }

    if (this.journal) {
      try {
        this.journal.recordMerge({ ...batch, id: batchId }, report);
      } catch (err) {
        this.log.warn({ err, batchId }, 'Could not journal merge');
      }
    }

    this.log.info(
      {
        batchId,
        operations: batch.operations.length,
        added: report.addedIds.length,
        anomalies: report.anomalies.length,
        bullets: report.bulletCount,
        maintenance: report.maintenance !== null,
      },
      'Delta batch applied',
    );

    return report;
  }

  private applyOperations(batchId: string, operations: readonly DeltaOperation[]): MergeReport {
    const outcomes: OperationOutcome[] = [];
    const anomalies: MergeAnomaly[] = [];
    const addedIds: string[] = [];
    const touched = new Set<string>();

    const anomaly = (index: number, operation: DeltaOperation, reason: MergeAnomalyReason, message: string): void => {
      const entry: MergeAnomaly = { code: 'MERGE_ANOMALY', index, operation, reason, message };
      anomalies.push(entry);
      outcomes.push({ index, type: operation.type, status: 'anomaly', anomaly: entry });
      this.log.warn({ batchId, index, op: operation.type, reason }, message);
    };

    operations.forEach((op, index) => {
      switch (op.type) {
        case 'ADD': {
          const section = op.section.trim();
          if (!section) {
            anomaly(index, op, 'empty_section', 'ADD has no section');
            return;
          }
          const content = op.content.trim();
          if (!content) {
            anomaly(index, op, 'empty_content', `ADD into "${section}" has no content`);
            return;
          }
          const duplicate = this.target
            .listSection(section)
            .find((existing) => this.similarity.isDuplicate(existing.content, content));
          if (duplicate) {
            this.target.tag(duplicate.id, 'neutral', 1);
            touched.add(duplicate.id);
            outcomes.push({ index, type: 'ADD', status: 'deduplicated', bulletId: duplicate.id });
            this.log.debug({ batchId, bulletId: duplicate.id }, 'ADD matched existing bullet');
            return;
          }
          const id = this.target.add(section, content, op.counters, op.metadata);
          addedIds.push(id);
          touched.add(id);
          outcomes.push({ index, type: 'ADD', status: 'added', bulletId: id });
          this.log.debug({ batchId, bulletId: id, section }, 'Bullet added');
          return;
        }
        case 'UPDATE': {
          if (!this.target.update(op.bulletId, op.content?.trim() || undefined)) {
            anomaly(index, op, 'missing_bullet', `UPDATE references unknown bullet "${op.bulletId}"`);
            return;
          }
          touched.add(op.bulletId);
          outcomes.push({ index, type: 'UPDATE', status: 'applied', bulletId: op.bulletId });
          return;
        }
        case 'TAG': {
          const amount = op.amount ?? 1;
          if (!Number.isInteger(amount) || amount < 1) {
            anomaly(index, op, 'invalid_amount', `TAG amount must be a positive integer, got ${amount}`);
            return;
          }
          if (!this.target.tag(op.bulletId, op.tag, amount)) {
            anomaly(index, op, 'missing_bullet', `TAG references unknown bullet "${op.bulletId}"`);
            return;
          }
          touched.add(op.bulletId);
          outcomes.push({ index, type: 'TAG', status: 'applied', bulletId: op.bulletId });
          return;
        }
        case 'REMOVE': {
          if (!this.target.remove(op.bulletId)) {
            anomaly(index, op, 'missing_bullet', `REMOVE references unknown bullet "${op.bulletId}"`);
            return;
          }
          touched.delete(op.bulletId);
          outcomes.push({ index, type: 'REMOVE', status: 'applied', bulletId: op.bulletId });
          return;
        }
      }
    });

    let maintenance: MaintenanceReport | null = null;
    if (this.target.size > this.maxBullets) {
      maintenance = growAndRefine(
        this.target,
        {
          maxBullets: this.maxBullets,
          pruneMargin: this.pruneMargin,
          minEvidence: this.minEvidence,
          similarity: this.similarity,
          logger: this.log,
        },
        touched,
      );
    }

    return {
      batchId,
      appliedAt: this.clock().toISOString(),
      outcomes,
      anomalies,
      addedIds,
      touchedIds: [...touched].filter((id) => this.target.has(id)),
      maintenance,
      bulletCount: this.target.size,
      snapshot: renderPlaybook(this.target),
    };
  }
}
