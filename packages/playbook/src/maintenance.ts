/**
 * @ace/playbook - Grow-and-refine maintenance
 *
 * Runs when a merge leaves the playbook above its bullet cap:
 *
 *   1. Merge near-duplicates pairwise within each section (counters summed
 *      into the survivor).
 *   2. Prune bullets whose harmful count exceeds helpful by at least
 *      `pruneMargin` while total evidence is still below `minEvidence`.
 *   3. If still above the cap, evict the lowest-scoring bullets
 *      (helpful - harmful, oldest first on ties).
 *
 * Bullets in `protectedIds` (everything the triggering batch touched) are
 * never removed.
 */

import { pino, type Logger } from 'pino';
import type { Playbook } from './playbook.js';
import type { SimilarityStrategy } from './similarity.js';
import type { Bullet } from './types.js';

const defaultLog = pino({ name: 'ace:playbook:maintenance' });

export interface MaintenanceOptions {
  maxBullets: number;
  pruneMargin: number;
  minEvidence: number;
  similarity: SimilarityStrategy;
  logger?: Logger;
}

export interface MaintenanceReport {
  before: number;
  after: number;
  merged: Array<{ survivorId: string; absorbedId: string }>;
  pruned: string[];
  evicted: string[];
}

function totalEvidence(bullet: Readonly<Bullet>): number {
  return bullet.counters.helpful + bullet.counters.harmful + bullet.counters.neutral;
}

/**
 * True when a bullet has been judged harmful more often than helpful, by the
 * configured margin, without having gathered enough evidence to be trusted.
 */
export function isPruneCandidate(
  bullet: Readonly<Bullet>,
  options: Pick<MaintenanceOptions, 'pruneMargin' | 'minEvidence'>,
): boolean {
  const { helpful, harmful } = bullet.counters;
  return (
    harmful > helpful &&
    harmful - helpful >= options.pruneMargin &&
    totalEvidence(bullet) < options.minEvidence
  );
}

function mergeDuplicates(
  playbook: Playbook,
  similarity: SimilarityStrategy,
  protectedIds: ReadonlySet<string>,
): MaintenanceReport['merged'] {
  const merged: MaintenanceReport['merged'] = [];

  for (const section of playbook.sections()) {
    const bullets = playbook.listSection(section);
    const gone = new Set<string>();

    for (let i = 0; i < bullets.length; i++) {
      const left = bullets[i];
      if (!left || gone.has(left.id)) continue;

      for (let j = i + 1; j < bullets.length; j++) {
        const right = bullets[j];
        if (!right || gone.has(right.id)) continue;
        if (!similarity.isDuplicate(left.content, right.content)) continue;

        const leftProtected = protectedIds.has(left.id);
        const rightProtected = protectedIds.has(right.id);
        if (leftProtected && rightProtected) continue;

        const keepRight = rightProtected && !leftProtected;
        const survivorId = keepRight ? right.id : left.id;
        const absorbedId = keepRight ? left.id : right.id;

        if (playbook.absorb(survivorId, absorbedId)) {
          gone.add(absorbedId);
          merged.push({ survivorId, absorbedId });
        }
        if (absorbedId === left.id) break;
      }
    }
  }

  return merged;
}

function evictionOrder(bullets: ReadonlyArray<Readonly<Bullet>>): Array<Readonly<Bullet>> {
  return bullets
    .map((bullet, position) => ({ bullet, position }))
    .sort((a, b) => {
      const scoreA = a.bullet.counters.helpful - a.bullet.counters.harmful;
      const scoreB = b.bullet.counters.helpful - b.bullet.counters.harmful;
      if (scoreA !== scoreB) return scoreA - scoreB;
      if (a.bullet.createdAt !== b.bullet.createdAt) {
        return a.bullet.createdAt < b.bullet.createdAt ? -1 : 1;
      }
      return a.position - b.position;
    })
    .map((entry) => entry.bullet);
}

/**
 * Deduplicate, prune and, if needed, evict until the playbook fits its cap.
 */
export function growAndRefine(
  playbook: Playbook,
  options: MaintenanceOptions,
  protectedIds: ReadonlySet<string> = new Set(),
): MaintenanceReport {
  const log = options.logger ?? defaultLog;
  const before = playbook.size;

  const merged = mergeDuplicates(playbook, options.similarity, protectedIds);

  const pruned: string[] = [];
  for (const bullet of playbook.list()) {
    if (protectedIds.has(bullet.id)) continue;
    if (isPruneCandidate(bullet, options) && playbook.remove(bullet.id)) {
      pruned.push(bullet.id);
    }
  }

  const evicted: string[] = [];
  if (playbook.size > options.maxBullets) {
    const candidates = evictionOrder(playbook.list()).filter((b) => !protectedIds.has(b.id));
    for (const bullet of candidates) {
      if (playbook.size <= options.maxBullets) break;
      if (playbook.remove(bullet.id)) evicted.push(bullet.id);
    }
  }

  const after = playbook.size;
  if (after > options.maxBullets) {
    log.warn(
      { after, maxBullets: options.maxBullets, protected: protectedIds.size },
      'Playbook still above cap: remaining bullets are all referenced by the last batch',
    );
  }

  log.info(
    { before, after, merged: merged.length, pruned: pruned.length, evicted: evicted.length },
    'Grow-and-refine pass complete',
  );

  return { before, after, merged, pruned, evicted };
}
