/**
 * @ace/playbook - Playbook store
 *
 * Ordered sections of bullets with usage counters. This is the unit of
 * persisted state. Mutation methods are public so that the DeltaMerger (and
 * the grow-and-refine pass it runs) can drive them; everything else is
 * handed a PlaybookView.
 *
 * Bullet ids look like `<section-slug>-<00001>`. The numeric part comes from
 * a monotonically increasing counter that is persisted with the playbook,
 * so an id is never handed out twice, even after the bullet is removed.
 */

import { slugify } from '@ace/core';
import {
  zeroCounters,
  type Bullet,
  type BulletCounters,
  type BulletTag,
  type PlaybookStats,
  type PlaybookView,
} from './types.js';

/** Plain, fully-owned representation used by persistence backends. */
export interface PlaybookState {
  nextId: number;
  sections: Array<{ name: string; bullets: Bullet[] }>;
}

/** Opaque restore point taken before a batch is applied. */
export interface PlaybookCheckpoint {
  readonly state: PlaybookState;
}

export interface PlaybookOptions {
  /** Time source for createdAt / updatedAt. */
  clock?: () => Date;
}

const ID_PAD = 5;

function cloneBullet(bullet: Bullet): Bullet {
  return {
    ...bullet,
    counters: { ...bullet.counters },
    metadata: structuredClone(bullet.metadata),
  };
}

function freezeBullet(bullet: Bullet): Readonly<Bullet> {
  const copy = cloneBullet(bullet);
  Object.freeze(copy.counters);
  Object.freeze(copy.metadata);
  return Object.freeze(copy);
}

function sanitizeCounters(counters?: Partial<BulletCounters>): BulletCounters {
  const result = zeroCounters();
  if (!counters) return result;
  for (const key of ['helpful', 'harmful', 'neutral'] as const) {
    const value = counters[key];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      result[key] = Math.floor(value);
    }
  }
  return result;
}

/**
 * Parse the numeric suffix of an id produced by this store, if any. Suffixes
 * the counter cannot step past exactly are ignored.
 */
function idSequence(id: string): number | null {
  const match = /-(\d+)$/.exec(id);
  if (match?.[1] === undefined) return null;
  const sequence = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(sequence) && sequence < Number.MAX_SAFE_INTEGER ? sequence : null;
}

// ---------------------------------------------------------------------------
// Playbook
// ---------------------------------------------------------------------------

export class Playbook implements PlaybookView {
  /** Section name -> bullet ids in insertion order. Map keeps section order. */
  private sectionIndex = new Map<string, string[]>();
  private bullets = new Map<string, Bullet>();
  private nextId = 1;
  private readonly clock: () => Date;

  constructor(options: PlaybookOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Reads
  // -------------------------------------------------------------------------

  get size(): number {
    return this.bullets.size;
  }

  /**
   * Look up a bullet. Absence is `null`, never an exception.
   */
  get(bulletId: string): Readonly<Bullet> | null {
    const bullet = this.bullets.get(bulletId);
    return bullet ? freezeBullet(bullet) : null;
  }

  has(bulletId: string): boolean {
    return this.bullets.has(bulletId);
  }

  /**
   * All bullets: section order, then insertion order within each section.
   */
  list(): ReadonlyArray<Readonly<Bullet>> {
    const result: Array<Readonly<Bullet>> = [];
    for (const ids of this.sectionIndex.values()) {
      for (const id of ids) {
        const bullet = this.bullets.get(id);
        if (bullet) result.push(freezeBullet(bullet));
      }
    }
    return result;
  }

  /** Bullets of one section, in insertion order. */
  listSection(section: string): ReadonlyArray<Readonly<Bullet>> {
    const ids = this.sectionIndex.get(section) ?? [];
    const result: Array<Readonly<Bullet>> = [];
    for (const id of ids) {
      const bullet = this.bullets.get(id);
      if (bullet) result.push(freezeBullet(bullet));
    }
    return result;
  }

  sections(): string[] {
    return [...this.sectionIndex.keys()];
  }

  stats(): PlaybookStats {
    const tags = zeroCounters();
    for (const bullet of this.bullets.values()) {
      tags.helpful += bullet.counters.helpful;
      tags.harmful += bullet.counters.harmful;
      tags.neutral += bullet.counters.neutral;
    }
    return {
      sections: this.sectionIndex.size,
      bullets: this.bullets.size,
      tags,
    };
  }

  // -------------------------------------------------------------------------
  // Mutations (DeltaMerger only)
  // -------------------------------------------------------------------------

  /**
   * Insert a new bullet and return its freshly generated id.
   *
   * @throws RangeError when `section` is blank; persisted documents require
   * a section name
   */
  add(
    section: string,
    content: string,
    counters?: Partial<BulletCounters>,
    metadata: Record<string, unknown> = {},
  ): string {
    if (!section.trim()) {
      throw new RangeError('Bullet section must not be blank');
    }
    const id = this.allocateId(section);
    const now = this.clock().toISOString();

    this.bullets.set(id, {
      id,
      section,
      content,
      counters: sanitizeCounters(counters),
      metadata: structuredClone(metadata),
      createdAt: now,
      updatedAt: now,
    });

    const ids = this.sectionIndex.get(section);
    if (ids) {
      ids.push(id);
    } else {
      this.sectionIndex.set(section, [id]);
    }

    return id;
  }

  /**
   * Replace a bullet's content (when given) and bump updatedAt.
   * @returns false when the id does not exist.
   */
  update(bulletId: string, content?: string): boolean {
    const bullet = this.bullets.get(bulletId);
    if (!bullet) return false;
    if (content !== undefined) bullet.content = content;
    bullet.updatedAt = this.clock().toISOString();
    return true;
  }

  /**
   * Increment one counter.
   * @returns false when the id does not exist.
   * @throws RangeError for a non-positive or fractional amount
   */
  tag(bulletId: string, tag: BulletTag, amount = 1): boolean {
    if (!Number.isInteger(amount) || amount < 1) {
      throw new RangeError(`Tag amount must be a positive integer, got ${amount}`);
    }
    const bullet = this.bullets.get(bulletId);
    if (!bullet) return false;
    bullet.counters[tag] += amount;
    bullet.updatedAt = this.clock().toISOString();
    return true;
  }

  /**
   * Delete a bullet. Empty sections are dropped.
   * @returns false when the id does not exist.
   */
  remove(bulletId: string): boolean {
    const bullet = this.bullets.get(bulletId);
    if (!bullet) return false;

    this.bullets.delete(bulletId);
    const ids = this.sectionIndex.get(bullet.section);
    if (ids) {
      const remaining = ids.filter((id) => id !== bulletId);
      if (remaining.length === 0) {
        this.sectionIndex.delete(bullet.section);
      } else {
        this.sectionIndex.set(bullet.section, remaining);
      }
    }
    return true;
  }

  /**
   * Fold `absorbedId` into `survivorId`: counters are summed, the absorbed
   * id is recorded under `metadata.mergedFrom`, and the absorbed bullet is
   * removed.
   */
  absorb(survivorId: string, absorbedId: string): boolean {
    const survivor = this.bullets.get(survivorId);
    const absorbed = this.bullets.get(absorbedId);
    if (!survivor || !absorbed || survivorId === absorbedId) return false;

    survivor.counters.helpful += absorbed.counters.helpful;
    survivor.counters.harmful += absorbed.counters.harmful;
    survivor.counters.neutral += absorbed.counters.neutral;

    const previous = survivor.metadata['mergedFrom'];
    const mergedFrom = Array.isArray(previous)
      ? previous.filter((v): v is string => typeof v === 'string')
      : [];
    survivor.metadata['mergedFrom'] = [...mergedFrom, absorbedId];
    survivor.updatedAt = this.clock().toISOString();

    return this.remove(absorbedId);
  }

  // -------------------------------------------------------------------------
  // Checkpoints
  // -------------------------------------------------------------------------

  checkpoint(): PlaybookCheckpoint {
    return { state: this.toState() };
  }

  restore(checkpoint: PlaybookCheckpoint): void {
    this.load(checkpoint.state);
  }

  // -------------------------------------------------------------------------
  // State import / export
  // -------------------------------------------------------------------------

  /** Deep copy of the full state, including the id counter. */
  toState(): PlaybookState {
    const sections: PlaybookState['sections'] = [];
    for (const [name, ids] of this.sectionIndex) {
      const bullets: Bullet[] = [];
      for (const id of ids) {
        const bullet = this.bullets.get(id);
        if (bullet) bullets.push(cloneBullet(bullet));
      }
      sections.push({ name, bullets });
    }
    return { nextId: this.nextId, sections };
  }

  static fromState(state: PlaybookState, options: PlaybookOptions = {}): Playbook {
    const playbook = new Playbook(options);
    playbook.load(state);
    return playbook;
  }

  private load(state: PlaybookState): void {
    const sectionIndex = new Map<string, string[]>();
    const bullets = new Map<string, Bullet>();
    let highest = 0;

    for (const section of state.sections) {
      if (section.bullets.length === 0) continue;
      const ids = sectionIndex.get(section.name) ?? [];
      for (const bullet of section.bullets) {
        if (bullets.has(bullet.id)) {
          throw new Error(`Duplicate bullet id "${bullet.id}" in playbook state`);
        }
        bullets.set(bullet.id, { ...cloneBullet(bullet), section: section.name });
        ids.push(bullet.id);
        highest = Math.max(highest, idSequence(bullet.id) ?? 0);
      }
      sectionIndex.set(section.name, ids);
    }

    this.sectionIndex = sectionIndex;
    this.bullets = bullets;
    const stored = Number.isSafeInteger(state.nextId) && state.nextId < Number.MAX_SAFE_INTEGER ? state.nextId : 1;
    this.nextId = Math.max(stored, highest + 1, 1);
  }

  private allocateId(section: string): string {
    const prefix = slugify(section);
    let id: string;
    do {
      id = `${prefix}-${String(this.nextId).padStart(ID_PAD, '0')}`;
      this.nextId += 1;
    } while (this.bullets.has(id));
    return id;
  }
}
