/**
 * @ace/playbook - Shared types
 */

export const BULLET_TAGS = ['helpful', 'harmful', 'neutral'] as const;

export type BulletTag = (typeof BULLET_TAGS)[number];

const BULLET_TAG_SET: ReadonlySet<string> = new Set(BULLET_TAGS);

export function isBulletTag(value: string): value is BulletTag {
  return BULLET_TAG_SET.has(value);
}

/** Usage counters; each is a non-negative integer that only ever grows. */
export interface BulletCounters {
  helpful: number;
  harmful: number;
  neutral: number;
}

/**
 * A single strategy entry. Owned by exactly one Playbook; consumers only
 * ever see frozen copies.
 */
export interface Bullet {
  id: string;
  section: string;
  content: string;
  counters: BulletCounters;
  metadata: Record<string, unknown>;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601 */
  updatedAt: string;
}

export interface PlaybookStats {
  sections: number;
  bullets: number;
  tags: BulletCounters;
}

/**
 * Read-only surface of a playbook. Roles and drivers are handed this;
 * only the DeltaMerger holds the mutable Playbook.
 */
export interface PlaybookView {
  get(bulletId: string): Readonly<Bullet> | null;
  list(): ReadonlyArray<Readonly<Bullet>>;
  sections(): string[];
  stats(): PlaybookStats;
  readonly size: number;
}

export function zeroCounters(): BulletCounters {
  return { helpful: 0, harmful: 0, neutral: 0 };
}
