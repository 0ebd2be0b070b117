/**
 * @ace/playbook - Prompt rendering
 *
 * Renders a playbook the way the roles show it to the model:
 *
 *   ## Math
 *   - [math-00001] Decompose multiplication into place values (helpful=2, harmful=0, neutral=1)
 */

import type { Bullet, PlaybookView } from './types.js';

export function renderBullet(bullet: Readonly<Bullet>): string {
  const { helpful, harmful, neutral } = bullet.counters;
  return `- [${bullet.id}] ${bullet.content} (helpful=${helpful}, harmful=${harmful}, neutral=${neutral})`;
}

/**
 * Render every section in order. An empty playbook renders as ''.
 */
export function renderPlaybook(playbook: PlaybookView): string {
  const blocks: string[] = [];
  let current: string | null = null;
  let lines: string[] = [];

  for (const bullet of playbook.list()) {
    if (bullet.section !== current) {
      if (current !== null) blocks.push([`## ${current}`, ...lines].join('\n'));
      current = bullet.section;
      lines = [];
    }
    lines.push(renderBullet(bullet));
  }
  if (current !== null) blocks.push([`## ${current}`, ...lines].join('\n'));

  return blocks.join('\n\n');
}

/**
 * `[id] content` lines for the given ids, skipping unknown and repeated ids.
 */
export function renderExcerpt(playbook: PlaybookView, bulletIds: readonly string[]): string {
  const seen = new Set<string>();
  const lines: string[] = [];
  for (const id of bulletIds) {
    if (seen.has(id)) continue;
    const bullet = playbook.get(id);
    if (!bullet) continue;
    seen.add(id);
    lines.push(`[${bullet.id}] ${bullet.content}`);
  }
  return lines.join('\n');
}
