/**
 * Unit Tests for the Playbook store
 *
 * Tests id allocation, section ordering, counters, checkpoints and state
 * import/export.
 */
import { describe, it, expect } from 'vitest';
import { Playbook, type PlaybookState } from '@ace/playbook';
import { fixedClock, steppingClock } from '../helpers/fixtures.js';

describe('Playbook', () => {
  // ---------------------------------------------------------------------------
  // Id allocation
  // ---------------------------------------------------------------------------
  describe('add', () => {
    it('derives ids from the section slug and a shared counter', () => {
      const playbook = new Playbook();
      expect(playbook.add('Math', 'Decompose multiplication into place values')).toBe('math-00001');
      expect(playbook.add('Math', 'Check units')).toBe('math-00002');
      expect(playbook.add('Code Review', 'Run the tests first')).toBe('code-review-00003');
    });

    it('falls back to "general" when the section has no slug characters', () => {
      const playbook = new Playbook();
      expect(playbook.add('!!!', 'x')).toBe('general-00001');
    });

    it('never reuses an id after removal', () => {
      const playbook = new Playbook();
      playbook.add('Math', 'a');
      const second = playbook.add('Math', 'b');
      expect(playbook.remove(second)).toBe(true);
      expect(playbook.add('Math', 'c')).toBe('math-00003');
    });

    it('starts counters at zero and ignores negative or fractional seeds', () => {
      const playbook = new Playbook();
      const id = playbook.add('Math', 'a', { helpful: 2.7, harmful: -1 });
      expect(playbook.get(id)?.counters).toEqual({ helpful: 2, harmful: 0, neutral: 0 });
    });

    it('rejects a blank section', () => {
      const playbook = new Playbook();
      expect(() => playbook.add('   ', 'x')).toThrow(RangeError);
      expect(playbook.size).toBe(0);
    });

    it('stamps createdAt and updatedAt from the clock', () => {
      const playbook = new Playbook({ clock: fixedClock('2025-03-04T05:06:07.000Z') });
      const id = playbook.add('Math', 'a');
      expect(playbook.get(id)?.createdAt).toBe('2025-03-04T05:06:07.000Z');
      expect(playbook.get(id)?.updatedAt).toBe('2025-03-04T05:06:07.000Z');
    });
  });

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------
  describe('reads', () => {
    it('lists bullets in section order, then insertion order', () => {
      const playbook = new Playbook();
      playbook.add('Math', 'a');
      playbook.add('Code', 'b');
      playbook.add('Math', 'c');

      expect(playbook.sections()).toEqual(['Math', 'Code']);
      expect(playbook.list().map((b) => b.id)).toEqual(['math-00001', 'math-00003', 'code-00002']);
      expect(playbook.listSection('Math').map((b) => b.content)).toEqual(['a', 'c']);
      expect(playbook.listSection('Nope')).toEqual([]);
    });

    it('returns null for an unknown id', () => {
      expect(new Playbook().get('math-00001')).toBeNull();
    });

    it('hands out frozen copies', () => {
      const playbook = new Playbook();
      const id = playbook.add('Math', 'a');
      const bullet = playbook.get(id);
      expect(Object.isFrozen(bullet)).toBe(true);
      expect(Object.isFrozen(bullet?.counters)).toBe(true);
    });

    it('aggregates stats across sections', () => {
      const playbook = new Playbook();
      const a = playbook.add('Math', 'a');
      const b = playbook.add('Code', 'b');
      playbook.tag(a, 'helpful', 2);
      playbook.tag(b, 'harmful');
      playbook.tag(b, 'neutral', 3);

      expect(playbook.stats()).toEqual({
        sections: 2,
        bullets: 2,
        tags: { helpful: 2, harmful: 1, neutral: 3 },
      });
    });
  });

  // ---------------------------------------------------------------------------
  // Mutations
  // ---------------------------------------------------------------------------
  describe('mutations', () => {
    it('tags by the given amount and reports misses', () => {
      const playbook = new Playbook();
      const id = playbook.add('Math', 'a');
      expect(playbook.tag(id, 'helpful', 3)).toBe(true);
      expect(playbook.tag('math-09999', 'helpful')).toBe(false);
      expect(playbook.get(id)?.counters.helpful).toBe(3);
    });

    it('rejects non-positive and fractional tag amounts', () => {
      const playbook = new Playbook();
      const id = playbook.add('Math', 'a');
      expect(() => playbook.tag(id, 'helpful', 0)).toThrow(RangeError);
      expect(() => playbook.tag(id, 'helpful', -2)).toThrow(RangeError);
      expect(() => playbook.tag(id, 'helpful', 1.5)).toThrow(RangeError);
      expect(playbook.get(id)?.counters.helpful).toBe(0);
    });

    it('updates content and bumps updatedAt only', () => {
      const playbook = new Playbook({ clock: steppingClock('2025-01-01T00:00:00.000Z') });
      const id = playbook.add('Math', 'a');
      expect(playbook.update(id, 'b')).toBe(true);

      const bullet = playbook.get(id);
      expect(bullet?.content).toBe('b');
      expect(bullet?.createdAt).toBe('2025-01-01T00:00:00.000Z');
      expect(bullet?.updatedAt).toBe('2025-01-01T00:00:01.000Z');
      expect(playbook.update('missing')).toBe(false);
    });

    it('drops a section when its last bullet is removed', () => {
      const playbook = new Playbook();
      const id = playbook.add('Math', 'a');
      playbook.add('Code', 'b');
      playbook.remove(id);
      expect(playbook.sections()).toEqual(['Code']);
      expect(playbook.remove(id)).toBe(false);
    });

    it('absorbs one bullet into another', () => {
      const playbook = new Playbook();
      const survivor = playbook.add('Math', 'a', { helpful: 1 });
      const absorbed = playbook.add('Math', 'a again', { helpful: 2, harmful: 1 });

      expect(playbook.absorb(survivor, absorbed)).toBe(true);
      expect(playbook.has(absorbed)).toBe(false);
      expect(playbook.get(survivor)?.counters).toEqual({ helpful: 3, harmful: 1, neutral: 0 });
      expect(playbook.get(survivor)?.metadata).toEqual({ mergedFrom: ['math-00002'] });
      expect(playbook.absorb(survivor, survivor)).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // Checkpoints and state
  // ---------------------------------------------------------------------------
  describe('checkpoints and state', () => {
    it('restores exactly the checkpointed state', () => {
      const playbook = new Playbook({ clock: fixedClock() });
      const id = playbook.add('Math', 'a');
      const checkpoint = playbook.checkpoint();
      const before = playbook.toState();

      playbook.tag(id, 'harmful', 5);
      playbook.add('Code', 'b');
      playbook.remove(id);

      playbook.restore(checkpoint);
      expect(playbook.toState()).toEqual(before);
      expect(playbook.add('Math', 'c')).toBe('math-00002');
    });

    it('is unaffected by mutations of an exported state', () => {
      const playbook = new Playbook();
      const id = playbook.add('Math', 'a');
      const state = playbook.toState();
      const bullet = state.sections[0]?.bullets[0];
      if (bullet) bullet.counters.helpful = 99;
      expect(playbook.get(id)?.counters.helpful).toBe(0);
    });

    it('continues numbering after the highest imported id', () => {
      const state: PlaybookState = {
        nextId: 1,
        sections: [
          {
            name: 'Math',
            bullets: [
              {
                id: 'math-00007',
                section: 'Math',
                content: 'imported',
                counters: { helpful: 1, harmful: 0, neutral: 0 },
                metadata: {},
                createdAt: '2025-01-01T00:00:00.000Z',
                updatedAt: '2025-01-01T00:00:00.000Z',
              },
            ],
          },
        ],
      };
      const playbook = Playbook.fromState(state);
      expect(playbook.add('Math', 'next')).toBe('math-00008');
    });

    it('ignores imported id suffixes too large to count past', () => {
      const playbook = Playbook.fromState({
        nextId: 1,
        sections: [
          {
            name: 'Notes',
            bullets: [
              {
                id: 'note-90071992547409930',
                section: 'Notes',
                content: 'imported',
                counters: { helpful: 0, harmful: 0, neutral: 0 },
                metadata: {},
                createdAt: '2025-01-01T00:00:00.000Z',
                updatedAt: '2025-01-01T00:00:00.000Z',
              },
            ],
          },
        ],
      });
      expect(playbook.add('Math', 'a')).toBe('math-00001');
      expect(playbook.add('Math', 'b')).toBe('math-00002');
      expect(playbook.size).toBe(3);
    });

    it('rejects duplicate ids on import', () => {
      const bullet = {
        id: 'x-00001',
        section: 'X',
        content: 'a',
        counters: { helpful: 0, harmful: 0, neutral: 0 },
        metadata: {},
        createdAt: '2025-01-01T00:00:00.000Z',
        updatedAt: '2025-01-01T00:00:00.000Z',
      };
      expect(() =>
        Playbook.fromState({ nextId: 2, sections: [{ name: 'X', bullets: [bullet, bullet] }] }),
      ).toThrow('Duplicate bullet id "x-00001"');
    });
  });
});
