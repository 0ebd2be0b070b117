/**
 * E2E Tests for the composition root
 *
 * createAce() against each storage backend, with a ScriptedClient standing
 * in for the configured models.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ScriptedClient, type CompletionOptions } from '@ace/models';
import { loadFromFile, Playbook } from '@ace/playbook';
import { createAce } from '../../src/index.js';
import { curatorReply, generatorReply, reflectorReply } from '../helpers/fixtures.js';

vi.mock('pino', () => {
  const make = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });
  return { pino: make, default: make };
});

function oneLesson(_prompt: string, options: CompletionOptions): string {
  if (options.role === 'generator') return generatorReply('done');
  if (options.role === 'reflector') return reflectorReply();
  return curatorReply([{ type: 'ADD', section: 'Tools', content: 'Read the error before retrying' }]);
}

const environment = { evaluate: () => ({ feedback: 'ok' }) };

describe('createAce', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ace-e2e-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('wires an in-memory instance', async () => {
    const ace = createAce({
      overrides: { playbook: { storage: 'memory' }, adaptation: { epochs: 2 } },
      client: new ScriptedClient(oneLesson),
    });

    expect(ace.database).toBeNull();
    expect(ace.config.adaptation.epochs).toBe(2);

    const { results } = await ace.offline.run([{ question: 'q' }], environment);

    // The second epoch proposes the same lesson again and is deduplicated.
    expect(results).toHaveLength(2);
    expect(ace.playbook.list().map((b) => b.id)).toEqual(['tools-00001']);
    ace.close();
  });

  it('starts from a supplied playbook', () => {
    const seeded = new Playbook();
    seeded.add('Tools', 'Prefer dry runs');
    const ace = createAce({
      overrides: { playbook: { storage: 'memory' } },
      client: new ScriptedClient([]),
      playbook: seeded,
    });
    expect(ace.playbook.size).toBe(1);
  });

  it('persists to SQLite and journals every merge', async () => {
    const path = join(dir, 'playbook.db');
    const overrides = { playbook: { storage: 'sqlite', path } };

    const first = createAce({ overrides, client: new ScriptedClient(oneLesson) });
    await first.online.process({ question: 'q' }, environment);
    const history = first.database?.getMergeHistory() ?? [];
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ addedIds: ['tools-00001'], bulletCount: 1, reasoning: 'curated' });
    first.close();

    const second = createAce({ overrides, client: new ScriptedClient([]) });
    expect(second.playbook.list().map((b) => b.content)).toEqual(['Read the error before retrying']);
    second.close();
  });

  it('rewrites the JSON file after a merge', async () => {
    const path = join(dir, 'playbook.json');
    const ace = createAce({
      overrides: { playbook: { storage: 'json', path } },
      client: new ScriptedClient(oneLesson),
    });
    expect(ace.playbook.size).toBe(0);

    await ace.online.process({ question: 'q' }, environment);

    expect(loadFromFile(path).list().map((b) => b.id)).toEqual(['tools-00001']);
  });

  it('rejects invalid overrides', () => {
    expect(() => createAce({ overrides: { playbook: { storage: 'redis' } } })).toThrow(/CONFIG|Invalid configuration/);
  });
});
