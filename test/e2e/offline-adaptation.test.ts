/**
 * E2E Tests for offline adaptation
 *
 * Full GENERATE -> EVALUATE -> REFLECT -> CURATE -> MERGE passes over a
 * fixed sample set, with every role answered by a ScriptedClient.
 */
import { describe, it, expect, vi } from 'vitest';
import { ScriptedClient, type CompletionOptions } from '@ace/models';
import { DeltaMerger, Playbook } from '@ace/playbook';
import { Curator, Generator, Reflector, type GeneratorOutput, type RoleOptions } from '@ace/roles';
import {
  OfflineAdapter,
  type EnvironmentResult,
  type Sample,
  type StageEvent,
  type StepResult,
  type TaskEnvironment,
} from '@ace/adaptation';
import { curatorReply, generatorReply, reflectorReply } from '../helpers/fixtures.js';

vi.mock('pino', () => {
  const make = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });
  return { pino: make, default: make };
});

const SAMPLES: Sample[] = [
  { question: 'What is 2+2?', groundTruth: '4' },
  { question: 'What is 12*3?', groundTruth: '36' },
];

const LESSONS: Record<string, string> = {
  'What is 2+2?': 'Check addition by counting up',
  'What is 12*3?': 'Verify multiplication with place values',
};

/**
 * Generator always cites math-00001; the reflector tags it helpful whenever
 * it exists; the curator proposes one lesson per question.
 */
function scriptedRoles(prompt: string, options: CompletionOptions): string {
  switch (options.role) {
    case 'generator':
      return generatorReply('answer', ['math-00001']);
    case 'reflector':
      return reflectorReply({
        tags: prompt.includes('[math-00001]') ? [{ id: 'math-00001', tag: 'helpful' }] : [],
      });
    case 'curator': {
      const question = Object.keys(LESSONS).find((q) => prompt.includes(`question: ${q}`)) ?? '';
      return curatorReply([{ type: 'ADD', section: 'Math', content: LESSONS[question] ?? 'unknown' }]);
    }
    default:
      throw new Error(`unexpected role ${String(options.role)}`);
  }
}

function exactMatch() {
  const evaluate = vi.fn(
    async (sample: Sample, output: GeneratorOutput): Promise<EnvironmentResult> => ({
      feedback: sample.groundTruth === output.finalAnswer ? 'correct' : 'incorrect',
    }),
  );
  return { evaluate } satisfies TaskEnvironment;
}

function buildAdapter(client: ScriptedClient, roleOptions: RoleOptions = {}): OfflineAdapter {
  return new OfflineAdapter({
    merger: new DeltaMerger(new Playbook()),
    generator: new Generator(client, roleOptions),
    reflector: new Reflector(client, roleOptions),
    curator: new Curator(client, roleOptions),
  });
}

describe('OfflineAdapter', () => {
  // ---------------------------------------------------------------------------
  // Multi-epoch pass
  // ---------------------------------------------------------------------------
  describe('two samples over two epochs', () => {
    it('calls every role once per sample per epoch', async () => {
      const client = new ScriptedClient(scriptedRoles);
      const environment = exactMatch();
      const { results } = await buildAdapter(client).run(SAMPLES, environment, 2);

      expect(results).toHaveLength(4);
      expect(results.every((r) => r.status === 'completed')).toBe(true);
      expect(client.promptsFor('generator')).toHaveLength(4);
      expect(client.promptsFor('reflector')).toHaveLength(4);
      expect(client.promptsFor('curator')).toHaveLength(4);
      expect(environment.evaluate).toHaveBeenCalledTimes(4);
    });

    it('lets each generator call see every earlier merge', async () => {
      const client = new ScriptedClient(scriptedRoles);
      await buildAdapter(client).run(SAMPLES, exactMatch(), 2);

      const prompts = client.promptsFor('generator');
      expect(prompts[0]).toContain('## PLAYBOOK\n\n(empty playbook)');
      expect(prompts[1]).toContain('[math-00001] Check addition by counting up');
      expect(prompts[1]).not.toContain('math-00002');
      for (const prompt of prompts.slice(2)) {
        expect(prompt).toContain('[math-00001]');
        expect(prompt).toContain('[math-00002] Verify multiplication with place values');
      }
    });

    it('accumulates counters and deduplicates repeated lessons', async () => {
      const client = new ScriptedClient(scriptedRoles);
      const { results, playbook } = await buildAdapter(client).run(SAMPLES, exactMatch(), 2);

      expect(playbook.list().map((b) => [b.id, b.counters])).toEqual([
        ['math-00001', { helpful: 3, harmful: 0, neutral: 1 }],
        ['math-00002', { helpful: 0, harmful: 0, neutral: 1 }],
      ]);

      const [first, second, third] = results;
      expect(first?.status === 'completed' && first.playbookSnapshot).toBe(
        '## Math\n- [math-00001] Check addition by counting up (helpful=0, harmful=0, neutral=0)',
      );
      expect(second?.status === 'completed' && second.mergeReport.addedIds).toEqual(['math-00002']);
      expect(third?.status === 'completed' && third.mergeReport.outcomes.map((o) => o.status)).toEqual([
        'applied',
        'deduplicated',
      ]);
    });

    it('emits stage, step and epoch events', async () => {
      const client = new ScriptedClient(scriptedRoles);
      const adapter = buildAdapter(client);
      const stages: StageEvent[] = [];
      const steps: StepResult[] = [];
      const epochEnds: unknown[] = [];
      adapter.on('stage', (event: StageEvent) => stages.push(event));
      adapter.on('step', (result: StepResult) => steps.push(result));
      adapter.on('epoch:end', (event: unknown) => epochEnds.push(event));

      await adapter.run(SAMPLES, exactMatch(), 2);

      expect(stages.slice(0, 5).map((s) => s.stage)).toEqual(['GENERATE', 'EVALUATE', 'REFLECT', 'CURATE', 'MERGE']);
      expect(stages).toHaveLength(20);
      expect(steps.map((s) => s.position)).toEqual([
        { epoch: 1, totalEpochs: 2, step: 1, totalSteps: 2 },
        { epoch: 1, totalEpochs: 2, step: 2, totalSteps: 2 },
        { epoch: 2, totalEpochs: 2, step: 1, totalSteps: 2 },
        { epoch: 2, totalEpochs: 2, step: 2, totalSteps: 2 },
      ]);
      expect(epochEnds).toEqual([
        { epoch: 1, totalEpochs: 2, completed: 2, failed: 0 },
        { epoch: 2, totalEpochs: 2, completed: 2, failed: 0 },
      ]);
    });

    it('tells the curator where it is in the run', async () => {
      const client = new ScriptedClient(scriptedRoles);
      await buildAdapter(client).run(SAMPLES, exactMatch(), 2);

      const prompts = client.promptsFor('curator');
      expect(prompts[3]).toContain('## PROGRESS\n\nepoch 2/2 · sample 2/2');
      expect(prompts[3]).toContain(
        '## QUESTION CONTEXT\n\nquestion: What is 12*3?\ncontext: \nmetadata: {}\nfeedback: incorrect\nground_truth: 36',
      );
    });
  });

  // ---------------------------------------------------------------------------
  // Failure isolation
  // ---------------------------------------------------------------------------
  describe('failure isolation', () => {
    it('records a curator failure and keeps going', async () => {
      const client = new ScriptedClient((prompt, options) =>
        options.role === 'curator' && prompt.includes('question: What is 12*3?')
          ? 'not json'
          : scriptedRoles(prompt, options),
      );
      const { results, playbook } = await buildAdapter(client, { maxRetries: 2 }).run(SAMPLES, exactMatch(), 1);

      const failed = results[1];
      expect(failed?.status).toBe('failed');
      if (failed?.status === 'failed') {
        expect(failed.stage).toBe('CURATE');
        expect(failed.error.code).toBe('CURATION_FAILED');
        expect(failed.reflection?.bulletTags).toEqual([{ bulletId: 'math-00001', tag: 'helpful' }]);
      }
      // The failed sample's reflection tag never reached the playbook.
      expect(playbook.list().map((b) => [b.id, b.counters.helpful])).toEqual([['math-00001', 0]]);
    });

    it('records an environment failure as UNEXPECTED_ERROR', async () => {
      const client = new ScriptedClient(scriptedRoles);
      const environment: TaskEnvironment = {
        evaluate: async () => {
          throw new Error('grader crashed');
        },
      };
      const { results, playbook } = await buildAdapter(client).run(SAMPLES.slice(0, 1), environment);

      expect(results[0]).toMatchObject({
        status: 'failed',
        stage: 'EVALUATE',
        error: { code: 'UNEXPECTED_ERROR', message: 'grader crashed' },
      });
      expect(playbook.size).toBe(0);
      expect(client.promptsFor('reflector')).toHaveLength(0);
    });

    it('rejects a non-positive epoch count', async () => {
      const adapter = buildAdapter(new ScriptedClient(scriptedRoles));
      await expect(adapter.run(SAMPLES, exactMatch(), 0)).rejects.toThrow(RangeError);
    });
  });

  // ---------------------------------------------------------------------------
  // Refinement
  // ---------------------------------------------------------------------------
  describe('refinement', () => {
    it('re-runs the reflector while it is unsure, up to the round limit', async () => {
      const client = new ScriptedClient((prompt, options) =>
        options.role === 'reflector'
          ? reflectorReply({ confidence: 0.2 })
          : scriptedRoles(prompt, options),
      );
      const adapter = new OfflineAdapter({
        merger: new DeltaMerger(new Playbook()),
        generator: new Generator(client),
        reflector: new Reflector(client),
        curator: new Curator(client),
        maxRefinementRounds: 3,
      });

      const {
        results: [result],
      } = await adapter.run(SAMPLES.slice(0, 1), exactMatch());

      const reflectorPrompts = client.promptsFor('reflector');
      expect(reflectorPrompts).toHaveLength(3);
      expect(reflectorPrompts[0]).not.toContain('REFINEMENT ROUND');
      expect(reflectorPrompts[2]).toContain('## REFINEMENT ROUND 2');
      expect(result?.status === 'completed' && result.reflectionRounds).toBe(3);
    });

    it('feeds recent reflections to the next generator call', async () => {
      const client = new ScriptedClient(scriptedRoles);
      const adapter = buildAdapter(client);
      await adapter.run(SAMPLES, exactMatch());

      expect(adapter.reflections).toHaveLength(2);
      expect(client.promptsFor('generator')[0]).toContain('## RECENT REFLECTION\n\n(none)');
      expect(client.promptsFor('generator')[1]).toContain(`## RECENT REFLECTION\n\n${adapter.reflections[0]}`);
    });
  });
});
