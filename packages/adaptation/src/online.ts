/**
 * @ace/adaptation - Online driver
 *
 * One state-machine instance per incoming task, no epochs. `process()` may
 * be called concurrently: generation and reflection overlap freely, while
 * merges go through the DeltaMerger one at a time in submission order.
 * `run()` consumes a (possibly unbounded) stream strictly sequentially.
 */

import type { PlaybookView } from '@ace/playbook';
import type { AdaptationRun, Sample, StepResult, TaskEnvironment } from './types.js';
import { AdapterBase } from './adapter.js';

export interface OnlineStep {
  result: StepResult;
  playbook: PlaybookView;
}

export class OnlineAdapter extends AdapterBase {
  private seen = 0;

  /** Tasks accepted so far. */
  get processed(): number {
    return this.seen;
  }

  async process(task: Sample, environment: TaskEnvironment): Promise<OnlineStep> {
    this.seen += 1;
    const step = this.seen;
    const result = await this.processSample(task, environment, {
      epoch: 1,
      totalEpochs: 1,
      step,
      totalSteps: step,
    });
    return { result, playbook: this.playbook };
  }

  async run(
    samples: Iterable<Sample> | AsyncIterable<Sample>,
    environment: TaskEnvironment,
  ): Promise<AdaptationRun> {
    const results: StepResult[] = [];
    for await (const sample of samples) {
      const { result } = await this.process(sample, environment);
      results.push(result);
    }
    this.log.info({ processed: results.length, bullets: this.playbook.size }, 'Online pass finished');
    return { results, playbook: this.playbook };
  }
}
