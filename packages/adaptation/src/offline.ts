/**
 * @ace/adaptation - Offline driver
 *
 * Multi-epoch pass over a fixed sample set:
 *
 *   EPOCH_START -> for each sample { GENERATE -> EVALUATE -> REFLECT -> CURATE -> MERGE } -> EPOCH_END
 *
 * Samples run strictly one after another, so the generator for sample k+1
 * sees the playbook as of sample k's merge.
 */

import type { TaskEnvironment, AdaptationRun, Sample, StepResult } from './types.js';
import { AdapterBase, type AdapterOptions } from './adapter.js';

export interface OfflineAdapterOptions extends AdapterOptions {
  /** Used when run() is called without an epoch count (default 1). */
  epochs?: number;
}

export class OfflineAdapter extends AdapterBase {
  private readonly defaultEpochs: number;

  constructor(options: OfflineAdapterOptions) {
    super(options);
    this.defaultEpochs = options.epochs ?? 1;
  }

  /**
   * @throws RangeError when `epochs` is not a positive integer
   */
  async run(
    samples: readonly Sample[],
    environment: TaskEnvironment,
    epochs: number = this.defaultEpochs,
  ): Promise<AdaptationRun> {
    if (!Number.isInteger(epochs) || epochs < 1) {
      throw new RangeError(`epochs must be a positive integer, got ${epochs}`);
    }

    const results: StepResult[] = [];
    const totalSteps = samples.length;
    this.log.info({ samples: totalSteps, epochs }, 'Offline adaptation started');

    for (let epoch = 1; epoch <= epochs; epoch++) {
      this.emitEvent('epoch:start', { epoch, totalEpochs: epochs });
      let completed = 0;
      let failed = 0;

      for (const [index, sample] of samples.entries()) {
        const result = await this.processSample(sample, environment, {
          epoch,
          totalEpochs: epochs,
          step: index + 1,
          totalSteps,
        });
        if (result.status === 'completed') completed++;
        else failed++;
        results.push(result);
      }

      this.log.info({ epoch, epochs, completed, failed, bullets: this.playbook.size }, 'Epoch finished');
      this.emitEvent('epoch:end', { epoch, totalEpochs: epochs, completed, failed });
    }

    return { results, playbook: this.playbook };
  }
}
