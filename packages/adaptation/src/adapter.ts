/**
 * @ace/adaptation - Shared per-sample state machine
 *
 *   GENERATE -> EVALUATE -> REFLECT (bounded refinement) -> CURATE -> MERGE
 *
 * A failure at any stage is recorded as a `failed` step naming the stage and
 * error code; nothing reaches the playbook for that sample. Only MERGE
 * mutates the playbook, through the DeltaMerger, and it is the last stage,
 * so an abandoned sample leaves the playbook exactly as it was.
 *
 * Events:
 *   'stage'       -> StageEvent    (each stage entered)
 *   'step'        -> StepResult    (each sample finished, either way)
 *   'epoch:start' -> EpochEvent
 *   'epoch:end'   -> EpochEndEvent
 */

import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import { pino, type Logger } from 'pino';
import { errorMessage, isAceError, type ContextBudgetConfig } from '@ace/core';
import { Delta, type DeltaBatch, type DeltaMerger, type PlaybookView } from '@ace/playbook';
import {
  isLowConfidence,
  serializeReflection,
  type Curator,
  type CuratorOutput,
  type Generator,
  type GeneratorOutput,
  type Reflector,
  type ReflectorOutput,
} from '@ace/roles';
import type {
  AdapterEvents,
  AdaptationStage,
  EnvironmentResult,
  FailedStep,
  Sample,
  StepPosition,
  StepResult,
  TaskEnvironment,
} from './types.js';

const defaultLog = pino({ name: 'ace:adaptation:adapter' });

export interface AdapterOptions {
  merger: DeltaMerger;
  generator: Generator;
  reflector: Reflector;
  curator: Curator;
  /** Reflector invocations per sample, at least 1 (default 1). */
  maxRefinementRounds?: number;
  /** Recent reflections handed to the generator (default 3). */
  reflectionWindow?: number;
  /** Below this reported confidence a reflection is refined (default 0.5). */
  confidenceThreshold?: number;
  contextBudget?: ContextBudgetConfig;
  logger?: Logger;
}

const DEFAULT_BUDGET: ContextBudgetConfig = { maxNewBullets: 3, maxNewTokens: 400 };

export function formatProgress(position: StepPosition): string {
  return `epoch ${position.epoch}/${position.totalEpochs} · sample ${position.step}/${position.totalSteps}`;
}

export function formatQuestionContext(sample: Sample, result: EnvironmentResult): string {
  return [
    `question: ${sample.question}`,
    `context: ${sample.context ?? ''}`,
    `metadata: ${JSON.stringify(sample.metadata ?? {})}`,
    `feedback: ${result.feedback}`,
    `ground_truth: ${result.groundTruth ?? sample.groundTruth ?? 'unknown'}`,
  ].join('\n');
}

export abstract class AdapterBase extends EventEmitter {
  protected readonly merger: DeltaMerger;
  protected readonly generator: Generator;
  protected readonly reflector: Reflector;
  protected readonly curator: Curator;
  protected readonly maxRefinementRounds: number;
  protected readonly reflectionWindow: number;
  protected readonly confidenceThreshold: number;
  protected readonly contextBudget: ContextBudgetConfig;
  protected readonly log: Logger;
  private recentReflections: string[] = [];

  constructor(options: AdapterOptions) {
    super();
    this.merger = options.merger;
    this.generator = options.generator;
    this.reflector = options.reflector;
    this.curator = options.curator;
    this.maxRefinementRounds = Math.max(1, Math.floor(options.maxRefinementRounds ?? 1));
    this.reflectionWindow = Math.max(0, Math.floor(options.reflectionWindow ?? 3));
    this.confidenceThreshold = options.confidenceThreshold ?? 0.5;
    this.contextBudget = options.contextBudget ?? DEFAULT_BUDGET;
    this.log = options.logger ?? defaultLog;
  }

  /** Current playbook; always reflects every merge applied so far. */
  get playbook(): PlaybookView {
    return this.merger.playbook;
  }

  /** Serialized reflections the next generator call will see, oldest first. */
  get reflections(): readonly string[] {
    return this.recentReflections;
  }

  protected emitEvent<K extends keyof AdapterEvents>(event: K, payload: AdapterEvents[K]): void {
    this.emit(event, payload);
  }

  // -------------------------------------------------------------------------
  // State machine
  // -------------------------------------------------------------------------

  protected async processSample(
    sample: Sample,
    environment: TaskEnvironment,
    position: StepPosition,
  ): Promise<StepResult> {
    const stepId = nanoid(10);
    let stage: AdaptationStage = 'GENERATE';
    let generatorOutput: GeneratorOutput | undefined;
    let environmentResult: EnvironmentResult | undefined;
    let reflection: ReflectorOutput | undefined;

    const enter = (next: AdaptationStage): void => {
      stage = next;
      this.emitEvent('stage', { stepId, stage: next, position });
    };

    try {
      enter('GENERATE');
      generatorOutput = await this.generator.generate({
        question: sample.question,
        context: sample.context ?? null,
        playbook: this.playbook,
        reflection: this.reflectionContext(),
      });

      enter('EVALUATE');
      environmentResult = await environment.evaluate(sample, generatorOutput);
      const groundTruth = environmentResult.groundTruth ?? sample.groundTruth ?? null;

      enter('REFLECT');
      const reflected = await this.reflect(sample, generatorOutput, environmentResult.feedback, groundTruth);
      reflection = reflected.reflection;
      this.rememberReflection(reflection);

      enter('CURATE');
      const curatorOutput = await this.curator.curate({
        reflection,
        playbook: this.playbook,
        contextBudget: this.contextBudget,
        questionContext: formatQuestionContext(sample, environmentResult),
        progress: formatProgress(position),
      });

      enter('MERGE');
      const mergeReport = await this.merger.apply(this.buildBatch(reflection, curatorOutput));

      const result: StepResult = {
        status: 'completed',
        stepId,
        sample,
        position,
        generatorOutput,
        environmentResult,
        reflection,
        reflectionRounds: reflected.rounds,
        curatorOutput,
        mergeReport,
        playbookSnapshot: mergeReport.snapshot,
      };

      this.log.info(
        {
          stepId,
          epoch: position.epoch,
          step: position.step,
          added: mergeReport.addedIds.length,
          anomalies: mergeReport.anomalies.length,
          bullets: mergeReport.bulletCount,
        },
        'Sample adapted',
      );
      this.emitEvent('step', result);
      return result;
    } catch (err) {
      const failed: FailedStep = {
        status: 'failed',
        stepId,
        sample,
        position,
        stage,
        error: {
          code: isAceError(err) ? err.code : 'UNEXPECTED_ERROR',
          message: errorMessage(err),
        },
      };
      if (generatorOutput) failed.generatorOutput = generatorOutput;
      if (environmentResult) failed.environmentResult = environmentResult;
      if (reflection) failed.reflection = reflection;

      this.log.error(
        { err, stepId, stage, code: failed.error.code, epoch: position.epoch, step: position.step },
        'Sample failed',
      );
      this.emitEvent('step', failed);
      return failed;
    }
  }

  /**
   * Reflect, then refine while the diagnosis is low-confidence and rounds
   * remain.
   */
  private async reflect(
    sample: Sample,
    generatorOutput: GeneratorOutput,
    feedback: string,
    groundTruth: string | null,
  ): Promise<{ reflection: ReflectorOutput; rounds: number }> {
    let prior: string | null = null;
    let rounds = 0;

    for (;;) {
      const reflection = await this.reflector.reflect({
        question: sample.question,
        generatorOutput,
        playbook: this.playbook,
        groundTruth,
        feedback,
        refinementRound: rounds,
        priorReflection: prior,
      });
      rounds += 1;

      if (rounds >= this.maxRefinementRounds || !isLowConfidence(reflection, this.confidenceThreshold)) {
        return { reflection, rounds };
      }
      this.log.debug({ round: rounds, confidence: reflection.confidence }, 'Low-confidence reflection, refining');
      prior = serializeReflection(reflection);
    }
  }

  /**
   * Reflection tags first, then the curator's operations: one atomic merge
   * per sample.
   */
  private buildBatch(reflection: ReflectorOutput, curatorOutput: CuratorOutput): DeltaBatch {
    const tagOps = reflection.bulletTags.map((t) => Delta.tag(t.bulletId, t.tag));
    const batch: DeltaBatch = { operations: [...tagOps, ...curatorOutput.batch.operations] };
    if (curatorOutput.batch.reasoning !== undefined) batch.reasoning = curatorOutput.batch.reasoning;
    return batch;
  }

  private reflectionContext(): string | null {
    return this.recentReflections.length > 0 ? this.recentReflections.join('\n---\n') : null;
  }

  private rememberReflection(reflection: ReflectorOutput): void {
    if (this.reflectionWindow === 0) return;
    this.recentReflections = [...this.recentReflections, serializeReflection(reflection)].slice(
      -this.reflectionWindow,
    );
  }
}
